import type { FastifyBaseLogger } from "fastify";
import { config } from "./config.js";
import { positionKey } from "./board.js";
import { Game } from "./game.js";
import type {
  Clock, Direction, GameSnapshot, LifecycleState, RandomSource,
} from "./types.js";

export type SessionEvent = `game:${LifecycleState}` | "game:ate" | "game:error";

export interface SessionOptions {
  logger: FastifyBaseLogger;
  clock?: Clock;
  random?: RandomSource;
  boardWidth?: number;
  boardHeight?: number;
  frameIntervalMs?: number;
}

/**
 * Drives one Game from a wall clock: a setTimeout-chained frame loop that
 * feeds `onUpdate`, forwards player input, and publishes a snapshot whenever
 * something visible changed.
 */
export class Session {
  private game: Game;
  private frameTimer: ReturnType<typeof setTimeout> | null = null;
  private frameIntervalMs: number;
  private lastSignature = "";
  private onTick: ((snapshot: GameSnapshot) => void) | null = null;
  private onEvent: ((event: SessionEvent, data: unknown) => void) | null = null;

  private readonly clock: Clock;
  private readonly random: RandomSource | undefined;
  private readonly log: FastifyBaseLogger;

  constructor(options: SessionOptions) {
    this.clock = options.clock ?? (() => performance.now());
    this.random = options.random;
    this.log = options.logger.child({ module: "session" });
    this.frameIntervalMs = options.frameIntervalMs ?? config.frameIntervalMs;
    this.game = this.createGame(
      options.boardWidth ?? config.boardWidth,
      options.boardHeight ?? config.boardHeight,
    );
  }

  get current(): Game {
    return this.game;
  }

  get interval(): number {
    return this.frameIntervalMs;
  }

  get running(): boolean {
    return this.frameTimer !== null;
  }

  getState(): GameSnapshot {
    return this.game.snapshot();
  }

  setOnTick(cb: (snapshot: GameSnapshot) => void) {
    this.onTick = cb;
  }

  setOnEvent(cb: (event: SessionEvent, data: unknown) => void) {
    this.onEvent = cb;
  }

  // --- Frame loop ---

  start() {
    if (this.frameTimer) return;
    this.log.info({ frameIntervalMs: this.frameIntervalMs }, "frame loop started");
    this.scheduleFrame();
  }

  stop() {
    if (this.frameTimer) {
      clearTimeout(this.frameTimer);
      this.frameTimer = null;
    }
  }

  frame() {
    const now = this.clock();
    this.apply(() => this.game.onUpdate(now));
  }

  private scheduleFrame() {
    if (this.frameTimer) clearTimeout(this.frameTimer);
    this.frameTimer = setTimeout(() => {
      this.frame();
      if (this.frameTimer) this.scheduleFrame();
    }, this.frameIntervalMs);
  }

  // --- Input ---

  turn(direction: Direction): boolean {
    let queued = false;
    this.apply(() => {
      queued = this.game.tryChangeDirection(direction);
    });
    return queued;
  }

  togglePause() {
    const now = this.clock();
    this.apply(() => this.game.onTogglePause(now));
  }

  reset() {
    this.apply(() => this.game.onReset());
  }

  quit() {
    this.apply(() => this.game.onQuit());
    this.stop();
  }

  // --- Configuration ---

  resize(width: number, height: number) {
    if (width === this.game.width && height === this.game.height) return;
    this.apply(() => {
      this.game = this.createGame(width, height);
    });
    this.log.info({ width, height }, "board resized, new game created");
  }

  setFrameInterval(ms: number) {
    this.frameIntervalMs = ms;
    if (this.frameTimer) this.scheduleFrame();
    this.log.info({ frameIntervalMs: ms }, "frame interval changed");
  }

  private createGame(width: number, height: number): Game {
    return new Game(width, height, this.random ? { random: this.random } : {});
  }

  // --- Publishing ---

  /**
   * Runs one mutation of the game, then reports what changed. Errors from
   * the core are contract violations: the loop stops and the error is
   * rethrown after it has been logged and announced.
   */
  private apply(mutate: () => void) {
    const before = { status: this.game.state, length: this.game.body.length };

    try {
      mutate();
    } catch (err) {
      this.stop();
      this.log.error({ err }, "simulation stopped");
      this.emitEvent("game:error", { message: err instanceof Error ? err.message : String(err) });
      throw err;
    }

    const status = this.game.state;
    if (status === before.status && status === "running" && this.game.body.length > before.length) {
      this.log.debug({ length: this.game.body.length, speed: this.game.speed }, "food eaten");
      this.emitEvent("game:ate", { length: this.game.body.length, speed: this.game.speed });
    }
    if (status !== before.status) {
      this.log.info({ from: before.status, to: status, length: this.game.body.length }, "state changed");
      this.emitEvent(`game:${status}`, { length: this.game.body.length, speed: this.game.speed });
    }

    this.broadcastState();
  }

  private emitEvent(event: SessionEvent, data: unknown) {
    this.onEvent?.(event, data);
  }

  private broadcastState() {
    const snapshot = this.game.snapshot();
    const signature = [
      snapshot.status,
      snapshot.boardWidth,
      snapshot.boardHeight,
      snapshot.length,
      positionKey(snapshot.head),
      snapshot.food ? positionKey(snapshot.food) : "-",
      snapshot.speed,
      snapshot.direction,
    ].join("|");
    if (signature === this.lastSignature) return;
    this.lastSignature = signature;

    this.onTick?.(snapshot);
  }
}

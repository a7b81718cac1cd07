import { config } from "./config.js";
import {
  buildOccupiedSet, getOppositeDirection, isInsideBody,
  movePosition, positionKey, positionsEqual, randomPosition,
} from "./board.js";
import { invariant } from "./errors.js";
import { findNewTail } from "./growth.js";
import type {
  Direction, GameOptions, GameSnapshot, HitTarget,
  LifecycleState, Position, RandomSource,
} from "./types.js";

/**
 * Authoritative state of one snake game on a `width × height` torus.
 *
 * Every call is synchronous. `onUpdate` is meant to be called once per
 * rendered frame with a non-decreasing millisecond timestamp; the number of
 * tiles moved is derived from the time since the last committed move, so
 * frame jitter never accumulates.
 */
export class Game {
  readonly width: number;
  readonly height: number;

  private status: LifecycleState = "start";
  private parts: Position[] = [];       // parts[0] = tail, last = head
  private foodTile: Position | null = null;
  private lastMoveTimeMs = 0;
  private tilesPerSecond: number;
  private committed: Direction = "RIGHT";
  private pending: Direction[] = [];

  private readonly random: RandomSource;
  private readonly initialSpeed: number;
  private readonly maxSpeed: number;
  private readonly maxPendingDirections: number;

  constructor(width: number, height: number, options: GameOptions = {}) {
    // One row or column would make every wrapped neighbour the cell itself
    invariant(
      Number.isInteger(width) && Number.isInteger(height) && width >= 2 && height >= 2,
      `board must be at least 2x2 with integer sides, got ${width}x${height}`,
    );

    this.width = width;
    this.height = height;
    this.random = options.random ?? Math.random;
    this.initialSpeed = options.initialSpeed ?? config.initialSpeed;
    this.maxSpeed = options.maxSpeed ?? config.maxSpeed;
    this.maxPendingDirections = options.maxPendingDirections ?? config.maxPendingDirections;
    this.tilesPerSecond = this.initialSpeed;

    this.onReset();
  }

  // --- Accessors ---

  get state(): LifecycleState {
    return this.status;
  }

  get head(): Position {
    invariant(this.parts.length > 0, "snake body is empty");
    return this.parts[this.parts.length - 1];
  }

  get body(): readonly Position[] {
    return this.parts;
  }

  get food(): Position | null {
    return this.foodTile;
  }

  get speed(): number {
    return this.tilesPerSecond;
  }

  // Direction the snake is currently travelling in
  get direction(): Direction {
    return this.committed;
  }

  // Direction the next move will try to commit
  get nextDirection(): Direction {
    return this.pending.length > 0 ? this.pending[0] : this.committed;
  }

  get pendingDirections(): readonly Direction[] {
    return this.pending;
  }

  get lastMoveTime(): number {
    return this.lastMoveTimeMs;
  }

  get capacity(): number {
    return this.width * this.height;
  }

  snapshot(): GameSnapshot {
    return {
      status: this.status,
      boardWidth: this.width,
      boardHeight: this.height,
      body: this.parts.map(p => ({ x: p.x, y: p.y })),
      head: { ...this.head },
      food: this.foodTile ? { ...this.foodTile } : null,
      direction: this.committed,
      speed: this.tilesPerSecond,
      length: this.parts.length,
    };
  }

  // --- Input ---

  onUpdate(nowMs: number): void {
    if (this.status !== "running") return;

    const hit = this.move(nowMs);
    switch (hit) {
      case "none":
        break;
      case "snake":
        this.status = "loss";
        // Food passed over on the way into the collision is gone too
        if (this.foodTile && isInsideBody(this.parts, this.foodTile)) {
          this.foodTile = null;
        }
        break;
      case "food":
        this.status = this.consumeFood();
        if (this.status === "running") {
          this.changeSpeed();
          this.foodTile = this.generateFood();
        }
        break;
    }
  }

  /**
   * Queues a turn. Returns false when the turn was dropped: the game is not
   * running, the turn repeats the next queued direction, or the queue is
   * full. Reversals are accepted here and filtered when consumed.
   */
  tryChangeDirection(direction: Direction): boolean {
    if (this.status !== "running") return false;
    if (direction === this.nextDirection) return false;
    if (this.pending.length >= this.maxPendingDirections) return false;

    this.pending.push(direction);
    return true;
  }

  onTogglePause(nowMs: number): void {
    switch (this.status) {
      case "start":
        this.initialize();
        this.foodTile = this.generateFood();
        this.status = "running";
        this.lastMoveTimeMs = nowMs;
        break;
      case "paused":
        // Restart the clock so the pause does not turn into a jump
        this.status = "running";
        this.lastMoveTimeMs = nowMs;
        break;
      case "running":
        this.status = "paused";
        break;
      case "loss":
      case "win":
      case "quit":
        break;
    }
  }

  onReset(): void {
    this.initialize();
    this.status = "start";
  }

  onQuit(): void {
    this.onReset();
    this.status = "quit";
  }

  // --- Movement ---

  private initialize(): void {
    this.lastMoveTimeMs = 0;
    this.tilesPerSecond = this.initialSpeed;
    this.committed = "RIGHT";
    this.pending = [];
    this.parts = [{ x: Math.floor(this.width / 2), y: Math.floor(this.height / 2) }];
    this.foodTile = null;
  }

  private getMoveDelta(nowMs: number): number {
    invariant(
      nowMs >= this.lastMoveTimeMs,
      `clock went backwards: ${nowMs}ms is before the last move at ${this.lastMoveTimeMs}ms`,
    );
    const dt = nowMs - this.lastMoveTimeMs;
    return Math.round((this.tilesPerSecond * dt) / 1000);
  }

  private popNextDirection(): Direction {
    const next = this.pending.shift();
    if (next === undefined) return this.committed;
    if (next === getOppositeDirection(this.committed)) return this.committed;
    return next;
  }

  private move(nowMs: number): HitTarget {
    invariant(this.parts.length > 0, "snake body is empty");

    const tiles = this.getMoveDelta(nowMs);
    if (tiles === 0) return "none";

    this.committed = this.popNextDirection();
    this.lastMoveTimeMs = nowMs;

    let hitSnake = false;
    let hitFood = false;
    for (let i = 0; i < tiles; i++) {
      const newHead = movePosition(this.head, this.committed, this.width, this.height);
      this.parts.push(newHead);

      // Cells the tail leaves during this move are not obstacles
      if (isInsideBody(this.parts, newHead, 1, i + 1)) {
        hitSnake = true;
      }
      if (this.foodTile && positionsEqual(newHead, this.foodTile)) {
        hitFood = true;
      }
    }
    this.parts.splice(0, tiles);

    if (hitSnake) return "snake";
    return hitFood ? "food" : "none";
  }

  // --- Food ---

  private consumeFood(): LifecycleState {
    this.foodTile = null;

    const tail = findNewTail(this.parts, this.committed, this.width, this.height);
    const overlaps = isInsideBody(this.parts, tail);
    this.parts.unshift(tail);

    if (overlaps) return "loss";
    if (this.parts.length === this.capacity) return "win";
    return "running";
  }

  private changeSpeed(): void {
    if (this.tilesPerSecond < this.maxSpeed) {
      this.tilesPerSecond += 1;
    }
  }

  // Rejection sampling; only terminates while a free cell exists
  private generateFood(): Position {
    invariant(
      this.parts.length < this.capacity,
      `no free cell for food on a full ${this.width}x${this.height} board`,
    );

    const occupied = buildOccupiedSet(this.parts);
    let food = randomPosition(this.width, this.height, this.random);
    while (occupied.has(positionKey(food))) {
      food = randomPosition(this.width, this.height, this.random);
    }
    return food;
  }
}

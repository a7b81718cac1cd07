import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../app.js";
import { config } from "../config.js";
import { createLogger } from "../logger.js";
import { Session } from "../session.js";
import { cellsRandom } from "./helpers.js";

describe("HTTP routes", () => {
  let app: FastifyInstance;
  let session: Session;

  beforeEach(async () => {
    const logger = createLogger("silent");
    session = new Session({
      logger,
      clock: () => 0,
      random: cellsRandom(10, 10, [{ x: 2, y: 3 }]),
      boardWidth: 10,
      boardHeight: 10,
      frameIntervalMs: 16,
    });
    app = await buildApp({ session, logger });
  });

  afterEach(async () => {
    session.stop();
    await app.close();
  });

  it("GET /api/state returns the snapshot", async () => {
    const res = await app.inject({ method: "GET", url: "/api/state" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: "start",
      boardWidth: 10,
      boardHeight: 10,
      body: [{ x: 5, y: 5 }],
      head: { x: 5, y: 5 },
      food: null,
      direction: "RIGHT",
      speed: 5,
      length: 1,
    });
  });

  it("POST /api/turn is ignored before the game starts", async () => {
    const res = await app.inject({ method: "POST", url: "/api/turn", payload: { direction: "UP" } });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ queued: false, status: "start" });
  });

  it("POST /api/pause starts the game and turns are queued", async () => {
    const pause = await app.inject({ method: "POST", url: "/api/pause" });
    expect(pause.json()).toEqual({ status: "running" });
    expect(session.getState().food).toEqual({ x: 2, y: 3 });

    const turn = await app.inject({ method: "POST", url: "/api/turn", payload: { direction: "UP" } });
    expect(turn.json()).toEqual({ queued: true, status: "running" });
    expect(session.current.pendingDirections).toEqual(["UP"]);
  });

  it("POST /api/turn rejects unknown directions", async () => {
    const res = await app.inject({ method: "POST", url: "/api/turn", payload: { direction: "NORTH" } });
    expect(res.statusCode).toBe(400);
  });

  it("POST /api/reset returns to the start screen", async () => {
    await app.inject({ method: "POST", url: "/api/pause" });
    const res = await app.inject({ method: "POST", url: "/api/reset" });
    expect(res.json()).toEqual({ status: "start" });
  });

  it("POST /api/quit ends the session", async () => {
    session.start();
    const res = await app.inject({ method: "POST", url: "/api/quit" });
    expect(res.json()).toEqual({ status: "quit" });
    expect(session.running).toBe(false);
  });

  it("GET /api/docs/controls lists keys and palette", async () => {
    const res = await app.inject({ method: "GET", url: "/api/docs/controls" });
    const doc = res.json();
    expect(doc.keys.Space).toBe("start, pause or resume");
    expect(doc.palette).toEqual(config.colors);
  });

  it("POST /api/admin/config resizes the board", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/admin/config",
      payload: { boardWidth: 6 },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: "updated",
      config: { frameIntervalMs: 16, boardWidth: 6, boardHeight: 10 },
    });
    expect(session.getState().body).toEqual([{ x: 3, y: 5 }]);
  });

  it("POST /api/admin/config validates ranges", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/admin/config",
      payload: { frameIntervalMs: 0 },
    });
    expect(res.statusCode).toBe(400);
  });
});

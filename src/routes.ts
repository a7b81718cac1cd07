import type { FastifyInstance } from "fastify";
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from "fastify-type-provider-zod";
import { config } from "./config.js";
import {
  AdminConfigSchema,
  GameStateResponseSchema,
  StatusResponseSchema,
  TurnResponseSchema,
  TurnSchema,
} from "./schemas.js";
import type { Session } from "./session.js";

export async function registerRoutes(app: FastifyInstance, session: Session) {
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  // --- Player routes ---

  typedApp.get("/api/state", {
    schema: {
      description: "Current game snapshot: body (tail first), head, food, state and speed",
      tags: ["player"],
      response: { 200: GameStateResponseSchema },
    },
  }, async () => {
    return session.getState();
  });

  typedApp.post("/api/turn", {
    schema: {
      description: "Queue a turn. Ignored unless the game is running; reversals are dropped when the move is made.",
      tags: ["player"],
      body: TurnSchema,
      response: { 200: TurnResponseSchema },
    },
  }, async (request) => {
    const queued = session.turn(request.body.direction);
    return { queued, status: session.current.state };
  });

  typedApp.post("/api/pause", {
    schema: {
      description: "Start a new game, pause a running one, or resume a paused one",
      tags: ["player"],
      response: { 200: StatusResponseSchema },
    },
  }, async () => {
    session.togglePause();
    return { status: session.current.state };
  });

  typedApp.post("/api/reset", {
    schema: {
      description: "Throw the current game away and go back to the start screen",
      tags: ["player"],
      response: { 200: StatusResponseSchema },
    },
  }, async () => {
    session.reset();
    return { status: session.current.state };
  });

  typedApp.post("/api/quit", {
    schema: {
      description: "End the session. The server shuts down once the reply is sent.",
      tags: ["player"],
      response: { 200: StatusResponseSchema },
    },
  }, async () => {
    session.quit();
    return { status: session.current.state };
  });

  // --- Docs ---

  app.get("/api/docs/controls", {
    schema: {
      description: "Key bindings and rules for the viewer",
      tags: ["docs"],
    },
  }, async () => {
    return {
      keys: {
        "ArrowUp / W": "turn UP",
        "ArrowDown / S": "turn DOWN",
        "ArrowLeft / A": "turn LEFT",
        "ArrowRight / D": "turn RIGHT",
        "Space": "start, pause or resume",
        "Escape": "reset",
      },
      rules: [
        "The board wraps around on every edge",
        `Speed starts at ${config.initialSpeed} tiles/s and grows by one per food, up to ${config.maxSpeed}`,
        "Turning straight back is ignored",
        `Up to ${config.maxPendingDirections} turns are buffered between moves`,
        "Running into your own body ends the game; filling the board wins it",
      ],
      palette: config.colors,
    };
  });

  // --- Admin routes ---

  typedApp.post("/api/admin/config", {
    schema: {
      description: "Update frame interval or board size. A new board size starts a fresh game.",
      tags: ["admin"],
      body: AdminConfigSchema,
    },
  }, async (request) => {
    const updates = request.body;
    if (updates.frameIntervalMs !== undefined) {
      config.frameIntervalMs = updates.frameIntervalMs;
      session.setFrameInterval(updates.frameIntervalMs);
    }
    if (updates.boardWidth !== undefined || updates.boardHeight !== undefined) {
      const width = updates.boardWidth ?? session.current.width;
      const height = updates.boardHeight ?? session.current.height;
      config.boardWidth = width;
      config.boardHeight = height;
      session.resize(width, height);
    }

    return {
      status: "updated",
      config: {
        frameIntervalMs: session.interval,
        boardWidth: session.current.width,
        boardHeight: session.current.height,
      },
    };
  });
}

import type { FastifyBaseLogger } from "fastify";
import type { Server } from "socket.io";
import { TurnSchema } from "./schemas.js";
import type { Session } from "./session.js";

export function registerSocketHandlers(io: Server, session: Session, logger: FastifyBaseLogger) {
  const log = logger.child({ module: "sockets" });
  let viewerCount = 0;

  io.on("connection", (socket) => {
    viewerCount++;
    log.info(`Viewer connected (${viewerCount} total)`);

    // Send current state immediately
    socket.emit("game:tick", session.getState());

    socket.on("input:turn", (payload: unknown) => {
      const parsed = TurnSchema.safeParse(payload);
      if (!parsed.success) {
        log.warn({ issues: parsed.error.issues }, "dropped malformed turn");
        return;
      }
      session.turn(parsed.data.direction);
    });
    socket.on("input:pause", () => session.togglePause());
    socket.on("input:reset", () => session.reset());
    socket.on("input:quit", () => session.quit());

    socket.on("disconnect", () => {
      viewerCount--;
      log.info(`Viewer disconnected (${viewerCount} total)`);
    });
  });

  // Wire session output to Socket.io
  session.setOnTick((snapshot) => {
    io.emit("game:tick", snapshot);
  });
}

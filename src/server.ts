import { Server } from "socket.io";
import { buildApp } from "./app.js";
import { config } from "./config.js";
import { createLogger } from "./logger.js";
import { Session } from "./session.js";
import { registerSocketHandlers } from "./sockets.js";

const logger = createLogger();
const session = new Session({ logger });
const app = await buildApp({ session, logger });

await app.listen({ port: config.port, host: config.host });

// Socket.io on top of Fastify's underlying HTTP server
const io = new Server(app.server, {
  cors: { origin: "*" },
});
registerSocketHandlers(io, session, logger);

async function shutdown(reason: string) {
  app.log.info(`Shutting down (${reason})`);
  session.stop();
  io.disconnectSockets(true);
  await app.close();
}

session.setOnEvent((event, data) => {
  io.emit(event, data);
  if (event === "game:quit") {
    // Let the quit reply and event flush before closing
    setImmediate(() => {
      shutdown("player quit").catch((err: unknown) => {
        app.log.error({ err }, "shutdown failed");
        process.exitCode = 1;
      });
    });
  }
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    session.quit();
  });
}

session.start();

app.log.info(`Snake running on http://${config.host}:${config.port}`);
app.log.info(`API docs: http://${config.host}:${config.port}/docs`);

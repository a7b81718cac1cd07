import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import fastifyStatic from "@fastify/static";
import fastifyCors from "@fastify/cors";
import fastifySwagger from "@fastify/swagger";
import fastifySwaggerUi from "@fastify/swagger-ui";
import { jsonSchemaTransform } from "fastify-type-provider-zod";
import { fileURLToPath } from "node:url";
import { config } from "./config.js";
import { registerRoutes } from "./routes.js";
import type { Session } from "./session.js";

export interface AppOptions {
  session: Session;
  logger: FastifyBaseLogger;
}

export async function buildApp({ session, logger }: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({ loggerInstance: logger });

  await app.register(fastifyCors, { origin: config.corsOrigin });

  await app.register(fastifySwagger, {
    openapi: {
      info: {
        title: "Toroidal Snake",
        description: "Single-player snake on a wrap-around board, driven over HTTP or Socket.io",
        version: "1.0.0",
      },
      tags: [
        { name: "player", description: "Game input and state" },
        { name: "admin", description: "Runtime configuration" },
        { name: "docs", description: "Documentation" },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await app.register(fastifySwaggerUi, {
    routePrefix: "/docs",
  });

  // Routes (must be registered before static files)
  await registerRoutes(app, session);

  // Static viewer (wildcard false so API routes take priority)
  await app.register(fastifyStatic, {
    root: fileURLToPath(new URL("../public", import.meta.url)),
    prefix: "/",
    wildcard: false,
  });

  return app;
}

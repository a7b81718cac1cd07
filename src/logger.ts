import type { FastifyBaseLogger } from "fastify";
import { pino } from "pino";
import { config } from "./config.js";

export function createLogger(level: string = config.logLevel): FastifyBaseLogger {
  return pino({ level });
}

import { EnvSchema } from "./schemas.js";

const env = EnvSchema.parse(process.env);

export const config = {
  boardWidth: env.BOARD_WIDTH,     // 480px / 12px tiles
  boardHeight: env.BOARD_HEIGHT,
  frameIntervalMs: env.FRAME_INTERVAL_MS,
  initialSpeed: 5,                 // tiles per second
  maxSpeed: 30,
  maxPendingDirections: 3,
  host: env.HOST,
  port: env.PORT,
  logLevel: env.LOG_LEVEL,
  corsOrigin: true,
  colors: {
    running: "#ffffff",
    idle: "#646464",
    loss: "#ff3232",
    win: "#32ff32",
  },
};

export type Config = typeof config;

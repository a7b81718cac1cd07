import { z } from "zod";

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("127.0.0.1"),
  BOARD_WIDTH: z.coerce.number().int().min(2).max(200).default(40),
  BOARD_HEIGHT: z.coerce.number().int().min(2).max(200).default(40),
  FRAME_INTERVAL_MS: z.coerce.number().int().min(1).max(1000).default(16),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export const DirectionSchema = z.enum(["UP", "DOWN", "LEFT", "RIGHT"]);

export const LifecycleStateSchema = z.enum(["start", "running", "paused", "loss", "win", "quit"]);

export const PositionSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

export const TurnSchema = z.object({
  direction: DirectionSchema,
});

export const AdminConfigSchema = z.object({
  frameIntervalMs: z.number().int().min(1).max(1000).optional(),
  boardWidth: z.number().int().min(2).max(200).optional(),
  boardHeight: z.number().int().min(2).max(200).optional(),
});

export const GameStateResponseSchema = z.object({
  status: LifecycleStateSchema,
  boardWidth: z.number(),
  boardHeight: z.number(),
  body: z.array(PositionSchema),
  head: PositionSchema,
  food: PositionSchema.nullable(),
  direction: DirectionSchema,
  speed: z.number(),
  length: z.number(),
});

export const StatusResponseSchema = z.object({
  status: LifecycleStateSchema,
});

export const TurnResponseSchema = z.object({
  queued: z.boolean(),
  status: LifecycleStateSchema,
});

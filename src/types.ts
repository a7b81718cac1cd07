export interface Position {
  x: number;
  y: number;
}

export type Direction = "UP" | "DOWN" | "LEFT" | "RIGHT";

export interface Step {
  dx: number;
  dy: number;
}

export type LifecycleState = "start" | "running" | "paused" | "loss" | "win" | "quit";

// What the head ran into during one movement step
export type HitTarget = "none" | "snake" | "food";

// Returns a float in [0, 1), same contract as Math.random
export type RandomSource = () => number;

export type Clock = () => number;

export interface GameOptions {
  random?: RandomSource;
  initialSpeed?: number;
  maxSpeed?: number;
  maxPendingDirections?: number;
}

export interface GameSnapshot {
  status: LifecycleState;
  boardWidth: number;
  boardHeight: number;
  body: Position[];     // body[0] = tail, last = head
  head: Position;
  food: Position | null;
  direction: Direction;
  speed: number;        // tiles per second
  length: number;
}

import { invariant } from "./errors.js";
import type { Direction, Position, RandomSource, Step } from "./types.js";

export const DIRECTIONS: readonly Direction[] = ["UP", "DOWN", "LEFT", "RIGHT"];

const STEPS: Record<Direction, Step> = {
  UP:    { dx: 0,  dy: -1 },
  DOWN:  { dx: 0,  dy: 1 },
  LEFT:  { dx: -1, dy: 0 },
  RIGHT: { dx: 1,  dy: 0 },
};

const OPPOSITES: Record<Direction, Direction> = {
  UP: "DOWN", DOWN: "UP", LEFT: "RIGHT", RIGHT: "LEFT",
};

export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  return Math.floor(random() * (max - min)) + min;
}

export function randomPosition(width: number, height: number, random: RandomSource = Math.random): Position {
  return {
    x: randomInt(0, width, random),
    y: randomInt(0, height, random),
  };
}

export function positionKey(p: Position): string {
  return `${p.x},${p.y}`;
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

export function isInBounds(p: Position, width: number, height: number): boolean {
  return p.x >= 0 && p.x < width && p.y >= 0 && p.y < height;
}

export function directionStep(direction: Direction): Step {
  return STEPS[direction];
}

export function stepToDirection(step: Step): Direction | null {
  for (const direction of DIRECTIONS) {
    const s = STEPS[direction];
    if (s.dx === step.dx && s.dy === step.dy) return direction;
  }
  return null;
}

export function getOppositeDirection(direction: Direction): Direction {
  return OPPOSITES[direction];
}

export function isVertical(direction: Direction): boolean {
  return direction === "UP" || direction === "DOWN";
}

// Fixed order: the first free candidate wins when growing the tail
export function perpendicularDirections(direction: Direction): readonly [Direction, Direction] {
  return isVertical(direction) ? ["LEFT", "RIGHT"] : ["UP", "DOWN"];
}

export function wrap(value: number, size: number): number {
  return ((value % size) + size) % size;
}

export function movePosition(p: Position, direction: Direction, width: number, height: number): Position {
  const { dx, dy } = STEPS[direction];
  return {
    x: wrap(p.x + dx, width),
    y: wrap(p.y + dy, height),
  };
}

/**
 * Reduces a coordinate difference between two neighbouring cells to a unit
 * step. Across the seam a neighbour sits `size - 1` away, which is a step
 * of -1 (and `-(size - 1)` is a step of +1). Needs `size >= 2`: on a single
 * row or column a neighbour is the cell itself and there is no step to read.
 */
export function wrapDelta(delta: number, size: number): number {
  invariant(size >= 2, `cannot read a step along a dimension of size ${size}`);
  if (delta === size - 1) return -1;
  if (delta === -(size - 1)) return 1;
  return delta;
}

/**
 * Direction the tail travels in, read from the two oldest body cells.
 */
export function findTailDirection(
  beforeTail: Position,
  tail: Position,
  width: number,
  height: number,
): Direction {
  invariant(
    beforeTail.x === tail.x || beforeTail.y === tail.y,
    `tail cells ${positionKey(tail)} and ${positionKey(beforeTail)} are not on one row or column`,
  );

  const step: Step = {
    dx: wrapDelta(beforeTail.x - tail.x, width),
    dy: wrapDelta(beforeTail.y - tail.y, height),
  };
  const direction = stepToDirection(step);
  invariant(
    direction !== null,
    `tail cells ${positionKey(tail)} and ${positionKey(beforeTail)} are not neighbours`,
  );
  return direction;
}

export function buildOccupiedSet(cells: readonly Position[]): Set<string> {
  const set = new Set<string>();
  for (const c of cells) {
    set.add(positionKey(c));
  }
  return set;
}

/**
 * Linear scan of the body, ignoring `skipHead` cells at the head end and
 * `skipTail` cells at the tail end. A multi-tile move uses the tail skip to
 * ignore the cells it is about to vacate.
 */
export function isInsideBody(
  body: readonly Position[],
  p: Position,
  skipHead = 0,
  skipTail = 0,
): boolean {
  invariant(
    body.length >= skipHead + skipTail,
    `cannot skip ${skipHead + skipTail} cells of a ${body.length}-cell body`,
  );
  for (let i = skipTail; i < body.length - skipHead; i++) {
    if (positionsEqual(body[i], p)) return true;
  }
  return false;
}

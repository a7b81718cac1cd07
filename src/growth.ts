import {
  findTailDirection, getOppositeDirection, isInsideBody,
  movePosition, perpendicularDirections,
} from "./board.js";
import { invariant } from "./errors.js";
import type { Direction, Position } from "./types.js";

/**
 * Picks the cell a freshly fed snake grows into. `body` is tail-first and has
 * already been trimmed for this move, so `body[0]` is the current tail.
 *
 * The first choice is one tile behind the tail. Near the seam of the board
 * that cell can belong to another part of the body, so the two cells beside
 * the tail are tried next (LEFT/RIGHT for a vertical tail, UP/DOWN for a
 * horizontal one). When all three are taken the cell behind is returned and
 * the caller sees the overlap.
 */
export function findNewTail(
  body: readonly Position[],
  fallbackDirection: Direction,
  width: number,
  height: number,
): Position {
  invariant(body.length > 0, "cannot grow an empty body");

  const tail = body[0];
  const tailDirection = body.length >= 2
    ? findTailDirection(body[1], tail, width, height)
    : fallbackDirection;

  const behind = movePosition(tail, getOppositeDirection(tailDirection), width, height);
  if (!isInsideBody(body, behind)) return behind;

  for (const side of perpendicularDirections(tailDirection)) {
    const candidate = movePosition(tail, side, width, height);
    if (!isInsideBody(body, candidate)) return candidate;
  }
  return behind;
}

import type { Game } from "../game.js";
import type { Position, RandomSource } from "../types.js";

/**
 * Random source that makes food land on `cells`, in order. Each placement
 * draws x then y; running out of values is a test bug, so it throws.
 */
export function cellsRandom(width: number, height: number, cells: Position[]): RandomSource {
  const values = cells.flatMap(c => [(c.x + 0.5) / width, (c.y + 0.5) / height]);
  let i = 0;
  return () => {
    if (i >= values.length) throw new Error("random source exhausted");
    return values[i++];
  };
}

// Advances the clock by roughly one tile at the current speed
export function stepOnce(game: Game, now: number): number {
  const next = now + Math.round(1000 / game.speed);
  game.onUpdate(next);
  return next;
}

/**
 * Raised when a caller breaks the simulation contract: a clock running
 * backwards, an empty body, food placement on a full board. These are
 * programming errors and are never caught inside the core.
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new PreconditionError(message);
  }
}

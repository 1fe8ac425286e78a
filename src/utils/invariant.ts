/**
 * Invariant checks for the signature lattice.
 *
 * Every failure here is a bug in the caller: the lattice only ever sees
 * values the checker itself constructed, so nothing is recoverable.
 */

/**
 * Thrown when an internal invariant of the lattice does not hold
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

/**
 * Assert a condition about the receiver's state
 */
export function checkState(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}

/**
 * Assert a condition about an argument
 */
export function checkArgument(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InvariantError(`Illegal argument: ${message}`);
  }
}

/**
 * Base class for contract violations raised by sequence operations.
 */
export class SequenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raised by `dropFirst` and `maxBy` on an empty sequence. */
export class EmptySequenceError extends SequenceError {
  constructor(readonly operation: string) {
    super(`${operation}() called on an empty sequence`);
  }
}

/** Raised by `at` when the index does not address an element. */
export class IndexOutOfRangeError extends SequenceError {
  constructor(
    readonly index: number,
    readonly length: number
  ) {
    super(`Index ${index} is out of range for a sequence of length ${length}`);
  }
}

/** Base class for every failure the digit engine reports. */
export abstract class DigitError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The requested index cannot be represented as a non-negative signed 64-bit integer. */
export class IndexOutOfRangeError extends DigitError {
  readonly code = "INDEX_OUT_OF_RANGE";

  constructor(readonly index: string) {
    super(`index ${index} is out of range, must be an integer in [0, 9223372036854775807]`);
  }
}

/** The index is not an integer the service can read exactly. */
export class InvalidIndexError extends DigitError {
  readonly code = "INVALID_INDEX";

  constructor(readonly raw: string, message = `index "${raw}" is not a non-negative decimal integer`) {
    super(message);
  }
}

export type CacheOperation = "get" | "set";

/** Wraps any failure surfaced by the injected DigitCache. */
export class CacheError extends DigitError {
  readonly code = "CACHE_ERROR";

  constructor(
    readonly operation: CacheOperation,
    readonly key: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`cache ${operation} for key "${key}" failed: ${message}`, options);
  }
}

/** A computed value broke an algorithmic invariant; never a normal error path. */
export class AssertionFailure extends DigitError {
  readonly code = "ASSERTION_FAILURE";
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) throw new AssertionFailure(message);
}

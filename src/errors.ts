/** Reason codes for rejected interpolation input. */
export type InvalidInputReason = "too_few_points" | "duplicate_x";

/** Error thrown when interpolation points fail validation. */
export class InvalidInputError extends Error {
  constructor(
    readonly reason: InvalidInputReason,
    message: string,
  ) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/**
 * Thrown for operations the polynomial type does not define,
 * such as dividing by a polynomial.
 */
export class UnsupportedOperationError extends Error {
  constructor(
    readonly operation: string,
    message: string,
  ) {
    super(message);
    this.name = "UnsupportedOperationError";
  }
}

/** Error thrown for malformed command-line arguments. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

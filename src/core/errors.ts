/**
 * Error types for similarity estimation.
 *
 * "No solution" is not an error: the estimator returns null for degenerate
 * geometry. These classes cover malformed input only.
 */

/**
 * Base error class for all alignment errors.
 */
export class AlignmentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AlignmentError";
  }
}

/**
 * Error thrown when input validation fails.
 * Contains an array of all validation errors found.
 */
export class ValidationError extends AlignmentError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Validation failed: ${errors.join("; ")}`);
    this.name = "ValidationError";
    this.errors = errors;
  }
}

/**
 * Error thrown when point data does not hold exactly rows x columns values.
 */
export class LengthMismatchError extends AlignmentError {
  readonly expected: number;
  readonly actual: number;

  constructor(message: string, expected: number, actual: number) {
    super(message);
    this.name = "LengthMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Error thrown when two operands disagree in shape.
 */
export class DimensionMismatchError extends AlignmentError {
  readonly left: readonly [number, number];
  readonly right: readonly [number, number];

  constructor(message: string, left: readonly [number, number], right: readonly [number, number]) {
    super(message);
    this.name = "DimensionMismatchError";
    this.left = left;
    this.right = right;
  }
}

/**
 * Error thrown when labeled anchors cannot be paired.
 */
export class AnchorMatchError extends AlignmentError {
  readonly anchorId?: string;
  readonly reason: "count_mismatch" | "duplicate_anchor" | "missing_anchor";

  constructor(message: string, reason: AnchorMatchError["reason"], anchorId?: string) {
    super(message);
    this.name = "AnchorMatchError";
    this.reason = reason;
    this.anchorId = anchorId;
  }
}

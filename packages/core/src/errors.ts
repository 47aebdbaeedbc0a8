/**
 * Raised for any out-of-domain numeric input: a non-positive rate, a bad
 * goal count, non-positive odds, a zero normalization denominator or a
 * malformed k.
 */
export class InvalidArgumentError extends Error {
  readonly code = "INVALID_ARGUMENT" as const;

  constructor(message: string, readonly argument?: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export function isInvalidArgument(err: unknown): err is InvalidArgumentError {
  return err instanceof InvalidArgumentError;
}

export function assertFinite(value: number, argument: string) {
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(`${argument} must be a finite number, got ${value}`, argument);
  }
}

export function assertGoalCount(value: number, argument: string) {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${argument} must be a non-negative integer, got ${value}`, argument);
  }
}

export type SparklineErrorCode = 'EMPTY_DATASET' | 'NON_FINITE_VALUE' | 'INVALID_OPTION';

/**
 * Thrown synchronously for inputs that cannot be rendered.
 *
 * Rendering is deterministic, so the same inputs fail the same way every time;
 * callers should correct the input rather than retry.
 */
export class SparklineError extends Error {
  readonly code: SparklineErrorCode;

  constructor(code: SparklineErrorCode, message: string) {
    super(message);
    this.name = 'SparklineError';
    this.code = code;
  }
}

export const isSparklineError = (error: unknown): error is SparklineError => error instanceof SparklineError;

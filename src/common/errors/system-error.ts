export interface RetryStrategy {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export type ErrorSeverityLevel = 'critical' | 'error' | 'warning';

/**
 * Base error class for all system errors.
 * Subclasses define error code ranges:
 * - CalculationError: 1000-1999
 * - RateError: 2000-2999
 * - ConfigValidationError: 4010
 */
export abstract class SystemError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly severity: ErrorSeverityLevel,
    public readonly retryStrategy?: RetryStrategy,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Coerces any throwable into an Error so downstream stages can rely on
 * `name`, `message` and `stack`.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

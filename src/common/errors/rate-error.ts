import {
  SystemError,
  type ErrorSeverityLevel,
  type RetryStrategy,
} from './system-error.js';

/**
 * Error class for exchange-rate failures (code range 2000-2999).
 *
 * - 2000: Provider failure (WARNING, NETWORK_ERROR retry inside the provider)
 * - 2001: All providers exhausted (ERROR, healed via cached fallback)
 * - 2002: Unsupported currency (WARNING, no retry)
 * - 2003: Cancelled (WARNING, never healed)
 */
export class RateError extends SystemError {
  constructor(
    code: number,
    message: string,
    severity: ErrorSeverityLevel,
    retryStrategy?: RetryStrategy,
    metadata?: Record<string, unknown>,
  ) {
    super(code, message, severity, retryStrategy, metadata);
  }
}

export const RATE_ERROR_CODES = {
  PROVIDER_FAILURE: 2000,
  ALL_PROVIDERS_EXHAUSTED: 2001,
  UNSUPPORTED_CURRENCY: 2002,
  CANCELLED: 2003,
} as const;

export const RETRY_STRATEGIES = {
  NETWORK_ERROR: {
    maxRetries: 2,
    initialDelayMs: 250,
    maxDelayMs: 2000,
    backoffMultiplier: 2,
  },
} as const satisfies Record<string, RetryStrategy>;

/** Thrown by a single provider; the aggregator catches it and moves on. */
export class RateProviderError extends RateError {
  constructor(
    public readonly providerName: string,
    message: string,
    metadata?: Record<string, unknown>,
  ) {
    super(
      RATE_ERROR_CODES.PROVIDER_FAILURE,
      `${providerName}: ${message}`,
      'warning',
      RETRY_STRATEGIES.NETWORK_ERROR,
      { providerName, ...metadata },
    );
  }
}

export class AllProvidersExhaustedError extends RateError {
  constructor(
    public readonly from: string,
    public readonly to: string,
    public readonly failures: string[],
  ) {
    super(
      RATE_ERROR_CODES.ALL_PROVIDERS_EXHAUSTED,
      `All rate providers exhausted for ${from}/${to}: ${failures.join('; ')}`,
      'error',
      undefined,
      { from, to, failures },
    );
  }
}

export class UnsupportedCurrencyError extends RateError {
  constructor(from: string, to: string) {
    super(
      RATE_ERROR_CODES.UNSUPPORTED_CURRENCY,
      `Unsupported currency pair: ${from}/${to}`,
      'warning',
      undefined,
      { from, to },
    );
  }
}

export class CancelledError extends RateError {
  constructor(reason: string) {
    super(RATE_ERROR_CODES.CANCELLED, `Cancelled: ${reason}`, 'warning');
  }
}

export { SystemError, toError } from './system-error.js';
export type { RetryStrategy, ErrorSeverityLevel } from './system-error.js';
export {
  CalculationError,
  CALCULATION_ERROR_CODES,
  MissingOperandError,
  DivisionByZeroError,
  NegativeRadicandError,
  InvalidNumericLiteralError,
  UnsupportedOperationError,
  PrecisionOverflowError,
  InvalidPrecisionError,
  UndefinedResultError,
  InvalidRequestError,
} from './calculation-error.js';
export {
  RateError,
  RATE_ERROR_CODES,
  RETRY_STRATEGIES,
  RateProviderError,
  AllProvidersExhaustedError,
  UnsupportedCurrencyError,
  CancelledError,
} from './rate-error.js';
export { ConfigValidationError } from './config-validation-error.js';

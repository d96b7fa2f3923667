import type { ErrorPatternDefinition } from './healing.types.js';

/**
 * Patterns registered by `seed()`. Matchers run case-insensitively over
 * `"<error name>: <message>"`; ids double as corrector keys.
 */
export const DEFAULT_PATTERNS: readonly ErrorPatternDefinition[] = [
  {
    id: 'div_by_zero',
    matcher: /(division by zero|divide by zero|DivisionByZero)/i,
    errorType: 'DivisionByZeroError',
    category: 'calculation',
    severity: 'high',
    autoFixAvailable: true,
    fixStrategy: 'Use epsilon value or limit calculation',
  },
  {
    id: 'invalid_decimal',
    matcher: /(invalid literal|invalid numeric literal|invalid decimal)/i,
    errorType: 'InvalidNumericLiteralError',
    category: 'validation',
    severity: 'medium',
    autoFixAvailable: true,
    fixStrategy: 'Sanitize and validate input format',
  },
  {
    id: 'overflow',
    matcher: /(overflow|too large|exceeds maximum)/i,
    errorType: 'PrecisionOverflowError',
    category: 'precision',
    severity: 'high',
    autoFixAvailable: true,
    fixStrategy: 'Break into smaller calculations or adjust precision',
  },
  {
    id: 'network_timeout',
    matcher: /(timeout|timed out|connection|network|unreachable|ECONNREFUSED)/i,
    errorType: 'NetworkError',
    category: 'network',
    severity: 'medium',
    autoFixAvailable: true,
    fixStrategy: 'Retry with exponential backoff',
  },
  {
    id: 'cache_unavailable',
    matcher: /(cache unavailable|cache error|connection pool|redis)/i,
    errorType: 'CacheError',
    category: 'cache',
    severity: 'medium',
    autoFixAvailable: true,
    fixStrategy: 'Use fallback storage mechanism',
  },
  {
    id: 'providers_exhausted',
    matcher: /(all rate providers exhausted|AllProvidersExhausted)/i,
    errorType: 'AllProvidersExhaustedError',
    category: 'currency',
    severity: 'high',
    autoFixAvailable: true,
    fixStrategy: 'Serve a recently cached rate',
  },
  {
    id: 'unsupported_currency',
    matcher: /(unsupported currency|UnsupportedCurrency)/i,
    errorType: 'UnsupportedCurrencyError',
    category: 'currency',
    severity: 'medium',
    autoFixAvailable: false,
    fixStrategy: 'Check the currency code against the supported list',
  },
];

import { SystemError, type ErrorSeverityLevel } from './system-error.js';

/**
 * Error class for precision engine failures (code range 1000-1999).
 *
 * - 1001: Missing operand (ERROR, no retry)
 * - 1002: Division by zero (ERROR, no retry, auto-correctable)
 * - 1003: Negative radicand (ERROR, no retry)
 * - 1004: Invalid numeric literal (WARNING, auto-correctable)
 * - 1005: Unsupported operation (WARNING, no retry)
 * - 1006: Precision overflow (ERROR, auto-correctable)
 * - 1007: Invalid precision (WARNING, no retry)
 * - 1008: Undefined result, e.g. fractional power of a negative (ERROR, no retry)
 * - 1009: Malformed calculation request (WARNING, no retry)
 */
export class CalculationError extends SystemError {
  constructor(
    code: number,
    message: string,
    severity: ErrorSeverityLevel,
    metadata?: Record<string, unknown>,
  ) {
    super(code, message, severity, undefined, metadata);
  }
}

export const CALCULATION_ERROR_CODES = {
  MISSING_OPERAND: 1001,
  DIVISION_BY_ZERO: 1002,
  NEGATIVE_RADICAND: 1003,
  INVALID_NUMERIC_LITERAL: 1004,
  UNSUPPORTED_OPERATION: 1005,
  PRECISION_OVERFLOW: 1006,
  INVALID_PRECISION: 1007,
  UNDEFINED_RESULT: 1008,
  INVALID_REQUEST: 1009,
} as const;

export class MissingOperandError extends CalculationError {
  constructor(operation: string) {
    super(
      CALCULATION_ERROR_CODES.MISSING_OPERAND,
      `Operation '${operation}' requires two operands`,
      'error',
      { operation },
    );
  }
}

export class DivisionByZeroError extends CalculationError {
  constructor(dividend: string) {
    super(
      CALCULATION_ERROR_CODES.DIVISION_BY_ZERO,
      'Division by zero: divisor is exactly zero',
      'error',
      { dividend },
    );
  }
}

export class NegativeRadicandError extends CalculationError {
  constructor(radicand: string) {
    super(
      CALCULATION_ERROR_CODES.NEGATIVE_RADICAND,
      `Cannot take the square root of negative value ${radicand}`,
      'error',
      { radicand },
    );
  }
}

export class InvalidNumericLiteralError extends CalculationError {
  constructor(
    public readonly operandName: string,
    public readonly literal: string,
  ) {
    super(
      CALCULATION_ERROR_CODES.INVALID_NUMERIC_LITERAL,
      `Invalid numeric literal for ${operandName}: '${literal}'`,
      'warning',
      { operandName, literal },
    );
  }
}

export class UnsupportedOperationError extends CalculationError {
  constructor(operation: string) {
    super(
      CALCULATION_ERROR_CODES.UNSUPPORTED_OPERATION,
      `Unsupported operation: ${operation}`,
      'warning',
      { operation },
    );
  }
}

export class PrecisionOverflowError extends CalculationError {
  constructor(operation: string, precision: number) {
    super(
      CALCULATION_ERROR_CODES.PRECISION_OVERFLOW,
      `Result overflow: '${operation}' exceeds maximum representable magnitude`,
      'error',
      { operation, precision },
    );
  }
}

export class InvalidPrecisionError extends CalculationError {
  constructor(precision: number, min: number, max: number) {
    super(
      CALCULATION_ERROR_CODES.INVALID_PRECISION,
      `Precision ${precision} is outside the supported range ${min}-${max}`,
      'warning',
      { precision, min, max },
    );
  }
}

export class UndefinedResultError extends CalculationError {
  constructor(operation: string, operand1: string, operand2?: string) {
    super(
      CALCULATION_ERROR_CODES.UNDEFINED_RESULT,
      `Result of '${operation}' is undefined for the given operands`,
      'error',
      { operation, operand1, operand2 },
    );
  }
}

export class InvalidRequestError extends CalculationError {
  constructor(public readonly validationErrors: string[]) {
    super(
      CALCULATION_ERROR_CODES.INVALID_REQUEST,
      `Malformed calculation request: ${validationErrors.join('; ')}`,
      'warning',
      { validationErrors },
    );
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Decimal from 'decimal.js';

import {
  DivisionByZeroError,
  InvalidNumericLiteralError,
  MissingOperandError,
  NegativeRadicandError,
  PrecisionOverflowError,
  UndefinedResultError,
  UnsupportedOperationError,
} from '../../common/errors/index.js';
import { decimalFor, isDecimalLiteral } from './high-precision-decimal.js';
import {
  BINARY_OPERATIONS,
  DEFAULT_PRECISION,
  OPERATION_ALIASES,
  type CalculateOptions,
  type CanonicalOperation,
  type HighPrecisionValue,
} from './precision.types.js';

/**
 * Arbitrary-precision arithmetic. Stateless: every call resolves its own
 * Decimal constructor, so concurrent callers never share mutable settings.
 *
 * Every result is rounded (ROUND_HALF_EVEN) to the active number of
 * significant digits before it is returned.
 */
@Injectable()
export class PrecisionEngineService {
  private readonly logger = new Logger(PrecisionEngineService.name);
  private readonly defaultPrecision: number;

  constructor(private readonly configService: ConfigService) {
    this.defaultPrecision = Number(
      this.configService.get<string | number>(
        'PRECISION_DEFAULT',
        DEFAULT_PRECISION,
      ),
    );
    // Fail at startup rather than on the first calculation.
    decimalFor(this.defaultPrecision);
    this.logger.log({
      message: 'Precision engine ready',
      module: 'precision',
      precision: this.defaultPrecision,
    });
  }

  getDefaultPrecision(): number {
    return this.defaultPrecision;
  }

  /**
   * Validates operands first, then applies the operation.
   * Throws a CalculationError subclass on any failure.
   */
  calculate(
    operation: string,
    operand1: string,
    operand2?: string | null,
    options: CalculateOptions = {},
  ): HighPrecisionValue {
    const precision = options.precision ?? this.defaultPrecision;
    const D = decimalFor(precision);
    const op = this.resolveOperation(operation);

    const a = this.parse(operand1, 'operand1', precision);
    const b =
      operand2 !== undefined && operand2 !== null
        ? this.parse(operand2, 'operand2', precision)
        : null;

    if (BINARY_OPERATIONS.has(op) && b === null) {
      throw new MissingOperandError(op);
    }

    const raw = this.apply(op, a, b, D);

    if (raw.isNaN()) {
      throw new UndefinedResultError(op, operand1, operand2 ?? undefined);
    }
    if (!raw.isFinite()) {
      throw new PrecisionOverflowError(op, precision);
    }

    return raw.toSignificantDigits(precision, Decimal.ROUND_HALF_EVEN);
  }

  /** Maps an operation name or symbol to its canonical form. */
  resolveOperation(operation: string): CanonicalOperation {
    const key = operation.trim().toLowerCase();
    const op = Object.hasOwn(OPERATION_ALIASES, key)
      ? OPERATION_ALIASES[key]
      : undefined;
    if (!op) {
      throw new UnsupportedOperationError(operation);
    }
    return op;
  }

  /** Parses a decimal literal without rounding it. */
  parse(
    literal: string,
    operandName = 'operand',
    precision: number = this.defaultPrecision,
  ): HighPrecisionValue {
    if (!isDecimalLiteral(literal)) {
      throw new InvalidNumericLiteralError(operandName, literal);
    }
    const D = decimalFor(precision);
    return new D(literal);
  }

  isValidLiteral(literal: string): boolean {
    return isDecimalLiteral(literal);
  }

  /**
   * Display rounding to a fixed number of decimal places (ROUND_HALF_EVEN).
   * Distinct from arithmetic precision, which counts significant digits.
   */
  roundToPlaces(value: HighPrecisionValue, places: number): HighPrecisionValue {
    return value.toDecimalPlaces(places, Decimal.ROUND_HALF_EVEN);
  }

  /** Multiplies then rounds to the active precision. */
  multiply(
    a: HighPrecisionValue,
    b: HighPrecisionValue,
    precision: number = this.defaultPrecision,
  ): HighPrecisionValue {
    const D = decimalFor(precision);
    return new D(a)
      .mul(b)
      .toSignificantDigits(precision, Decimal.ROUND_HALF_EVEN);
  }

  /** Divides then rounds to the active precision. */
  divide(
    a: HighPrecisionValue,
    b: HighPrecisionValue,
    precision: number = this.defaultPrecision,
  ): HighPrecisionValue {
    if (b.isZero()) {
      throw new DivisionByZeroError(a.toString());
    }
    const D = decimalFor(precision);
    return new D(a)
      .div(b)
      .toSignificantDigits(precision, Decimal.ROUND_HALF_EVEN);
  }

  private apply(
    op: CanonicalOperation,
    a: HighPrecisionValue,
    b: HighPrecisionValue | null,
    D: Decimal.Constructor,
  ): HighPrecisionValue {
    const x = new D(a);

    switch (op) {
      case 'add':
        return x.plus(this.required(b, op));
      case 'subtract':
        return x.minus(this.required(b, op));
      case 'multiply':
        return x.mul(this.required(b, op));
      case 'divide': {
        const divisor = this.required(b, op);
        if (divisor.isZero()) {
          throw new DivisionByZeroError(a.toString());
        }
        return x.div(divisor);
      }
      case 'power':
        return x.pow(this.required(b, op));
      case 'sqrt':
        if (x.isNegative() && !x.isZero()) {
          throw new NegativeRadicandError(a.toString());
        }
        return x.sqrt();
      case 'abs':
        return x.abs();
      case 'negate':
        return x.neg();
    }
  }

  private required(
    value: HighPrecisionValue | null,
    op: CanonicalOperation,
  ): HighPrecisionValue {
    if (value === null) {
      throw new MissingOperandError(op);
    }
    return value;
  }
}

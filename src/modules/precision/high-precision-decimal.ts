import Decimal from 'decimal.js';
import { MAX_PRECISION, MIN_PRECISION } from './precision.types.js';
import { InvalidPrecisionError } from '../../common/errors/index.js';

// One isolated constructor per precision. Decimal.clone() keeps the global
// Decimal settings untouched so other modules can use decimal.js freely.
const constructors = new Map<number, Decimal.Constructor>();

export function decimalFor(precision: number): Decimal.Constructor {
  if (
    !Number.isInteger(precision) ||
    precision < MIN_PRECISION ||
    precision > MAX_PRECISION
  ) {
    throw new InvalidPrecisionError(precision, MIN_PRECISION, MAX_PRECISION);
  }

  let ctor = constructors.get(precision);
  if (!ctor) {
    ctor = Decimal.clone({
      precision,
      rounding: Decimal.ROUND_HALF_EVEN,
      toExpNeg: -18,
      toExpPos: 60,
    });
    constructors.set(precision, ctor);
  }
  return ctor;
}

// Sign, digits with optional fraction (or a bare fraction), optional exponent.
// Rejects whitespace, thousands separators, NaN, Infinity and hex/binary forms
// that the Decimal constructor would otherwise accept.
const DECIMAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function isDecimalLiteral(literal: string): boolean {
  return DECIMAL_LITERAL.test(literal);
}

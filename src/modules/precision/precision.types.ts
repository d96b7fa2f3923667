import type Decimal from 'decimal.js';

/**
 * Immutable arbitrary-precision decimal. decimal.js instances never mutate,
 * so the engine hands them out directly.
 */
export type HighPrecisionValue = Decimal;

export type CanonicalOperation =
  | 'add'
  | 'subtract'
  | 'multiply'
  | 'divide'
  | 'power'
  | 'sqrt'
  | 'abs'
  | 'negate';

export const BINARY_OPERATIONS: ReadonlySet<CanonicalOperation> = new Set([
  'add',
  'subtract',
  'multiply',
  'divide',
  'power',
]);

/** Accepted spellings, lower-cased, mapped to the canonical operation. */
export const OPERATION_ALIASES: Readonly<Record<string, CanonicalOperation>> =
  {
    add: 'add',
    '+': 'add',
    subtract: 'subtract',
    '-': 'subtract',
    multiply: 'multiply',
    '*': 'multiply',
    divide: 'divide',
    '/': 'divide',
    power: 'power',
    '**': 'power',
    '^': 'power',
    sqrt: 'sqrt',
    square_root: 'sqrt',
    abs: 'abs',
    absolute: 'abs',
    negate: 'negate',
    negative: 'negate',
  };

export interface CalculateOptions {
  /** Significant digits for this call; falls back to the engine default. */
  precision?: number;
}

export const MIN_PRECISION = 1;
export const MAX_PRECISION = 1000;
export const DEFAULT_PRECISION = 60;

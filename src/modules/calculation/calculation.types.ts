import type { ErrorSeverityLevel } from '../../common/errors/index.js';
import type { RateMetadata } from '../../common/types/index.js';
import type { ErrorCategory, HealingResult } from '../healing/healing.types.js';

export interface CalculateCallOptions {
  signal?: AbortSignal;
  /** Aborts rate lookups still in flight after this many milliseconds. */
  timeoutMs?: number;
}

export interface CalculationMetadata {
  calculationId: string;
  operation: string;
  precision: number;
  currencyFrom: string;
  currencyTo: string;
  /** Engine result before currency conversion. */
  rawResult: string;
  exchangeRate?: string;
  rate?: RateMetadata;
  processingTimeMs: number;
  timestamp: Date;
}

export interface SerializedError {
  /** SystemError code; null for errors raised outside the core. */
  code: number | null;
  type: string;
  message: string;
  category: ErrorCategory;
  severity: ErrorSeverityLevel;
}

export interface CalculationSuccess {
  success: true;
  result: string;
  metadata: CalculationMetadata;
}

export interface CalculationFailure {
  success: false;
  calculationId: string;
  error: SerializedError;
  /** Null when the calculation was cancelled; cancellations skip healing. */
  healingResult: HealingResult | null;
  /** Result of the single retry on healing's corrected data. */
  retriedResult?: string;
  retriedMetadata?: CalculationMetadata;
  /** Why the retry on corrected data failed too. */
  retryError?: SerializedError;
}

export type CalculationOutcome = CalculationSuccess | CalculationFailure;

export interface CalculationMetrics {
  calculationsPerformed: number;
  errorsEncountered: number;
  successRatio: number;
  uptimeSeconds: number;
  calculationsPerSecond: number;
  precision: number;
}

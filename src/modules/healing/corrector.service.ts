import { Injectable, Logger } from '@nestjs/common';

import { toError } from '../../common/errors/index.js';
import { PrecisionEngineService } from '../precision/precision-engine.service.js';
import type {
  CorrectionOutcome,
  CorrectionResult,
  ErrorPattern,
  HealingContext,
} from './healing.types.js';

type Correction = (context: HealingContext) => CorrectionResult;

export const DIVISION_EPSILON = '1e-60';
export const OVERFLOW_PRECISION = 40;
export const CACHED_RATE_MAX_AGE_SECONDS = 3600;

const NUMERIC_RUN = /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;

/**
 * Auto-fix keyed by pattern id. Only auto-fixable patterns with a
 * correction here are attempted; the first success wins.
 */
@Injectable()
export class CorrectorService {
  private readonly logger = new Logger(CorrectorService.name);
  private readonly corrections: ReadonlyMap<string, Correction>;
  private totalAttempts = 0;
  private successfulCorrections = 0;
  private failedCorrections = 0;

  constructor(private readonly engine: PrecisionEngineService) {
    const cachedFallback: Correction = () => ({
      success: true,
      correctionType: 'cached_fallback',
      correctedData: {
        useCache: true,
        cacheMaxAgeSeconds: CACHED_RATE_MAX_AGE_SECONDS,
      },
      explanation: 'Serving a cached exchange rate up to one hour old',
    });

    this.corrections = new Map<string, Correction>([
      ['div_by_zero', (context) => this.correctDivisionByZero(context)],
      ['invalid_decimal', (context) => this.correctInvalidDecimal(context)],
      [
        'overflow',
        () => ({
          success: true,
          correctionType: 'precision_adjustment',
          correctedData: { precisionOverride: OVERFLOW_PRECISION },
          explanation: `Reduced precision to ${OVERFLOW_PRECISION} significant digits`,
        }),
      ],
      ['network_timeout', cachedFallback],
      ['providers_exhausted', cachedFallback],
      [
        'cache_unavailable',
        () => ({
          success: true,
          correctionType: 'memory_fallback',
          correctedData: {
            useCache: true,
            cacheMaxAgeSeconds: CACHED_RATE_MAX_AGE_SECONDS,
          },
          explanation: 'Reading rates from the in-process cache only',
        }),
      ],
    ]);
  }

  hasCorrection(patternId: string): boolean {
    return this.corrections.has(patternId);
  }

  correct(patterns: ErrorPattern[], context: HealingContext): CorrectionOutcome {
    const outcome: CorrectionOutcome = {
      success: false,
      attempted: [],
      succeeded: [],
      failed: [],
    };

    for (const pattern of patterns) {
      const correction = this.corrections.get(pattern.id);
      if (!pattern.autoFixAvailable || !correction) continue;

      this.totalAttempts++;
      outcome.attempted.push(pattern.id);

      let result: CorrectionResult;
      try {
        result = correction(context);
      } catch (error) {
        result = { success: false, reason: toError(error).message };
        this.logger.warn({
          message: 'Correction strategy threw',
          module: 'healing',
          patternId: pattern.id,
          error: result.reason,
        });
      }

      if (result.success) {
        this.successfulCorrections++;
        outcome.succeeded.push({ patternId: pattern.id, correction: result });
        outcome.correctedData = result.correctedData;
        outcome.success = true;
        break;
      }
      this.failedCorrections++;
      outcome.failed.push({
        patternId: pattern.id,
        reason: result.reason ?? 'Unknown failure',
      });
    }

    return outcome;
  }

  getStats(): {
    totalAttempts: number;
    successfulCorrections: number;
    failedCorrections: number;
  } {
    return {
      totalAttempts: this.totalAttempts,
      successfulCorrections: this.successfulCorrections,
      failedCorrections: this.failedCorrections,
    };
  }

  private correctDivisionByZero(context: HealingContext): CorrectionResult {
    const divisor = context.operand2;
    if (
      typeof divisor === 'string' &&
      this.engine.isValidLiteral(divisor) &&
      this.engine.parse(divisor, 'operand2').isZero()
    ) {
      return {
        success: true,
        correctionType: 'epsilon_replacement',
        originalValue: divisor,
        correctedData: { operand2: DIVISION_EPSILON },
        explanation: 'Replaced zero divisor with epsilon value',
      };
    }
    return { success: false, reason: 'No zero divisor found' };
  }

  private correctInvalidDecimal(context: HealingContext): CorrectionResult {
    const correctedData: { operand1?: string; operand2?: string } = {};

    for (const key of ['operand1', 'operand2'] as const) {
      const value = context[key];
      if (typeof value !== 'string' || this.engine.isValidLiteral(value)) {
        continue;
      }
      const sanitized = sanitizeLiteral(value);
      if (sanitized !== null && this.engine.isValidLiteral(sanitized)) {
        correctedData[key] = sanitized;
      }
    }

    if (Object.keys(correctedData).length === 0) {
      return { success: false, reason: 'Could not sanitize decimal input' };
    }
    return {
      success: true,
      correctionType: 'input_sanitization',
      correctedData,
      explanation: 'Cleaned and validated decimal input format',
    };
  }
}

/**
 * Normalizes separators, then keeps the first numeric run.
 * "1,5" -> "1.5", "1,234.56" -> "1234.56", "12a" -> "12".
 */
export function sanitizeLiteral(value: string): string | null {
  let text = value.trim().replace(/[\s_']/g, '');
  const commas = (text.match(/,/g) ?? []).length;
  if (commas > 0) {
    text =
      commas === 1 && !text.includes('.')
        ? text.replace(',', '.')
        : text.replace(/,/g, '');
  }
  text = text.replace(/[^0-9.eE+-]/g, '');
  const match = NUMERIC_RUN.exec(text);
  return match ? match[0] : null;
}

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { toError } from '../../common/errors/index.js';
import { delay } from '../../common/utils/index.js';
import type {
  ErrorPattern,
  HealingContext,
  MitigationOutcome,
  StrategyResult,
} from './healing.types.js';

/**
 * Category-keyed mitigation. Strategies are tried in pattern order and the
 * first successful one ends the stage. Only the network strategy suspends
 * (backoff wait); the others report what to do without doing it.
 */
@Injectable()
export class MitigatorService {
  private readonly logger = new Logger(MitigatorService.name);
  private readonly retryCounts = new Map<string, number>();
  private readonly backoffBaseMs: number;
  private readonly maxNetworkRetries: number;

  constructor(private readonly configService: ConfigService) {
    this.backoffBaseMs = Number(
      this.configService.get<string | number>('HEALING_BACKOFF_BASE_MS', 1000),
    );
    this.maxNetworkRetries = Number(
      this.configService.get<string | number>('HEALING_MAX_NETWORK_RETRIES', 3),
    );
  }

  async mitigate(
    patterns: ErrorPattern[],
    context: HealingContext,
    signal?: AbortSignal,
  ): Promise<MitigationOutcome> {
    const outcome: MitigationOutcome = {
      success: false,
      fallbackUsed: false,
      strategiesApplied: [],
      errors: [],
    };

    for (const pattern of patterns) {
      let result: StrategyResult;
      try {
        result = await this.applyStrategy(pattern, context, signal);
      } catch (error) {
        const message = toError(error).message;
        outcome.errors.push(`${pattern.id}: ${message}`);
        this.logger.warn({
          message: 'Mitigation strategy failed',
          module: 'healing',
          patternId: pattern.id,
          error: message,
        });
        if (signal?.aborted) break;
        continue;
      }

      outcome.strategiesApplied.push({
        patternId: pattern.id,
        fixStrategy: pattern.fixStrategy,
        result,
      });
      if (result.fallbackUsed) {
        outcome.fallbackUsed = true;
      }
      if (result.success) {
        outcome.success = true;
        break;
      }
    }

    return outcome;
  }

  /** Attempts made so far for an endpoint. */
  getRetryCount(endpoint: string): number {
    return this.retryCounts.get(endpoint) ?? 0;
  }

  private applyStrategy(
    pattern: ErrorPattern,
    context: HealingContext,
    signal?: AbortSignal,
  ): Promise<StrategyResult> | StrategyResult {
    switch (pattern.category) {
      case 'network':
        return this.mitigateNetwork(context, signal);
      case 'calculation':
        return pattern.id === 'div_by_zero'
          ? {
              success: true,
              strategy: 'epsilon_replacement',
              suggestion: 'Replace the zero divisor with a small epsilon value',
            }
          : { success: false, reason: 'No specific mitigation available' };
      case 'precision':
        return {
          success: true,
          strategy: 'adaptive_precision',
          suggestion: 'Reduce precision or break into smaller calculations',
        };
      case 'validation':
        return {
          success: true,
          strategy: 'input_sanitization',
          suggestion: 'Strip whitespace, normalize separators, re-validate',
        };
      case 'cache':
        return {
          success: true,
          strategy: 'memory_fallback',
          suggestion: 'Use the in-memory cache as fallback',
          fallbackUsed: true,
        };
      case 'database':
        return {
          success: true,
          strategy: 'connection_refresh',
          suggestion: 'Refresh the connection and retry',
        };
      case 'currency':
        return pattern.autoFixAvailable
          ? {
              success: true,
              strategy: 'stale_rate_fallback',
              suggestion: 'Serve a recently cached rate',
              fallbackUsed: true,
            }
          : { success: false, reason: 'Currency pair cannot be served' };
      case 'system':
        return { success: false, reason: 'No mitigation strategy for system errors' };
    }
  }

  /** Waits base × 2^attempt per endpoint, then falls back once exhausted. */
  private async mitigateNetwork(
    context: HealingContext,
    signal?: AbortSignal,
  ): Promise<StrategyResult> {
    const endpoint = context.endpoint ?? 'unknown';
    const attempts = this.getRetryCount(endpoint);

    if (attempts >= this.maxNetworkRetries) {
      return {
        success: true,
        strategy: 'fallback_mechanism',
        suggestion: 'Use cached data or an alternative endpoint',
        fallbackUsed: true,
      };
    }

    const attempt = attempts + 1;
    this.retryCounts.set(endpoint, attempt);
    const delayMs = this.backoffBaseMs * 2 ** attempt;
    await delay(delayMs, signal);

    return {
      success: true,
      strategy: 'exponential_backoff_retry',
      suggestion: `Retry ${attempt}/${this.maxNetworkRetries} with backoff`,
      attempt,
      delayMs,
    };
  }
}

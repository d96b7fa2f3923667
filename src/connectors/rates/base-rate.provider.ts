import { Logger } from '@nestjs/common';

import type { IRateProvider } from '../../common/interfaces/index.js';
import type {
  ProviderRate,
  ProviderStats,
  RateMetadata,
} from '../../common/types/index.js';
import { RateProviderError, toError } from '../../common/errors/index.js';
import { abortReason } from '../../common/utils/index.js';
import type { PrecisionEngineService } from '../../modules/precision/precision-engine.service.js';
import type { HighPrecisionValue } from '../../modules/precision/precision.types.js';

export interface RawProviderRate {
  rate: HighPrecisionValue;
  extra?: Partial<RateMetadata>;
}

/**
 * Shared bookkeeping for every provider: the same-currency shortcut,
 * request/error counters, response timing and error normalization.
 * Subclasses implement only `fetchRate`.
 */
export abstract class BaseRateProvider implements IRateProvider {
  protected readonly logger: Logger;
  private requestCount = 0;
  private errorCount = 0;
  private avgResponseTimeMs = 0;
  private lastUpdate: Date | null = null;

  protected constructor(
    public readonly name: string,
    protected readonly engine: PrecisionEngineService,
  ) {
    this.logger = new Logger(`${name}Provider`);
  }

  protected abstract fetchRate(
    from: string,
    to: string,
    signal?: AbortSignal,
  ): Promise<RawProviderRate>;

  async fetch(
    from: string,
    to: string,
    signal?: AbortSignal,
  ): Promise<ProviderRate> {
    if (from === to) {
      return {
        rate: this.engine.parse('1'),
        metadata: { source: this.name, timestamp: new Date(), responseTimeMs: 0 },
      };
    }

    this.requestCount++;
    const startedAt = performance.now();

    try {
      const { rate, extra } = await this.fetchRate(from, to, signal);
      if (!rate.isFinite() || rate.lte(0)) {
        throw new RateProviderError(
          this.name,
          `non-positive rate ${rate.toString()} for ${from}/${to}`,
        );
      }

      const responseTimeMs = performance.now() - startedAt;
      this.avgResponseTimeMs =
        this.avgResponseTimeMs === 0
          ? responseTimeMs
          : (this.avgResponseTimeMs + responseTimeMs) / 2;
      this.lastUpdate = new Date();

      return {
        rate,
        metadata: {
          ...extra,
          source: this.name,
          timestamp: this.lastUpdate,
          responseTimeMs,
        },
      };
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      this.errorCount++;
      const failure =
        error instanceof RateProviderError
          ? error
          : new RateProviderError(this.name, toError(error).message);
      this.logger.debug({
        message: 'Rate fetch failed',
        module: 'rate-providers',
        from,
        to,
        error: failure.message,
      });
      throw failure;
    }
  }

  getStats(): ProviderStats {
    return {
      name: this.name,
      requests: this.requestCount,
      errors: this.errorCount,
      successRate:
        (this.requestCount - this.errorCount) / Math.max(this.requestCount, 1),
      avgResponseTimeMs: this.avgResponseTimeMs,
      lastUpdate: this.lastUpdate,
    };
  }
}

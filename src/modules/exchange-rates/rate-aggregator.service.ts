import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';

import type { IRateProvider } from '../../common/interfaces/index.js';
import type {
  ConversionResult,
  ExchangeRate,
  RateAggregatorStats,
  RateMetadata,
} from '../../common/types/index.js';
import {
  AllProvidersExhaustedError,
  CancelledError,
  UnsupportedCurrencyError,
  toError,
} from '../../common/errors/index.js';
import { abortReason } from '../../common/utils/index.js';
import { EVENT_NAMES } from '../../common/events/event-catalog.js';
import {
  RateCacheClearedEvent,
  RateFetchedEvent,
  RateProviderFailedEvent,
} from '../../common/events/rate.events.js';
import { RATE_PROVIDERS_TOKEN } from '../../connectors/connector.constants.js';
import { PrecisionEngineService } from '../precision/precision-engine.service.js';
import type { HighPrecisionValue } from '../precision/precision.types.js';
import { CurrencyRegistryService } from './currency-registry.service.js';

// Pivot for cross rates derived from cached legs.
const CROSS_CURRENCY = 'USD';

export interface GetRateOptions {
  forceRefresh?: boolean;
  signal?: AbortSignal;
  /**
   * Accept a cached entry up to this age instead of the TTL. Entries older
   * than the TTL come back flagged `staleAllowed`.
   */
  maxAgeMs?: number;
  /** Serve from the cache only; a miss fails without calling providers. */
  cacheOnly?: boolean;
}

interface CachedRate {
  rate: HighPrecisionValue;
  metadata: RateMetadata;
  fetchedAt: number;
}

/**
 * Ordered-provider rate lookup with a TTL cache.
 *
 * Providers are tried in list order and the first success wins. The cache
 * only bounds the call rate: an entry past its TTL is never served unless
 * the caller explicitly widens the window via `maxAgeMs`.
 */
@Injectable()
export class RateAggregatorService {
  private readonly logger = new Logger(RateAggregatorService.name);
  private readonly cache = new Map<string, CachedRate>();
  private readonly ttlMs: number;

  private totalRequests = 0;
  private cacheHits = 0;
  private cacheMisses = 0;
  private successfulLookups = 0;
  private failedLookups = 0;
  private derivedRates = 0;
  private readonly providerFailures = new Map<string, number>();

  constructor(
    @Inject(RATE_PROVIDERS_TOKEN)
    private readonly providers: IRateProvider[],
    private readonly currencies: CurrencyRegistryService,
    private readonly engine: PrecisionEngineService,
    private readonly configService: ConfigService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.ttlMs =
      Number(this.configService.get<string | number>('RATE_CACHE_TTL_SECONDS', 300)) *
      1000;
  }

  async getRate(
    fromCode: string,
    toCode: string,
    options: GetRateOptions = {},
  ): Promise<ExchangeRate> {
    const from = fromCode.trim().toUpperCase();
    const to = toCode.trim().toUpperCase();
    this.totalRequests++;

    if (from === to) {
      this.successfulLookups++;
      return {
        from,
        to,
        rate: this.engine.parse('1'),
        metadata: { source: 'internal', timestamp: new Date(), sameCurrency: true },
      };
    }

    if (!this.currencies.isSupported(from) || !this.currencies.isSupported(to)) {
      this.failedLookups++;
      throw new UnsupportedCurrencyError(from, to);
    }

    const { signal } = options;
    if (signal?.aborted) {
      this.failedLookups++;
      throw new CancelledError(abortReason(signal).message);
    }

    if (!options.forceRefresh) {
      const cached = this.fromCache(from, to, options.maxAgeMs ?? this.ttlMs);
      if (cached) {
        this.cacheHits++;
        this.successfulLookups++;
        return cached;
      }
      this.cacheMisses++;
    }

    if (options.cacheOnly) {
      this.failedLookups++;
      const window = Math.round((options.maxAgeMs ?? this.ttlMs) / 1000);
      throw new AllProvidersExhaustedError(from, to, [
        `no cached rate within ${window}s`,
      ]);
    }

    return this.fetchFromProviders(from, to, signal);
  }

  /** Multiplies by the rate, then rounds to the target's display places. */
  async convert(
    amount: string,
    fromCode: string,
    toCode: string,
    options: GetRateOptions = {},
  ): Promise<ConversionResult> {
    const value = this.engine.parse(amount.trim(), 'amount');
    const exchangeRate = await this.getRate(fromCode, toCode, options);
    const places = this.currencies.decimalPlaces(exchangeRate.to);
    const converted = this.engine.roundToPlaces(
      this.engine.multiply(value, exchangeRate.rate),
      places,
    );

    return {
      originalAmount: value.toString(),
      convertedAmount: converted.toFixed(places),
      from: exchangeRate.from,
      to: exchangeRate.to,
      exchangeRate: exchangeRate.rate.toString(),
      metadata: exchangeRate.metadata,
    };
  }

  /** Rates from `base` to each target; failed targets are omitted. */
  async getRates(
    base: string,
    targets: string[],
    options: GetRateOptions = {},
  ): Promise<Record<string, ExchangeRate>> {
    const rates: Record<string, ExchangeRate> = {};
    const results = await Promise.allSettled(
      targets.map((target) => this.getRate(base, target, options)),
    );
    results.forEach((result, index) => {
      const target = targets[index];
      if (result.status === 'fulfilled' && target !== undefined) {
        rates[target.trim().toUpperCase()] = result.value;
      } else if (result.status === 'rejected') {
        this.logger.debug({
          message: 'Rate omitted from batch',
          module: 'exchange-rates',
          base,
          target,
          error: toError(result.reason).message,
        });
      }
    });
    return rates;
  }

  /** Pairwise rate strings; a pair that cannot be resolved maps to null. */
  async getCurrencyMatrix(
    codes: string[],
    options: GetRateOptions = {},
  ): Promise<Record<string, Record<string, string | null>>> {
    const matrix: Record<string, Record<string, string | null>> = {};
    for (const fromCode of codes) {
      const from = fromCode.trim().toUpperCase();
      const row: Record<string, string | null> = {};
      for (const toCode of codes) {
        const to = toCode.trim().toUpperCase();
        row[to] = await this.getRate(from, to, options).then(
          (rate) => rate.rate.toString(),
          (error: unknown) => {
            if (error instanceof CancelledError) throw error;
            return null;
          },
        );
      }
      matrix[from] = row;
    }
    return matrix;
  }

  clearCache(): number {
    const removed = this.cache.size;
    this.cache.clear();
    this.logger.log({
      message: 'Rate cache cleared',
      module: 'exchange-rates',
      entriesRemoved: removed,
    });
    this.eventEmitter.emit(
      EVENT_NAMES.RATE_CACHE_CLEARED,
      new RateCacheClearedEvent(removed),
    );
    return removed;
  }

  getStats(): RateAggregatorStats {
    return {
      totalRequests: this.totalRequests,
      cacheHits: this.cacheHits,
      cacheMisses: this.cacheMisses,
      successfulLookups: this.successfulLookups,
      failedLookups: this.failedLookups,
      derivedRates: this.derivedRates,
      providerFailures: Object.fromEntries(this.providerFailures),
      cacheSize: this.cache.size,
      providers: this.providers.map((provider) => provider.getStats()),
    };
  }

  private async fetchFromProviders(
    from: string,
    to: string,
    signal?: AbortSignal,
  ): Promise<ExchangeRate> {
    const failures: string[] = [];

    for (const [index, provider] of this.providers.entries()) {
      try {
        const { rate, metadata } = await provider.fetch(from, to, signal);
        this.cache.set(cacheKey(from, to), {
          rate,
          metadata,
          fetchedAt: Date.now(),
        });
        this.successfulLookups++;
        this.eventEmitter.emit(
          EVENT_NAMES.RATE_FETCHED,
          new RateFetchedEvent(
            from,
            to,
            rate.toString(),
            metadata.source,
            metadata.responseTimeMs,
          ),
        );
        return { from, to, rate, metadata };
      } catch (error) {
        if (signal?.aborted) {
          this.failedLookups++;
          throw new CancelledError(abortReason(signal).message);
        }
        const reason = toError(error).message;
        failures.push(reason);
        this.providerFailures.set(
          provider.name,
          (this.providerFailures.get(provider.name) ?? 0) + 1,
        );
        this.logger.warn({
          message: 'Rate provider failed',
          module: 'exchange-rates',
          provider: provider.name,
          from,
          to,
          error: reason,
        });
        this.eventEmitter.emit(
          EVENT_NAMES.RATE_PROVIDER_FAILED,
          new RateProviderFailedEvent(provider.name, from, to, reason, index + 1),
        );
      }
    }

    const derived = this.deriveFromCache(from, to);
    if (derived) {
      this.derivedRates++;
      this.successfulLookups++;
      return derived;
    }

    this.failedLookups++;
    throw new AllProvidersExhaustedError(from, to, failures);
  }

  private fromCache(
    from: string,
    to: string,
    maxAgeMs: number,
  ): ExchangeRate | null {
    const entry = this.cache.get(cacheKey(from, to));
    if (!entry) return null;

    const ageMs = Date.now() - entry.fetchedAt;
    if (ageMs >= maxAgeMs) return null;

    return {
      from,
      to,
      rate: entry.rate,
      metadata: {
        ...entry.metadata,
        fromCache: true,
        cacheAgeSeconds: ageMs / 1000,
        ...(ageMs >= this.ttlMs && { staleAllowed: true }),
      },
    };
  }

  /** Inverse of a fresh reverse entry, else a cross through fresh USD legs. */
  private deriveFromCache(from: string, to: string): ExchangeRate | null {
    const one = this.engine.parse('1');

    const reverse = this.fresh(to, from);
    if (reverse) {
      return {
        from,
        to,
        rate: this.engine.divide(one, reverse.rate),
        metadata: {
          source: reverse.metadata.source,
          timestamp: new Date(),
          derivation: 'inverse',
        },
      };
    }

    const fromLeg = this.freshLeg(from, CROSS_CURRENCY);
    const toLeg = this.freshLeg(to, CROSS_CURRENCY);
    if (fromLeg && toLeg) {
      return {
        from,
        to,
        rate: this.engine.divide(fromLeg.rate, toLeg.rate),
        metadata: {
          source: `${fromLeg.source}+${toLeg.source}`,
          timestamp: new Date(),
          derivation: 'cross',
        },
      };
    }
    return null;
  }

  private fresh(from: string, to: string): CachedRate | null {
    const entry = this.cache.get(cacheKey(from, to));
    return entry && Date.now() - entry.fetchedAt < this.ttlMs ? entry : null;
  }

  /** X in USD, read directly or inverted from USD/X. */
  private freshLeg(
    code: string,
    pivot: string,
  ): { rate: HighPrecisionValue; source: string } | null {
    if (code === pivot) {
      return { rate: this.engine.parse('1'), source: 'internal' };
    }
    const direct = this.fresh(code, pivot);
    if (direct) {
      return { rate: direct.rate, source: direct.metadata.source };
    }
    const inverse = this.fresh(pivot, code);
    if (inverse) {
      return {
        rate: this.engine.divide(this.engine.parse('1'), inverse.rate),
        source: inverse.metadata.source,
      };
    }
    return null;
  }
}

function cacheKey(from: string, to: string): string {
  return `${from}_${to}`;
}

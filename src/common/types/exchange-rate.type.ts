import type { HighPrecisionValue } from '../../modules/precision/precision.types.js';

export interface RateMetadata {
  source: string;
  timestamp: Date;
  responseTimeMs?: number;
  sameCurrency?: boolean;
  fromCache?: boolean;
  cacheAgeSeconds?: number;
  /** Set when healing explicitly accepted a cache entry older than the TTL. */
  staleAllowed?: boolean;
  /** Rate computed from other cached rates instead of fetched. */
  derivation?: 'inverse' | 'cross';
  inverted?: boolean;
  mockData?: boolean;
  baseCurrency?: string;
  providerTimestamp?: string;
}

export interface ExchangeRate {
  from: string;
  to: string;
  rate: HighPrecisionValue;
  metadata: RateMetadata;
}

export interface ProviderRate {
  rate: HighPrecisionValue;
  metadata: RateMetadata;
}

export interface ProviderStats {
  name: string;
  requests: number;
  errors: number;
  successRate: number;
  avgResponseTimeMs: number;
  lastUpdate: Date | null;
}

export interface ConversionResult {
  originalAmount: string;
  convertedAmount: string;
  from: string;
  to: string;
  exchangeRate: string;
  metadata: RateMetadata;
}

export interface RateAggregatorStats {
  totalRequests: number;
  cacheHits: number;
  cacheMisses: number;
  successfulLookups: number;
  failedLookups: number;
  derivedRates: number;
  providerFailures: Record<string, number>;
  cacheSize: number;
  providers: ProviderStats[];
}

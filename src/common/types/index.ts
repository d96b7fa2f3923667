export type { Currency, CurrencyKind } from './currency.type.js';
export type {
  ConversionResult,
  ExchangeRate,
  ProviderRate,
  ProviderStats,
  RateAggregatorStats,
  RateMetadata,
} from './exchange-rate.type.js';

export { AppModule } from './app.module.js';

export { PrecisionModule } from './modules/precision/precision.module.js';
export { PrecisionEngineService } from './modules/precision/precision-engine.service.js';
export type {
  CalculateOptions,
  CanonicalOperation,
  HighPrecisionValue,
} from './modules/precision/precision.types.js';

export { ExchangeRatesModule } from './modules/exchange-rates/exchange-rates.module.js';
export { RateAggregatorService } from './modules/exchange-rates/rate-aggregator.service.js';
export type { GetRateOptions } from './modules/exchange-rates/rate-aggregator.service.js';
export { CurrencyRegistryService } from './modules/exchange-rates/currency-registry.service.js';

export { ConnectorModule } from './connectors/connector.module.js';
export { HTTP_CLIENT_TOKEN, RATE_PROVIDERS_TOKEN } from './connectors/connector.constants.js';
export { BaseRateProvider } from './connectors/rates/base-rate.provider.js';

export { HealingModule } from './modules/healing/healing.module.js';
export { HealingOrchestratorService } from './modules/healing/healing-orchestrator.service.js';
export { ErrorPatternRegistryService } from './modules/healing/error-pattern-registry.service.js';
export type {
  ErrorCategory,
  ErrorPattern,
  ErrorPatternDefinition,
  HealingContext,
  HealingResult,
  HealingStatus,
  PatternSeverity,
} from './modules/healing/healing.types.js';

export { CalculationModule } from './modules/calculation/calculation.module.js';
export { CalculationService } from './modules/calculation/calculation.service.js';
export { CalculationRequestDto } from './modules/calculation/dto/calculation-request.dto.js';
export type { CalculationRequest } from './modules/calculation/dto/calculation-request.dto.js';
export type {
  CalculateCallOptions,
  CalculationFailure,
  CalculationMetadata,
  CalculationMetrics,
  CalculationOutcome,
  CalculationSuccess,
  SerializedError,
} from './modules/calculation/calculation.types.js';

export * from './common/errors/index.js';
export { EVENT_NAMES } from './common/events/event-catalog.js';
export type { EventName } from './common/events/event-catalog.js';
export * from './common/events/rate.events.js';
export * from './common/events/healing.events.js';
export * from './common/events/calculation.events.js';
export { withCorrelationId, getCorrelationId } from './common/services/correlation-context.js';
export type * from './common/types/index.js';
export type * from './common/interfaces/index.js';

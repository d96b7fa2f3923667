import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { v4 as uuidv4 } from 'uuid';

import {
  CalculationError,
  CancelledError,
  InvalidRequestError,
  RateError,
  SystemError,
  toError,
} from '../../common/errors/index.js';
import { flattenValidationErrors } from '../../common/config/yaml-config.loader.js';
import { withCorrelationId } from '../../common/services/correlation-context.js';
import { EVENT_NAMES } from '../../common/events/event-catalog.js';
import {
  CalculationCompletedEvent,
  CalculationFailedEvent,
} from '../../common/events/calculation.events.js';
import type {
  ConversionResult,
  Currency,
  ExchangeRate,
  RateMetadata,
} from '../../common/types/index.js';
import { PrecisionEngineService } from '../precision/precision-engine.service.js';
import { RateAggregatorService } from '../exchange-rates/rate-aggregator.service.js';
import type { GetRateOptions } from '../exchange-rates/rate-aggregator.service.js';
import { CurrencyRegistryService } from '../exchange-rates/currency-registry.service.js';
import { HealingOrchestratorService } from '../healing/healing-orchestrator.service.js';
import { ErrorPatternRegistryService } from '../healing/error-pattern-registry.service.js';
import type {
  CorrectedData,
  ErrorCategory,
  HealingContext,
  HealingResult,
  HealingStatus,
} from '../healing/healing.types.js';
import {
  CalculationRequestDto,
  type CalculationRequest,
} from './dto/calculation-request.dto.js';
import type {
  CalculateCallOptions,
  CalculationFailure,
  CalculationMetadata,
  CalculationMetrics,
  CalculationOutcome,
  CalculationSuccess,
  SerializedError,
} from './calculation.types.js';

/**
 * Entry point of the core: operation + operands + currency pair in, outcome
 * out. Engine and aggregator failures never escape; they are healed and
 * reported as `{ success: false, error, healingResult }`.
 */
@Injectable()
export class CalculationService {
  private readonly logger = new Logger(CalculationService.name);
  private readonly startedAt = Date.now();
  private calculationsPerformed = 0;
  private errorsEncountered = 0;

  constructor(
    private readonly engine: PrecisionEngineService,
    private readonly rates: RateAggregatorService,
    private readonly currencies: CurrencyRegistryService,
    private readonly healing: HealingOrchestratorService,
    private readonly patterns: ErrorPatternRegistryService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  calculate(
    request: CalculationRequest,
    options: CalculateCallOptions = {},
  ): Promise<CalculationOutcome> {
    return withCorrelationId(() => this.run(request, options));
  }

  async getRate(
    from: string,
    to: string,
    forceRefresh = false,
  ): Promise<{ rate: string; metadata: RateMetadata }> {
    const exchangeRate = await this.rates.getRate(from, to, { forceRefresh });
    return { rate: exchangeRate.rate.toString(), metadata: exchangeRate.metadata };
  }

  getSupportedCurrencies(activeOnly = true): Currency[] {
    return this.currencies.list(activeOnly);
  }

  convert(
    amount: string,
    from: string,
    to: string,
    options: GetRateOptions = {},
  ): Promise<ConversionResult> {
    return this.rates.convert(amount, from, to, options);
  }

  getCurrencyMatrix(
    codes: string[],
  ): Promise<Record<string, Record<string, string | null>>> {
    return this.rates.getCurrencyMatrix(codes);
  }

  clearRateCache(): number {
    return this.rates.clearCache();
  }

  getMetrics(): CalculationMetrics {
    const uptimeSeconds = (Date.now() - this.startedAt) / 1000;
    return {
      calculationsPerformed: this.calculationsPerformed,
      errorsEncountered: this.errorsEncountered,
      successRatio:
        (this.calculationsPerformed - this.errorsEncountered) /
        Math.max(this.calculationsPerformed, 1),
      uptimeSeconds,
      calculationsPerSecond:
        uptimeSeconds > 0 ? this.calculationsPerformed / uptimeSeconds : 0,
      precision: this.engine.getDefaultPrecision(),
    };
  }

  getHealingStatus(): HealingStatus {
    return this.healing.getStatus();
  }

  setHealingActive(active: boolean): void {
    this.healing.setActive(active);
  }

  private async run(
    request: CalculationRequest,
    options: CalculateCallOptions,
  ): Promise<CalculationOutcome> {
    const calculationId = uuidv4();
    this.calculationsPerformed++;
    let signal: AbortSignal | undefined;

    try {
      signal = this.combineSignals(options);
      const success = await this.execute(calculationId, request, {}, signal);
      this.eventEmitter.emit(
        EVENT_NAMES.CALCULATION_COMPLETED,
        new CalculationCompletedEvent(
          calculationId,
          success.metadata.operation,
          success.result,
          success.metadata.currencyFrom,
          success.metadata.currencyTo,
          success.metadata.processingTimeMs,
        ),
      );
      return success;
    } catch (error) {
      this.errorsEncountered++;
      return this.handleFailure(calculationId, request, error, signal);
    }
  }

  private async handleFailure(
    calculationId: string,
    request: CalculationRequest,
    error: unknown,
    signal: AbortSignal | undefined,
  ): Promise<CalculationFailure> {
    if (error instanceof CancelledError || signal?.aborted) {
      const cancelled =
        error instanceof CancelledError
          ? error
          : new CancelledError(toError(signal?.reason).message);
      const failure = this.fail(calculationId, request, cancelled, null);
      this.emitFailure(failure, request, false);
      return failure;
    }

    const healingResult = await this.healing.heal(
      error,
      this.healingContext(request),
      { signal },
    );
    const failure = this.fail(calculationId, request, error, healingResult);

    const corrected = healingResult.correctionApplied
      ? healingResult.correctedData
      : undefined;
    if (!corrected) {
      this.emitFailure(failure, request, false);
      return failure;
    }

    try {
      const retried = await this.execute(
        calculationId,
        { ...request, ...this.correctedRequest(corrected) },
        this.correctedRateOptions(corrected),
        signal,
      );
      failure.retriedResult = retried.result;
      failure.retriedMetadata = retried.metadata;
      this.logger.log({
        message: 'Calculation succeeded on corrected data',
        module: 'calculation',
        calculationId,
        healingId: healingResult.healingId,
        retriedResult: retried.result,
      });
    } catch (retryError) {
      failure.retryError = this.serialize(retryError, null);
      this.logger.warn({
        message: 'Retry on corrected data failed',
        module: 'calculation',
        calculationId,
        healingId: healingResult.healingId,
        error: toError(retryError).message,
      });
    }

    this.emitFailure(failure, request, true);
    return failure;
  }

  /**
   * Validates the request, runs the engine, then converts when the pair
   * differs. Display rounding happens only at the conversion boundary.
   */
  private async execute(
    calculationId: string,
    request: CalculationRequest,
    rateOptions: GetRateOptions,
    signal: AbortSignal | undefined,
  ): Promise<CalculationSuccess> {
    const startedAt = performance.now();
    const dto = await this.validateRequest(request);
    const precision = dto.precisionOverride ?? this.engine.getDefaultPrecision();
    const operation = this.engine.resolveOperation(dto.operation);

    const value = this.engine.calculate(operation, dto.operand1, dto.operand2, {
      precision,
    });
    const rawResult = value.toString();

    let result = rawResult;
    let exchangeRate: ExchangeRate | undefined;
    if (dto.currencyFrom !== dto.currencyTo) {
      exchangeRate = await this.rates.getRate(dto.currencyFrom, dto.currencyTo, {
        ...rateOptions,
        signal,
      });
      const places = this.currencies.decimalPlaces(exchangeRate.to);
      result = this.engine
        .roundToPlaces(this.engine.multiply(value, exchangeRate.rate, precision), places)
        .toFixed(places);
    }

    const metadata: CalculationMetadata = {
      calculationId,
      operation,
      precision,
      currencyFrom: dto.currencyFrom,
      currencyTo: dto.currencyTo,
      rawResult,
      ...(exchangeRate && {
        exchangeRate: exchangeRate.rate.toString(),
        rate: exchangeRate.metadata,
      }),
      processingTimeMs: performance.now() - startedAt,
      timestamp: new Date(),
    };

    this.logger.debug({
      message: 'Calculation completed',
      module: 'calculation',
      calculationId,
      operation,
      result,
    });
    return { success: true, result, metadata };
  }

  private async validateRequest(
    request: CalculationRequest,
  ): Promise<CalculationRequestDto> {
    const dto = plainToInstance(CalculationRequestDto, request);
    const errors = await validate(dto);
    if (errors.length > 0) {
      throw new InvalidRequestError(flattenValidationErrors(errors));
    }
    return dto;
  }

  private correctedRequest(corrected: CorrectedData): Partial<CalculationRequest> {
    return {
      ...(corrected.operand1 !== undefined && { operand1: corrected.operand1 }),
      ...(corrected.operand2 !== undefined && { operand2: corrected.operand2 }),
      ...(corrected.precisionOverride !== undefined && {
        precisionOverride: corrected.precisionOverride,
      }),
    };
  }

  private correctedRateOptions(corrected: CorrectedData): GetRateOptions {
    if (!corrected.useCache) return {};
    return {
      cacheOnly: true,
      ...(corrected.cacheMaxAgeSeconds !== undefined && {
        maxAgeMs: corrected.cacheMaxAgeSeconds * 1000,
      }),
    };
  }

  private healingContext(request: CalculationRequest): HealingContext {
    return {
      operation: request.operation,
      operand1: request.operand1,
      operand2: request.operand2 ?? undefined,
      currencyFrom: request.currencyFrom,
      currencyTo: request.currencyTo,
      precision: request.precisionOverride,
      ...(request.currencyFrom !== request.currencyTo && {
        endpoint: `rates:${request.currencyFrom}/${request.currencyTo}`,
      }),
      component: 'calculation',
    };
  }

  private fail(
    calculationId: string,
    request: CalculationRequest,
    error: unknown,
    healingResult: HealingResult | null,
  ): CalculationFailure {
    const failure: CalculationFailure = {
      success: false,
      calculationId,
      error: this.serialize(error, healingResult),
      healingResult,
    };
    this.logger.warn({
      message: 'Calculation failed',
      module: 'calculation',
      calculationId,
      operation: request.operation,
      errorType: failure.error.type,
      error: failure.error.message,
      healingId: healingResult?.healingId,
    });
    return failure;
  }

  private emitFailure(
    failure: CalculationFailure,
    request: CalculationRequest,
    retried: boolean,
  ): void {
    this.eventEmitter.emit(
      EVENT_NAMES.CALCULATION_FAILED,
      new CalculationFailedEvent(
        failure.calculationId,
        request.operation,
        failure.error,
        failure.healingResult?.healingId ?? null,
        retried,
      ),
    );
  }

  private serialize(
    error: unknown,
    healingResult: HealingResult | null,
  ): SerializedError {
    const normalized = toError(error);
    return {
      code: error instanceof SystemError ? error.code : null,
      type: normalized.name,
      message: normalized.message,
      category: this.categorize(error, healingResult),
      severity: error instanceof SystemError ? error.severity : 'error',
    };
  }

  /** The first detected pattern decides; the error class is the fallback. */
  private categorize(
    error: unknown,
    healingResult: HealingResult | null,
  ): ErrorCategory {
    const patternId = healingResult?.stages.detection?.patterns[0];
    const pattern = patternId !== undefined ? this.patterns.get(patternId) : undefined;
    if (pattern) return pattern.category;
    if (error instanceof CalculationError) return 'calculation';
    if (error instanceof RateError) return 'currency';
    return 'system';
  }

  private combineSignals(options: CalculateCallOptions): AbortSignal | undefined {
    const { signal, timeoutMs } = options;
    if (timeoutMs === undefined) return signal;
    if (!Number.isInteger(timeoutMs) || timeoutMs < 0) {
      throw new InvalidRequestError([
        `timeoutMs: timeoutMs must be a non-negative integer, got ${timeoutMs}`,
      ]);
    }
    const timeout = AbortSignal.timeout(timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }
}

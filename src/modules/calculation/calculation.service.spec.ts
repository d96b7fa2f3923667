import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Test, type TestingModule } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { EventEmitter2, EventEmitterModule } from '@nestjs/event-emitter';

import { CalculationModule } from './calculation.module.js';
import { CalculationService } from './calculation.service.js';
import type { CalculationFailure, CalculationOutcome } from './calculation.types.js';
import { RATE_PROVIDERS_TOKEN } from '../../connectors/connector.constants.js';
import { RateProviderError } from '../../common/errors/index.js';
import { EVENT_NAMES } from '../../common/events/event-catalog.js';
import { CalculationCompletedEvent } from '../../common/events/calculation.events.js';
import { createMockRateProvider } from '../../test/mock-factories.js';

function expectFailure(outcome: CalculationOutcome): CalculationFailure {
  if (outcome.success) {
    throw new Error(`expected a failure, got result ${outcome.result}`);
  }
  return outcome;
}

describe('CalculationService', () => {
  let module: TestingModule;
  let service: CalculationService;
  let provider: ReturnType<typeof createMockRateProvider>;
  let emitter: EventEmitter2;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-01T12:00:00Z'));

    provider = createMockRateProvider('Seeded', {
      USD_EUR: '0.85',
      USD_GBP: '0.8',
    });

    module = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => ({ HEALING_BACKOFF_BASE_MS: 1 })],
        }),
        EventEmitterModule.forRoot(),
        CalculationModule,
      ],
    })
      .overrideProvider(RATE_PROVIDERS_TOKEN)
      .useValue([provider])
      .compile();
    await module.init();

    service = module.get(CalculationService);
    emitter = module.get(EventEmitter2);
    vi.spyOn(emitter, 'emit');
  });

  afterEach(async () => {
    vi.useRealTimers();
    await module.close();
  });

  describe('calculate', () => {
    it('should convert the engine result and round at the conversion boundary', async () => {
      const outcome = await service.calculate({
        operation: 'add',
        operand1: '123.45',
        operand2: '67.8',
        currencyFrom: 'USD',
        currencyTo: 'EUR',
      });

      expect(outcome.success).toBe(true);
      if (!outcome.success) return;
      expect(outcome.result).toBe('162.56');
      expect(outcome.metadata).toMatchObject({
        operation: 'add',
        precision: 60,
        currencyFrom: 'USD',
        currencyTo: 'EUR',
        rawResult: '191.25',
        exchangeRate: '0.85',
      });
      expect(outcome.metadata.rate?.source).toBe('Seeded');
    });

    it('should leave same-currency results unrounded', async () => {
      const outcome = await service.calculate({
        operation: 'divide',
        operand1: '1',
        operand2: '8',
        currencyFrom: 'usd',
        currencyTo: 'USD',
      });

      expect(outcome).toMatchObject({ success: true, result: '0.125' });
      expect(provider.fetch).not.toHaveBeenCalled();
    });

    it('should yield identical results for repeated calls', async () => {
      const request = {
        operation: 'add',
        operand1: '1.5',
        operand2: '2.5',
        currencyFrom: 'USD',
        currencyTo: 'USD',
      };

      const first = await service.calculate(request);
      const second = await service.calculate(request);

      expect(first).toMatchObject({ success: true, result: '4' });
      expect(second).toMatchObject({ success: true, result: '4' });
    });

    it('should honour a precision override', async () => {
      const outcome = await service.calculate({
        operation: 'divide',
        operand1: '1',
        operand2: '3',
        currencyFrom: 'USD',
        currencyTo: 'USD',
        precisionOverride: 5,
      });

      expect(outcome).toMatchObject({ success: true, result: '0.33333' });
    });

    it('should heal a division by zero and retry once with the epsilon divisor', async () => {
      const failure = expectFailure(
        await service.calculate({
          operation: 'divide',
          operand1: '10',
          operand2: '0',
          currencyFrom: 'USD',
          currencyTo: 'USD',
        }),
      );

      expect(failure.error).toEqual({
        code: 1002,
        type: 'DivisionByZeroError',
        message: 'Division by zero: divisor is exactly zero',
        category: 'calculation',
        severity: 'error',
      });
      expect(failure.healingResult?.correctionApplied).toBe(true);
      expect(failure.healingResult?.correctedData).toEqual({ operand2: '1e-60' });
      expect(failure.retriedResult).toBe('1e+61');
      expect(failure.retryError).toBeUndefined();
    });

    it('should retry a sanitized operand', async () => {
      const failure = expectFailure(
        await service.calculate({
          operation: 'add',
          operand1: '1,5',
          operand2: '2',
          currencyFrom: 'USD',
          currencyTo: 'USD',
        }),
      );

      expect(failure.error).toMatchObject({
        code: 1004,
        type: 'InvalidNumericLiteralError',
        category: 'validation',
        severity: 'warning',
      });
      expect(failure.healingResult?.correctedData).toEqual({ operand1: '1.5' });
      expect(failure.retriedResult).toBe('3.5');
    });

    it('should retry exhausted providers against a stale cached rate', async () => {
      const request = {
        operation: 'multiply',
        operand1: '2',
        operand2: '1',
        currencyFrom: 'USD',
        currencyTo: 'GBP',
      };
      await expect(service.calculate(request)).resolves.toMatchObject({
        success: true,
        result: '1.60',
      });

      vi.setSystemTime(new Date('2026-03-01T12:10:00Z'));
      provider.fetch.mockRejectedValueOnce(
        new RateProviderError('Seeded', 'HTTP 503'),
      );

      const failure = expectFailure(await service.calculate(request));

      expect(failure.error).toMatchObject({
        code: 2001,
        type: 'AllProvidersExhaustedError',
        category: 'currency',
      });
      expect(failure.healingResult?.correctedData).toEqual({
        useCache: true,
        cacheMaxAgeSeconds: 3600,
      });
      expect(failure.retriedResult).toBe('1.60');
      expect(failure.retriedMetadata?.rate).toMatchObject({
        fromCache: true,
        staleAllowed: true,
        cacheAgeSeconds: 600,
      });
    });

    it('should retry against the in-process cache when the cache backend fails', async () => {
      const request = {
        operation: 'multiply',
        operand1: '2',
        operand2: '1',
        currencyFrom: 'USD',
        currencyTo: 'GBP',
      };
      await service.calculate(request);

      vi.setSystemTime(new Date('2026-03-01T12:10:00Z'));
      provider.fetch.mockRejectedValueOnce(
        new RateProviderError('Seeded', 'redis cluster down'),
      );

      const failure = expectFailure(await service.calculate(request));

      expect(failure.error).toMatchObject({ code: 2001, category: 'cache' });
      expect(failure.healingResult?.stages.detection?.patterns).toEqual([
        'cache_unavailable',
        'providers_exhausted',
      ]);
      expect(
        failure.healingResult?.stages.correction?.succeeded[0]?.correction
          .correctionType,
      ).toBe('memory_fallback');
      expect(failure.retriedResult).toBe('1.60');
      expect(failure.retriedMetadata?.rate).toMatchObject({
        fromCache: true,
        staleAllowed: true,
        cacheAgeSeconds: 600,
      });
      expect(provider.fetch).toHaveBeenCalledTimes(2);
    });

    it('should fail an inherited object key as an unsupported operation', async () => {
      const failure = expectFailure(
        await service.calculate({
          operation: 'constructor',
          operand1: '1',
          operand2: '2',
          currencyFrom: 'USD',
          currencyTo: 'USD',
        }),
      );

      expect(failure.error).toEqual({
        code: 1005,
        type: 'UnsupportedOperationError',
        message: 'Unsupported operation: constructor',
        category: 'calculation',
        severity: 'warning',
      });
    });

    it('should report the retry failure when no cached rate exists', async () => {
      provider.fetch.mockRejectedValueOnce(
        new RateProviderError('Seeded', 'HTTP 503'),
      );

      const failure = expectFailure(
        await service.calculate({
          operation: 'add',
          operand1: '1',
          operand2: '1',
          currencyFrom: 'USD',
          currencyTo: 'EUR',
        }),
      );

      expect(failure.retriedResult).toBeUndefined();
      expect(failure.retryError).toEqual({
        code: 2001,
        type: 'AllProvidersExhaustedError',
        message: 'All rate providers exhausted for USD/EUR: no cached rate within 3600s',
        category: 'currency',
        severity: 'error',
      });
    });

    it('should reject a malformed request without retrying', async () => {
      const failure = expectFailure(
        await service.calculate({
          operation: 'add',
          operand1: '1',
          operand2: '2',
          currencyFrom: 'us',
          currencyTo: 'EUR',
        }),
      );

      expect(failure.error).toEqual({
        code: 1009,
        type: 'InvalidRequestError',
        message:
          'Malformed calculation request: currencyFrom: currencyFrom must be 3-6 uppercase letters or digits',
        category: 'calculation',
        severity: 'warning',
      });
      expect(failure.healingResult?.correctionApplied).toBe(false);
      expect(failure.retriedResult).toBeUndefined();
    });

    it('should not heal a cancelled calculation', async () => {
      const controller = new AbortController();
      controller.abort(new Error('client went away'));

      const failure = expectFailure(
        await service.calculate(
          {
            operation: 'add',
            operand1: '1',
            operand2: '1',
            currencyFrom: 'USD',
            currencyTo: 'EUR',
          },
          { signal: controller.signal },
        ),
      );

      expect(failure.healingResult).toBeNull();
      expect(failure.error).toEqual({
        code: 2003,
        type: 'CancelledError',
        message: 'Cancelled: client went away',
        category: 'currency',
        severity: 'warning',
      });
      expect(service.getHealingStatus().statistics.totalErrorsProcessed).toBe(0);
    });

    it('should report an invalid timeout as a malformed request', async () => {
      for (const timeoutMs of [-1, Number.NaN]) {
        const failure = expectFailure(
          await service.calculate(
            {
              operation: 'add',
              operand1: '1',
              operand2: '1',
              currencyFrom: 'USD',
              currencyTo: 'USD',
            },
            { timeoutMs },
          ),
        );

        expect(failure.error).toMatchObject({
          code: 1009,
          type: 'InvalidRequestError',
          message: `Malformed calculation request: timeoutMs: timeoutMs must be a non-negative integer, got ${timeoutMs}`,
        });
      }
    });

    it('should report failures without retrying while healing is disabled', async () => {
      service.setHealingActive(false);

      const failure = expectFailure(
        await service.calculate({
          operation: 'divide',
          operand1: '10',
          operand2: '0',
          currencyFrom: 'USD',
          currencyTo: 'USD',
        }),
      );

      expect(failure.healingResult?.reason).toBe('healing_disabled');
      expect(failure.retriedResult).toBeUndefined();
      expect(failure.error.category).toBe('calculation');
      expect(service.getHealingStatus().active).toBe(false);
    });

    it('should emit a completion event carrying the correlation id', async () => {
      await service.calculate({
        operation: 'multiply',
        operand1: '2',
        operand2: '3',
        currencyFrom: 'USD',
        currencyTo: 'USD',
      });

      const [name, event] = vi.mocked(emitter.emit).mock.calls[0] ?? [];
      expect(name).toBe(EVENT_NAMES.CALCULATION_COMPLETED);
      expect(event).toBeInstanceOf(CalculationCompletedEvent);
      expect(event).toMatchObject({ operation: 'multiply', result: '6' });
      expect(event).toHaveProperty('correlationId', expect.any(String));
    });

    it('should emit a failure event after healing', async () => {
      await service.calculate({
        operation: 'sqrt',
        operand1: '-4',
        currencyFrom: 'USD',
        currencyTo: 'USD',
      });

      const names = vi.mocked(emitter.emit).mock.calls.map(([name]) => name);
      expect(names.at(-1)).toBe(EVENT_NAMES.CALCULATION_FAILED);
      expect(names).toContain(EVENT_NAMES.HEALING_COMPLETED);
    });
  });

  describe('rate operations', () => {
    it('should return rates as strings', async () => {
      const { rate, metadata } = await service.getRate('usd', 'eur');

      expect(rate).toBe('0.85');
      expect(metadata.source).toBe('Seeded');
    });

    it('should throw rate failures to the caller', async () => {
      await expect(service.getRate('USD', 'XYZ')).rejects.toThrow(
        'Unsupported currency pair: USD/XYZ',
      );
    });

    it('should convert amounts to the target currency places', async () => {
      const conversion = await service.convert('100', 'USD', 'EUR');

      expect(conversion.convertedAmount).toBe('85.00');
    });

    it('should list active currencies by default', () => {
      expect(service.getSupportedCurrencies()).toHaveLength(36);
      expect(service.getSupportedCurrencies(false)).toHaveLength(37);
    });

    it('should clear the rate cache', async () => {
      await service.getRate('USD', 'EUR');

      expect(service.clearRateCache()).toBe(1);
      expect(service.clearRateCache()).toBe(0);
    });

    it('should build a matrix with null for unresolved pairs', async () => {
      const matrix = await service.getCurrencyMatrix(['USD', 'EUR', 'JPY']);

      expect(matrix['USD']).toEqual({ USD: '1', EUR: '0.85', JPY: null });
      expect(matrix['EUR']?.['EUR']).toBe('1');
    });
  });

  describe('getMetrics', () => {
    it('should count calculations and errors', async () => {
      await service.calculate({
        operation: 'add',
        operand1: '1',
        operand2: '1',
        currencyFrom: 'USD',
        currencyTo: 'USD',
      });
      await service.calculate({
        operation: 'modulo',
        operand1: '1',
        operand2: '1',
        currencyFrom: 'USD',
        currencyTo: 'USD',
      });

      expect(service.getMetrics()).toMatchObject({
        calculationsPerformed: 2,
        errorsEncountered: 1,
        successRatio: 0.5,
        precision: 60,
      });
    });
  });
});

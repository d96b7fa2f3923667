import { describe, it, expect, beforeEach } from 'vitest';

import { FallbackRateProvider } from './fallback-rate.provider.js';
import { FallbackRatesConfigDto } from './dto/fallback-rates.dto.js';
import { PrecisionEngineService } from '../../modules/precision/precision-engine.service.js';
import { RateProviderError } from '../../common/errors/index.js';
import { createConfigService } from '../../test/mock-factories.js';

describe('FallbackRateProvider', () => {
  let provider: FallbackRateProvider;

  beforeEach(() => {
    const engine = new PrecisionEngineService(createConfigService());
    provider = new FallbackRateProvider(engine, {
      base: 'USD',
      mockData: true,
      rates: [
        { code: 'EUR', value: '1.25' },
        { code: 'GBP', value: '1.5' },
        { code: 'BTC', value: '40000' },
      ],
    });
  });

  it('should return the table value for X/base', async () => {
    const result = await provider.fetch('EUR', 'USD');

    expect(result.rate.toString()).toBe('1.25');
    expect(result.metadata).toMatchObject({
      source: 'FallbackRates',
      baseCurrency: 'USD',
      mockData: true,
    });
  });

  it('should invert the table value for base/X', async () => {
    const result = await provider.fetch('USD', 'EUR');

    expect(result.rate.toString()).toBe('0.8');
    expect(result.metadata.inverted).toBe(true);
  });

  it('should cross two table values through the base', async () => {
    expect((await provider.fetch('GBP', 'EUR')).rate.toString()).toBe('1.2');
    expect((await provider.fetch('BTC', 'EUR')).rate.toString()).toBe('32000');
  });

  it('should fail for a pair the table cannot express', async () => {
    await expect(provider.fetch('XYZ', 'USD')).rejects.toThrow(
      new RateProviderError('FallbackRates', 'no fallback rate for XYZ/USD'),
    );
    expect(provider.supports('XYZ')).toBe(false);
    expect(provider.getStats().errors).toBe(1);
  });
});

describe('FallbackRatesConfigDto.validateEntries', () => {
  it('should flag duplicates, the base itself and zero values', () => {
    const errors = FallbackRatesConfigDto.validateEntries(
      [
        { code: 'EUR', value: '1.1' },
        { code: 'EUR', value: '1.2' },
        { code: 'USD', value: '1' },
        { code: 'GBP', value: '0.00' },
      ],
      'USD',
    );

    expect(errors).toEqual([
      'rates: duplicate entry for EUR',
      'rates: base currency USD must not be listed',
      'rates.GBP: value must be greater than zero',
    ]);
  });
});

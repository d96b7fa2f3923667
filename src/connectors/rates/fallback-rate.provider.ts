import { RateProviderError } from '../../common/errors/index.js';
import type { PrecisionEngineService } from '../../modules/precision/precision-engine.service.js';
import type { HighPrecisionValue } from '../../modules/precision/precision.types.js';
import { BaseRateProvider, type RawProviderRate } from './base-rate.provider.js';
import type { FallbackRatesConfigDto } from './dto/fallback-rates.dto.js';

export const FALLBACK_PROVIDER_NAME = 'FallbackRates';

/**
 * Deterministic last-resort table. Every entry is the value of one unit in
 * the base currency, so a pair resolves directly, inversely or as a cross
 * through the base. A pair the table cannot express is a failure.
 */
export class FallbackRateProvider extends BaseRateProvider {
  private readonly base: string;
  private readonly mockData: boolean;
  private readonly values = new Map<string, HighPrecisionValue>();

  constructor(engine: PrecisionEngineService, config: FallbackRatesConfigDto) {
    super(FALLBACK_PROVIDER_NAME, engine);
    this.base = config.base;
    this.mockData = config.mockData ?? true;
    for (const entry of config.rates) {
      this.values.set(entry.code, engine.parse(entry.value, entry.code));
    }
    this.values.set(this.base, engine.parse('1'));
  }

  supports(code: string): boolean {
    return this.values.has(code);
  }

  protected fetchRate(from: string, to: string): Promise<RawProviderRate> {
    const fromValue = this.values.get(from);
    const toValue = this.values.get(to);
    if (!fromValue || !toValue) {
      return Promise.reject(
        new RateProviderError(this.name, `no fallback rate for ${from}/${to}`),
      );
    }

    // X/base is the table value itself; base/X its inverse; else cross.
    const rate =
      to === this.base
        ? fromValue
        : this.engine.divide(fromValue, toValue);

    return Promise.resolve({
      rate,
      extra: {
        baseCurrency: this.base,
        mockData: this.mockData,
        ...(from === this.base && { inverted: true }),
      },
    });
  }
}

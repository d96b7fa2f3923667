import type { IHttpClient } from '../../common/interfaces/index.js';
import {
  RateProviderError,
  RETRY_STRATEGIES,
  type RetryStrategy,
} from '../../common/errors/index.js';
import { isFiniteNumber, isRecord, withRetry } from '../../common/utils/index.js';
import type { PrecisionEngineService } from '../../modules/precision/precision-engine.service.js';
import { BaseRateProvider, type RawProviderRate } from './base-rate.provider.js';

export const EXCHANGE_RATE_API_NAME = 'ExchangeRates-API';

export interface ExchangeRateApiOptions {
  baseUrl: string;
  retryStrategy?: RetryStrategy;
}

/**
 * Fiat rates from `GET {baseUrl}/{FROM}` returning
 * `{ base, date, rates: { [code]: number } }`.
 */
export class ExchangeRateApiProvider extends BaseRateProvider {
  private readonly baseUrl: string;
  private readonly retryStrategy: RetryStrategy;

  constructor(
    private readonly http: IHttpClient,
    engine: PrecisionEngineService,
    options: ExchangeRateApiOptions,
  ) {
    super(EXCHANGE_RATE_API_NAME, engine);
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.retryStrategy = options.retryStrategy ?? RETRY_STRATEGIES.NETWORK_ERROR;
  }

  protected async fetchRate(
    from: string,
    to: string,
    signal?: AbortSignal,
  ): Promise<RawProviderRate> {
    const body = await withRetry(
      () => this.request(from, signal),
      this.retryStrategy,
      (attempt, error) =>
        this.logger.debug({
          message: 'Retrying rate request',
          module: 'rate-providers',
          attempt,
          error: error.message,
        }),
      signal,
    );

    const rates = body.rates;
    const value = isRecord(rates) ? rates[to] : undefined;
    if (!isFiniteNumber(value)) {
      throw new RateProviderError(this.name, `no rate for ${from}/${to}`);
    }

    return {
      rate: this.engine.parse(String(value), 'rate'),
      extra: {
        baseCurrency: typeof body.base === 'string' ? body.base : from,
        ...(typeof body.date === 'string' && { providerTimestamp: body.date }),
      },
    };
  }

  private async request(
    from: string,
    signal?: AbortSignal,
  ): Promise<Record<string, unknown>> {
    const response = await this.http.getJson(
      `${this.baseUrl}/${encodeURIComponent(from)}`,
      { signal },
    );
    if (response.status < 200 || response.status >= 300) {
      throw new RateProviderError(this.name, `HTTP ${response.status}`, {
        status: response.status,
      });
    }
    if (!isRecord(response.body)) {
      throw new RateProviderError(this.name, 'malformed response body');
    }
    return response.body;
  }
}

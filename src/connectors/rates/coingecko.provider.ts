import type { IHttpClient } from '../../common/interfaces/index.js';
import {
  RateProviderError,
  RETRY_STRATEGIES,
  type RetryStrategy,
} from '../../common/errors/index.js';
import { isFiniteNumber, isRecord, withRetry } from '../../common/utils/index.js';
import type { PrecisionEngineService } from '../../modules/precision/precision-engine.service.js';
import type { HighPrecisionValue } from '../../modules/precision/precision.types.js';
import { BaseRateProvider, type RawProviderRate } from './base-rate.provider.js';

export const COINGECKO_NAME = 'CoinGecko';

// Ticker -> CoinGecko coin id
export const COINGECKO_IDS: Readonly<Record<string, string>> = {
  BTC: 'bitcoin',
  ETH: 'ethereum',
  ADA: 'cardano',
  DOT: 'polkadot',
  SOL: 'solana',
  MATIC: 'matic-network',
  AVAX: 'avalanche-2',
  LINK: 'chainlink',
  UNI: 'uniswap',
  LTC: 'litecoin',
};

export interface CoinGeckoOptions {
  baseUrl: string;
  retryStrategy?: RetryStrategy;
}

/**
 * Crypto prices from `/simple/price`. CRYPTO->X is read directly;
 * X->CRYPTO is the inverse of CRYPTO->X.
 */
export class CoinGeckoProvider extends BaseRateProvider {
  private readonly baseUrl: string;
  private readonly retryStrategy: RetryStrategy;

  constructor(
    private readonly http: IHttpClient,
    engine: PrecisionEngineService,
    options: CoinGeckoOptions,
  ) {
    super(COINGECKO_NAME, engine);
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.retryStrategy = options.retryStrategy ?? RETRY_STRATEGIES.NETWORK_ERROR;
  }

  protected async fetchRate(
    from: string,
    to: string,
    signal?: AbortSignal,
  ): Promise<RawProviderRate> {
    const fromId = COINGECKO_IDS[from];
    if (fromId) {
      const price = await this.price(fromId, to, signal);
      return { rate: price, extra: { baseCurrency: from } };
    }

    const toId = COINGECKO_IDS[to];
    if (toId) {
      const price = await this.price(toId, from, signal);
      return {
        rate: this.engine.divide(this.engine.parse('1'), price),
        extra: { baseCurrency: to, inverted: true },
      };
    }

    throw new RateProviderError(
      this.name,
      `pair ${from}/${to} involves no supported cryptocurrency`,
    );
  }

  private async price(
    coinId: string,
    vsCurrency: string,
    signal?: AbortSignal,
  ): Promise<HighPrecisionValue> {
    const vs = vsCurrency.toLowerCase();
    const body = await withRetry(
      async () => {
        const response = await this.http.getJson(`${this.baseUrl}/simple/price`, {
          query: { ids: coinId, vs_currencies: vs },
          signal,
        });
        if (response.status < 200 || response.status >= 300) {
          throw new RateProviderError(this.name, `HTTP ${response.status}`, {
            status: response.status,
          });
        }
        return response.body;
      },
      this.retryStrategy,
      undefined,
      signal,
    );

    const coin = isRecord(body) ? body[coinId] : undefined;
    const value = isRecord(coin) ? coin[vs] : undefined;
    if (!isFiniteNumber(value)) {
      throw new RateProviderError(this.name, `no ${vs} price for ${coinId}`);
    }
    return this.engine.parse(String(value), 'rate');
  }
}

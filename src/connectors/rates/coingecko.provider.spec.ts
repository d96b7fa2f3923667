import { describe, it, expect, beforeEach } from 'vitest';

import { CoinGeckoProvider } from './coingecko.provider.js';
import { PrecisionEngineService } from '../../modules/precision/precision-engine.service.js';
import {
  createConfigService,
  createMockHttpClient,
} from '../../test/mock-factories.js';

describe('CoinGeckoProvider', () => {
  let engine: PrecisionEngineService;

  beforeEach(() => {
    engine = new PrecisionEngineService(createConfigService());
  });

  function createProvider(body: unknown) {
    const http = createMockHttpClient({
      'https://cg.test/api/v3/simple/price': { status: 200, body },
    });
    const provider = new CoinGeckoProvider(http, engine, {
      baseUrl: 'https://cg.test/api/v3',
      retryStrategy: {
        maxRetries: 0,
        initialDelayMs: 0,
        maxDelayMs: 0,
        backoffMultiplier: 2,
      },
    });
    return { http, provider };
  }

  it('should price a crypto asset in the target currency', async () => {
    const { http, provider } = createProvider({ bitcoin: { usd: 45000 } });

    const result = await provider.fetch('BTC', 'USD');

    expect(result.rate.toString()).toBe('45000');
    expect(result.metadata.source).toBe('CoinGecko');
    expect(result.metadata.baseCurrency).toBe('BTC');
    expect(http.getJson).toHaveBeenCalledWith(
      'https://cg.test/api/v3/simple/price',
      { query: { ids: 'bitcoin', vs_currencies: 'usd' }, signal: undefined },
    );
  });

  it('should invert the price when the crypto asset is the target', async () => {
    const { http, provider } = createProvider({ bitcoin: { usd: 40000 } });

    const result = await provider.fetch('USD', 'BTC');

    expect(result.rate.toString()).toBe('0.000025');
    expect(result.metadata.inverted).toBe(true);
    expect(http.getJson).toHaveBeenCalledWith(
      'https://cg.test/api/v3/simple/price',
      { query: { ids: 'bitcoin', vs_currencies: 'usd' }, signal: undefined },
    );
  });

  it('should map tickers to coin ids', async () => {
    const { http, provider } = createProvider({ 'matic-network': { eur: 0.5 } });

    const result = await provider.fetch('MATIC', 'EUR');

    expect(result.rate.toString()).toBe('0.5');
    expect(http.getJson.mock.calls[0]?.[1]?.query).toEqual({
      ids: 'matic-network',
      vs_currencies: 'eur',
    });
  });

  it('should reject pairs without a supported cryptocurrency', async () => {
    const { http, provider } = createProvider({});

    await expect(provider.fetch('EUR', 'USD')).rejects.toThrow(
      'CoinGecko: pair EUR/USD involves no supported cryptocurrency',
    );
    expect(http.getJson).not.toHaveBeenCalled();
  });

  it('should reject a response without the requested price', async () => {
    const { provider } = createProvider({ bitcoin: { eur: 41000 } });

    await expect(provider.fetch('BTC', 'USD')).rejects.toThrow(
      'CoinGecko: no usd price for bitcoin',
    );
  });
});

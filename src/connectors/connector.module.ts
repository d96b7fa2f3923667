import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';

import type { IHttpClient, IRateProvider } from '../common/interfaces/index.js';
import { ConfigValidationError } from '../common/errors/config-validation-error.js';
import {
  loadYamlConfig,
  resolveConfigPath,
} from '../common/config/yaml-config.loader.js';
import { PrecisionModule } from '../modules/precision/precision.module.js';
import { PrecisionEngineService } from '../modules/precision/precision-engine.service.js';
import {
  HTTP_CLIENT_TOKEN,
  PROVIDER_KEYS,
  RATE_PROVIDERS_TOKEN,
  type ProviderKey,
} from './connector.constants.js';
import { FetchHttpClient } from './rates/fetch-http.client.js';
import { ExchangeRateApiProvider } from './rates/exchange-rate-api.provider.js';
import { CoinGeckoProvider } from './rates/coingecko.provider.js';
import { FallbackRateProvider } from './rates/fallback-rate.provider.js';
import { FallbackRatesConfigDto } from './rates/dto/fallback-rates.dto.js';

const DEFAULT_PROVIDERS = PROVIDER_KEYS.join(',');

function isProviderKey(value: string): value is ProviderKey {
  return PROVIDER_KEYS.some((key) => key === value);
}

export function parseEnabledProviders(config: ConfigService): ProviderKey[] {
  const raw = config.get<string>('RATE_PROVIDERS_ENABLED', DEFAULT_PROVIDERS);
  const entries = raw
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);

  const errors: string[] = [];
  const keys: ProviderKey[] = [];
  for (const entry of entries) {
    if (!isProviderKey(entry)) {
      errors.push(
        `RATE_PROVIDERS_ENABLED entry '${entry}' must be one of ${PROVIDER_KEYS.join(', ')}`,
      );
    } else if (keys.includes(entry)) {
      errors.push(`RATE_PROVIDERS_ENABLED lists '${entry}' twice`);
    } else {
      keys.push(entry);
    }
  }
  if (entries.length === 0) {
    errors.push('RATE_PROVIDERS_ENABLED must name at least one provider');
  }
  if (errors.length > 0) {
    throw new ConfigValidationError('Invalid rate provider configuration', errors);
  }
  return keys;
}

export async function loadFallbackRates(
  config: ConfigService,
): Promise<FallbackRatesConfigDto> {
  const configPath = config.get<string>(
    'FALLBACK_RATES_CONFIG_PATH',
    'config/fallback-rates.yaml',
  );
  const dto = await loadYamlConfig(
    FallbackRatesConfigDto,
    resolveConfigPath(configPath),
    'Fallback rates',
  );
  const errors = FallbackRatesConfigDto.validateEntries(dto.rates, dto.base);
  if (errors.length > 0) {
    throw new ConfigValidationError(
      `Fallback rates config validation failed with ${errors.length} error(s)`,
      errors,
    );
  }
  return dto;
}

/** Builds the providers in the configured order, most authoritative first. */
export async function createRateProviders(
  http: IHttpClient,
  engine: PrecisionEngineService,
  config: ConfigService,
): Promise<IRateProvider[]> {
  const providers: IRateProvider[] = [];
  for (const key of parseEnabledProviders(config)) {
    switch (key) {
      case 'exchangerate-api':
        providers.push(
          new ExchangeRateApiProvider(http, engine, {
            baseUrl: config.get<string>(
              'EXCHANGE_RATE_API_URL',
              'https://api.exchangerate-api.com/v4/latest',
            ),
          }),
        );
        break;
      case 'coingecko':
        providers.push(
          new CoinGeckoProvider(http, engine, {
            baseUrl: config.get<string>(
              'COINGECKO_API_URL',
              'https://api.coingecko.com/api/v3',
            ),
          }),
        );
        break;
      case 'fallback':
        providers.push(
          new FallbackRateProvider(engine, await loadFallbackRates(config)),
        );
        break;
    }
  }
  return providers;
}

@Module({
  imports: [ConfigModule, PrecisionModule],
  providers: [
    {
      provide: HTTP_CLIENT_TOKEN,
      useClass: FetchHttpClient,
    },
    {
      provide: RATE_PROVIDERS_TOKEN,
      useFactory: createRateProviders,
      inject: [HTTP_CLIENT_TOKEN, PrecisionEngineService, ConfigService],
    },
  ],
  exports: [RATE_PROVIDERS_TOKEN, HTTP_CLIENT_TOKEN],
})
export class ConnectorModule {}

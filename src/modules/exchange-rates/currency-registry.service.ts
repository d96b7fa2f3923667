import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type { Currency } from '../../common/types/index.js';
import { ConfigValidationError } from '../../common/errors/index.js';
import {
  loadYamlConfig,
  resolveConfigPath,
} from '../../common/config/yaml-config.loader.js';
import { CurrenciesConfigDto, type CurrencyDto } from './dto/currency.dto.js';

/**
 * Currencies seeded from YAML at startup. Entries are frozen and the set
 * never changes after load.
 */
@Injectable()
export class CurrencyRegistryService implements OnModuleInit {
  private readonly logger = new Logger(CurrencyRegistryService.name);
  private currencies: ReadonlyMap<string, Currency> = new Map();

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    await this.load();
  }

  async load(): Promise<void> {
    const configPath = this.configService.get<string>(
      'CURRENCIES_CONFIG_PATH',
      'config/currencies.yaml',
    );
    const dto = await loadYamlConfig(
      CurrenciesConfigDto,
      resolveConfigPath(configPath),
      'Currencies',
    );

    const duplicates = CurrenciesConfigDto.validateDuplicates(dto.currencies);
    if (duplicates.length > 0) {
      throw new ConfigValidationError(
        `Currencies config validation failed with ${duplicates.length} error(s)`,
        duplicates,
      );
    }

    this.currencies = new Map(
      dto.currencies.map((entry) => [entry.code, toCurrency(entry)]),
    );

    this.logger.log({
      message: 'Currencies loaded',
      module: 'exchange-rates',
      count: this.currencies.size,
      configPath,
    });
  }

  get(code: string): Currency | undefined {
    return this.currencies.get(code);
  }

  /** Registered and active. */
  isSupported(code: string): boolean {
    return this.currencies.get(code)?.active === true;
  }

  list(activeOnly = false): Currency[] {
    const all = [...this.currencies.values()];
    return activeOnly ? all.filter((c) => c.active) : all;
  }

  decimalPlaces(code: string): number {
    return this.currencies.get(code)?.decimalPlaces ?? 2;
  }
}

function toCurrency(entry: CurrencyDto): Currency {
  return Object.freeze({
    code: entry.code,
    name: entry.name,
    symbol: entry.symbol,
    kind: entry.kind,
    decimalPlaces: entry.decimalPlaces,
    active: entry.active ?? true,
    ...(entry.country !== undefined && { country: entry.country }),
  });
}

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { ConnectorModule } from '../../connectors/connector.module.js';
import { PrecisionModule } from '../precision/precision.module.js';
import { CurrencyRegistryService } from './currency-registry.service.js';
import { RateAggregatorService } from './rate-aggregator.service.js';

@Module({
  imports: [ConfigModule, PrecisionModule, ConnectorModule],
  providers: [CurrencyRegistryService, RateAggregatorService],
  exports: [CurrencyRegistryService, RateAggregatorService],
})
export class ExchangeRatesModule {}

import { Module } from '@nestjs/common';

import { PrecisionModule } from '../precision/precision.module.js';
import { ExchangeRatesModule } from '../exchange-rates/exchange-rates.module.js';
import { HealingModule } from '../healing/healing.module.js';
import { CalculationService } from './calculation.service.js';

@Module({
  imports: [PrecisionModule, ExchangeRatesModule, HealingModule],
  providers: [CalculationService],
  exports: [CalculationService],
})
export class CalculationModule {}

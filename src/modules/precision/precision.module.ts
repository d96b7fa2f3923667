import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PrecisionEngineService } from './precision-engine.service.js';

@Module({
  imports: [ConfigModule],
  providers: [PrecisionEngineService],
  exports: [PrecisionEngineService],
})
export class PrecisionModule {}

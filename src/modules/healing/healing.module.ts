import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { PrecisionModule } from '../precision/precision.module.js';
import { ErrorPatternRegistryService } from './error-pattern-registry.service.js';
import { MitigatorService } from './mitigator.service.js';
import { ProcessorService } from './processor.service.js';
import { CorrectorService } from './corrector.service.js';
import { HealingOrchestratorService } from './healing-orchestrator.service.js';

@Module({
  imports: [ConfigModule, PrecisionModule],
  providers: [
    ErrorPatternRegistryService,
    MitigatorService,
    ProcessorService,
    CorrectorService,
    HealingOrchestratorService,
  ],
  exports: [HealingOrchestratorService, ErrorPatternRegistryService],
})
export class HealingModule {}

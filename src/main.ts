import { NestFactory } from '@nestjs/core';
import { Logger as PinoLogger } from 'nestjs-pino';
import { Logger } from '@nestjs/common';

import { AppModule } from './app.module.js';
import { CalculationService } from './modules/calculation/calculation.service.js';

async function bootstrap() {
  // No HTTP surface: transports embed the core through an application context.
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  // Replace default NestJS logger with nestjs-pino
  app.useLogger(app.get(PinoLogger));
  app.enableShutdownHooks();

  const calculations = app.get(CalculationService);
  const logger = new Logger('Bootstrap');
  logger.log({
    message: 'Calculation core ready',
    module: 'bootstrap',
    currencies: calculations.getSupportedCurrencies().length,
    precision: calculations.getMetrics().precision,
  });
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error({
    message: 'Failed to start calculation core',
    module: 'bootstrap',
    error: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
});

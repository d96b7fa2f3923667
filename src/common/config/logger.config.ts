import type { Params } from 'nestjs-pino';
import { getCorrelationId } from '../services/correlation-context.js';

const env = process.env.NODE_ENV ?? 'development';

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (env === 'production') return 'info';
  if (env === 'test') return 'silent';
  return 'debug';
}

export const loggerConfig: Params = {
  pinoHttp: {
    level: resolveLevel(),

    // The core has no HTTP surface of its own; calculations wrap themselves
    // in withCorrelationId, so the mixin tags every line they produce.
    mixin: (): Record<string, unknown> => {
      const correlationId = getCorrelationId();
      return correlationId ? { correlationId } : {};
    },

    // Pretty-print for development only
    transport:
      env === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              singleLine: false,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,

    base: null,

    serializers: {
      req: () => undefined,
      res: () => undefined,
    },
  },
};

import pino from 'pino';
import type { Logger } from 'pino';

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

function createLogger(): Logger {
  const pretty = process.env.NODE_ENV === 'development';
  return pino({
    level: resolveLevel(),
    base: { service: 'property-etl' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

export const logger = createLogger();

export function createChildLogger(component: string): Logger {
  return logger.child({ component });
}

export type { Logger };

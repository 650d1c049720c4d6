import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Structured logging via pino.
 *
 * Fastify keeps its own request logger; this one is for services and
 * adapters that run outside a request scope.
 */

export interface LoggerConfig {
  level?: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
  pretty?: boolean;
  base?: Record<string, unknown>;
}

const LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

function levelFromEnv(): NonNullable<LoggerConfig['level']> {
  const raw = process.env.LOG_LEVEL;
  // Tests run quiet unless asked otherwise
  if (!raw && process.env.VITEST) return 'silent';
  return LEVELS.find((l) => l === raw) ?? 'info';
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: levelFromEnv(),
  pretty: process.env.NODE_ENV === 'development',
  base: {
    service: 'docqa-api',
  },
};

export function createLogger(loggerConfig?: LoggerConfig): Logger {
  const merged = { ...DEFAULT_CONFIG, ...loggerConfig };

  const options: LoggerOptions = {
    level: merged.level,
    base: merged.base,
  };

  if (merged.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return pino(options);
}

export const logger = createLogger();

export type { Logger };

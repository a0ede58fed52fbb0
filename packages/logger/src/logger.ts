import { pino, type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from 'pino';

import { validateLoggerEnv, type logLevels } from './env.schema.js';

export type Logger = PinoLogger;
export type LogLevel = (typeof logLevels)[number];

export interface LoggerConfig {
  level?: LogLevel | undefined;
  /** Where JSON lines are written. Tests pass an in-memory stream. */
  destination?: DestinationStream | undefined;
}

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;
let overrides: LoggerConfig = {};

function createRootLogger(): Logger {
  const env = validateLoggerEnv(process.env);
  const isTestEnv = env.NODE_ENV === 'test' || process.env['VITEST'] === 'true';

  const options: LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: overrides.level ?? env.LOGGER_LOG_LEVEL ?? (isTestEnv ? 'silent' : 'info'),
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (overrides.destination) {
    return pino(options, overrides.destination);
  }

  // pino-pretty runs as a transport worker; never spawn it under test
  if (env.LOGGER_PRETTY && !isTestEnv) {
    options.transport = {
      options: {
        colorize: true,
        ignore: 'pid,hostname,category,service,environment',
        messageFormat: '[{category}]: {msg}',
        translateTime: 'yyyy-mm-dd HH:MM:ss.l',
      },
      target: 'pino-pretty',
    };
  }

  return pino(options);
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({ category });
  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Returns a category logger that follows reconfiguration.
 *
 * Modules create their loggers at construction time, so the returned Proxy
 * resolves the current underlying pino child on every property access.
 */
export function getLogger(category: string): Logger {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
}

/**
 * Replace the root logger configuration. Cached category loggers are dropped.
 */
export function configureLogger(config: LoggerConfig): void {
  overrides = { ...config };
  rootLogger = undefined;
  loggerCache.clear();
}

/**
 * Return to env-driven configuration.
 */
export function resetLogger(): void {
  configureLogger({});
}

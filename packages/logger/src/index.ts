export { configureLogger, getLogger, resetLogger, type LogLevel, type Logger, type LoggerConfig } from './logger.js';
export { loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';

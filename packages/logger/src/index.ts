export {
  configureLogger,
  formatLabel,
  getLogger,
  resetLoggerConfiguration,
  type LogDestination,
  type Logger,
  type LoggerSettings,
} from './pino-logger.js';
export { LOG_LEVELS, loggerEnvSchema, validateLoggerEnv, type LogLevel, type LoggerEnvConfig } from './env.schema.js';

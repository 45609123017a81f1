export {
  createLogger,
  getComponentLogger,
  getResourceLogger,
  logger,
} from './logger.js';
export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
export { LOG_LEVELS } from './types.js';
export type { ConvergentLogger, LoggerConfig, LogLevel } from './types.js';

import { LOG_LEVELS, type LoggerConfig, type LogLevel } from './types.js';

/**
 * Default logger configuration
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: false,
  options: {
    timestamp: true,
  },
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Get logger configuration from environment variables
 */
export function getLoggerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const config: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

  const envLevel = env.CONVERGENT_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    config.level = envLevel;
  }

  // Enable pretty printing in development
  if (env.NODE_ENV === 'development' || env.CONVERGENT_LOG_PRETTY === 'true') {
    config.pretty = true;
  }

  if (env.CONVERGENT_LOG_DESTINATION) {
    config.destination = env.CONVERGENT_LOG_DESTINATION;
  }

  if (env.CONVERGENT_LOG_TIMESTAMP === 'false') {
    config.options = { ...config.options, timestamp: false };
  }

  return config;
}

/**
 * Validate logger configuration
 */
export function validateLoggerConfig(config: LoggerConfig): void {
  if (!isLogLevel(config.level)) {
    throw new Error(
      `Invalid log level: ${String(config.level)}. Must be one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  if (config.destination !== undefined && typeof config.destination !== 'string') {
    throw new Error('Log destination must be a string');
  }
}

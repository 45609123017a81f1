import pino from 'pino';
import type { ConvergentLogger, LoggerConfig } from './types.js';
import { getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';

function serializeError(error: Error): Record<string, unknown> {
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
}

/**
 * Pino-based implementation of ConvergentLogger
 */
class PinoLogger implements ConvergentLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  trace(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.trace(meta ?? {}, msg);
  }

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    const logData: Record<string, unknown> = { ...meta };
    if (error) {
      logData.error = serializeError(error);
    }
    this.pinoLogger.error(logData, msg);
  }

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    const logData: Record<string, unknown> = { ...meta };
    if (error) {
      logData.error = serializeError(error);
    }
    this.pinoLogger.fatal(logData, msg);
  }

  child(bindings: Record<string, unknown>): ConvergentLogger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

/**
 * Create a logger with the specified configuration
 */
export function createLogger(config?: Partial<LoggerConfig>): ConvergentLogger {
  const finalConfig: LoggerConfig = { ...getLoggerConfigFromEnv(), ...config };
  validateLoggerConfig(finalConfig);

  const pinoOptions: pino.LoggerOptions = {
    level: finalConfig.level,
    timestamp: finalConfig.options?.timestamp !== false,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  let transport: pino.TransportSingleOptions | undefined;

  if (finalConfig.pretty) {
    transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  } else if (finalConfig.destination && finalConfig.destination !== 'stdout') {
    transport = {
      target: 'pino/file',
      options: {
        destination: finalConfig.destination,
      },
    };
  }

  const pinoLogger = transport ? pino(pinoOptions, pino.transport(transport)) : pino(pinoOptions);

  return new PinoLogger(pinoLogger);
}

/**
 * Default logger instance using environment configuration
 */
export const logger: ConvergentLogger = createLogger();

/**
 * Create a component-specific logger
 */
export function getComponentLogger(
  component: string,
  additionalContext?: Record<string, unknown>
): ConvergentLogger {
  return logger.child({ component, ...additionalContext });
}

/**
 * Create a logger bound to one remote object
 */
export function getResourceLogger(
  resourceKind: string,
  resourceId: string,
  additionalContext?: Record<string, unknown>
): ConvergentLogger {
  return logger.child({ resourceKind, resourceId, ...additionalContext });
}

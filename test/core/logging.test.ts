import { describe, expect, it } from 'vitest';
import {
  createLogger,
  DEFAULT_LOGGER_CONFIG,
  getComponentLogger,
  getLoggerConfigFromEnv,
  getResourceLogger,
} from '../../src/core/logging/index.js';

describe('Logging', () => {
  describe('Logger Creation', () => {
    it('should create a logger exposing every level', () => {
      const logger = createLogger({ level: 'warn' });
      for (const method of ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'child'] as const) {
        expect(typeof logger[method]).toBe('function');
      }
    });

    it('should create child loggers with context', () => {
      const child = createLogger({ level: 'warn' }).child({ component: 'test' });
      expect(() => child.debug('ignored below level', { attempt: 1 })).not.toThrow();
      expect(() => child.error('failure', new Error('boom'), { attempt: 2 })).not.toThrow();
    });

    it('should bind component and resource context', () => {
      expect(() =>
        getComponentLogger('convergence-engine', { resourceKind: 'ClusterEndpoint' }).debug('x')
      ).not.toThrow();
      expect(() => getResourceLogger('ClusterEndpoint', 'c1:e1').debug('x')).not.toThrow();
    });
  });

  describe('Environment Configuration', () => {
    it('should use defaults without environment variables', () => {
      expect(getLoggerConfigFromEnv({})).toEqual(DEFAULT_LOGGER_CONFIG);
    });

    it('should read the log level case-insensitively', () => {
      expect(getLoggerConfigFromEnv({ CONVERGENT_LOG_LEVEL: 'DEBUG' }).level).toBe('debug');
    });

    it('should ignore an unknown log level', () => {
      expect(getLoggerConfigFromEnv({ CONVERGENT_LOG_LEVEL: 'verbose' }).level).toBe('info');
    });

    it('should enable pretty printing in development or on request', () => {
      expect(getLoggerConfigFromEnv({ NODE_ENV: 'development' }).pretty).toBe(true);
      expect(getLoggerConfigFromEnv({ CONVERGENT_LOG_PRETTY: 'true' }).pretty).toBe(true);
      expect(getLoggerConfigFromEnv({ NODE_ENV: 'production' }).pretty).toBe(false);
    });

    it('should read destination and timestamp settings', () => {
      const config = getLoggerConfigFromEnv({
        CONVERGENT_LOG_DESTINATION: '/var/log/convergent.log',
        CONVERGENT_LOG_TIMESTAMP: 'false',
      });

      expect(config.destination).toBe('/var/log/convergent.log');
      expect(config.options).toEqual({ timestamp: false });
    });
  });
});

/**
 * Tests for observability logger
 */

import type { DestinationStream } from 'pino';
import { ObservabilityLogger, logger } from '../src/logger.js';
import { getObservabilityConfig, type ObservabilityConfig } from '../src/config.js';

function captureStream(): { stream: DestinationStream; lines: () => Array<Record<string, unknown>> } {
  const raw: string[] = [];
  return {
    stream: { write: (msg: string) => { raw.push(msg); } },
    lines: () => raw.map((line): Record<string, unknown> => JSON.parse(line))
  };
}

function configFor(environment: ObservabilityConfig['environment']): ObservabilityConfig {
  return {
    environment,
    level: 'debug',
    exporters: { console: false },
    service: { name: 'sessiongate-test', version: '0.0.0' }
  };
}

describe('ObservabilityLogger', () => {
  describe('basic logging functionality', () => {
    it('writes level labels and service bindings', () => {
      const { stream, lines } = captureStream();
      const testLogger = new ObservabilityLogger(configFor('development'), stream);

      testLogger.info('Session created', { sessionPrefix: 'abcd' });

      const [entry] = lines();
      expect(entry.level).toBe('info');
      expect(entry.msg).toBe('Session created');
      expect(entry.service).toBe('sessiongate-test');
      expect(entry.sessionPrefix).toBe('abcd');
    });

    it('prefixes OAuth messages', () => {
      const { stream, lines } = captureStream();
      const testLogger = new ObservabilityLogger(configFor('development'), stream);

      testLogger.oauthWarn('State mismatch');

      expect(lines()[0].msg).toBe('[OAuth] State mismatch');
      expect(lines()[0].level).toBe('warn');
    });

    it('keeps error details outside production', () => {
      const { stream, lines } = captureStream();
      const testLogger = new ObservabilityLogger(configFor('development'), stream);

      testLogger.error('Exchange failed', new Error('upstream 502'));

      expect(lines()[0].error).toMatchObject({ name: 'Error', message: 'upstream 502' });
    });
  });

  describe('production sanitization', () => {
    it('redacts sensitive keys', () => {
      const { stream, lines } = captureStream();
      const testLogger = new ObservabilityLogger(configFor('production'), stream);

      testLogger.info('Login', { provider: 'github', accessToken: 'test-secret', nested: { password: 'pw' } });

      const [entry] = lines();
      expect(entry.provider).toBe('github');
      expect(entry.accessToken).toBe('[REDACTED]');
      expect(entry.nested).toEqual({ password: '[REDACTED]' });
    });

    it('masks emails and bearer tokens in messages', () => {
      const { stream, lines } = captureStream();
      const testLogger = new ObservabilityLogger(configFor('production'), stream);

      testLogger.warn('Rejected alice@example.com with Bearer abc.def');

      expect(lines()[0].msg).toBe('Rejected [EMAIL] with Bearer [TOKEN]');
    });

    it('hides error messages', () => {
      const { stream, lines } = captureStream();
      const testLogger = new ObservabilityLogger(configFor('production'), stream);

      testLogger.error('Store failure', new Error('connection refused to 10.0.0.1'));

      expect(lines()[0].error).toEqual({ name: 'Error', message: 'Internal server error' });
    });
  });

  describe('level filtering', () => {
    it('drops messages below the configured level', () => {
      const { stream, lines } = captureStream();
      const testLogger = new ObservabilityLogger({ ...configFor('production'), level: 'warn' }, stream);

      testLogger.info('ignored');
      testLogger.warn('kept');

      expect(lines().map((entry) => entry.msg)).toEqual(['kept']);
    });
  });

  describe('singleton logger', () => {
    it('should not throw when logging under test', () => {
      expect(() => logger.debug('Debug message')).not.toThrow();
      expect(() => logger.error('Error message', { detail: 'x' })).not.toThrow();
    });
  });

  describe('getObservabilityConfig', () => {
    const originalEnv = process.env.NODE_ENV;

    afterEach(() => {
      process.env.NODE_ENV = originalEnv;
    });

    it('detects the test environment', () => {
      process.env.NODE_ENV = 'test';
      expect(getObservabilityConfig().environment).toBe('test');
      expect(getObservabilityConfig().exporters.console).toBe(false);
    });

    it('enables pretty console output only in development', () => {
      process.env.NODE_ENV = 'development';
      expect(getObservabilityConfig().exporters.console).toBe(true);
    });
  });
});

/**
 * Tests for logger utility (src/utils/logger.ts)
 *
 * Tests the following functionality:
 * - Root logger initialization and replacement
 * - Child logger creation with context
 * - Log level management
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  initLogger,
  resetLogger,
  createLogger,
  getRootLogger,
  setLogLevel,
  isLevelEnabled,
  isLogLevel,
  flushLogger,
} from './logger.js';

describe('Logger', () => {
  let originalLevel: string | undefined;

  beforeEach(() => {
    originalLevel = process.env.LOG_LEVEL;
    delete process.env.LOG_LEVEL;
    resetLogger();
  });

  afterEach(() => {
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
    resetLogger();
  });

  describe('getRootLogger', () => {
    it('should be silent by default under test', () => {
      expect(getRootLogger().level).toBe('silent');
    });

    it('should return the same instance', () => {
      expect(getRootLogger()).toBe(getRootLogger());
    });
  });

  describe('initLogger', () => {
    it('should use the configured level', () => {
      const logger = initLogger({ level: 'warn' });

      expect(logger.level).toBe('warn');
      expect(getRootLogger()).toBe(logger);
    });

    it('should replace the default root once', () => {
      const defaultRoot = getRootLogger();
      const configured = initLogger({ level: 'info' });

      expect(configured).not.toBe(defaultRoot);
      expect(initLogger({ level: 'debug' })).toBe(configured);
      expect(configured.level).toBe('info');
    });

    it('should prefer LOG_LEVEL from the environment', () => {
      process.env.LOG_LEVEL = 'ERROR';

      expect(initLogger({ level: 'info' }).level).toBe('error');
    });

    it('should ignore an unknown LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'loud';

      expect(initLogger({ level: 'debug' }).level).toBe('debug');
    });

    it('should bind metadata to every entry', () => {
      const logger = initLogger({ level: 'info', metadata: { service: 'relay' } });

      expect(logger.bindings()).toMatchObject({ service: 'relay' });
    });
  });

  describe('createLogger', () => {
    it('should bind the context and metadata', () => {
      initLogger({ level: 'info' });
      const logger = createLogger('RelayClient', { agent: 'research' });

      expect(logger.bindings()).toMatchObject({ context: 'RelayClient', agent: 'research' });
      expect(logger.level).toBe('info');
    });
  });

  describe('log levels', () => {
    it('should change the level at runtime', () => {
      initLogger({ level: 'info' });

      expect(isLevelEnabled('debug')).toBe(false);
      setLogLevel('debug');
      expect(isLevelEnabled('debug')).toBe(true);
      expect(isLevelEnabled('trace')).toBe(false);
    });
  });

  describe('isLogLevel', () => {
    it('should accept pino levels only', () => {
      expect(isLogLevel('info')).toBe(true);
      expect(isLogLevel('fatal')).toBe(true);
      expect(isLogLevel('silent')).toBe(false);
      expect(isLogLevel('verbose')).toBe(false);
      expect(isLogLevel(undefined)).toBe(false);
    });
  });

  describe('flushLogger', () => {
    it('should resolve without a root logger', async () => {
      await expect(flushLogger()).resolves.toBeUndefined();
    });

    it('should resolve after flushing', async () => {
      initLogger({ level: 'info' });

      await expect(flushLogger()).resolves.toBeUndefined();
    });
  });
});

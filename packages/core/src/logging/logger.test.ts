import { describe, it, expect, beforeEach } from 'vitest';
import {
  createLogger,
  createNoopLogger,
  type Logger,
} from './logger.js';
import * as logging from './logger.js';

// No outputs: pino(options) writes JSON straight to stdout, no transport worker
const minimalConfig = {
  level: 'trace' as const,
  output: [],
};

describe('Logger', () => {
  describe('createLogger()', () => {
    it('should return a Logger', () => {
      const logger = createLogger(minimalConfig);
      expect(logger).toBeDefined();
      expect(logger.info).toBeTypeOf('function');
      expect(logger.debug).toBeTypeOf('function');
      expect(logger.warn).toBeTypeOf('function');
      expect(logger.error).toBeTypeOf('function');
      expect(logger.fatal).toBeTypeOf('function');
      expect(logger.trace).toBeTypeOf('function');
      expect(logger.child).toBeTypeOf('function');
    });
  });

  describe('log levels', () => {
    let logger: Logger;

    beforeEach(() => {
      logger = createLogger(minimalConfig);
    });

    it('should not throw when calling trace', () => {
      expect(() => logger.trace('trace message')).not.toThrow();
    });

    it('should not throw when calling debug', () => {
      expect(() => logger.debug('debug message')).not.toThrow();
    });

    it('should not throw when calling warn', () => {
      expect(() => logger.warn('warn message')).not.toThrow();
    });

    it('should not throw when calling error', () => {
      expect(() => logger.error('error message')).not.toThrow();
    });

    it('should accept context objects', () => {
      expect(() =>
        logger.info('with context', { path: '/tmp/Foo.vst3', component: 'test' })
      ).not.toThrow();
    });
  });

  describe('child()', () => {
    it('should create nested children', () => {
      const logger = createLogger(minimalConfig);
      const child1 = logger.child({ component: 'Resolver' });
      const child2 = child1.child({ plugin: 'Foo' });

      expect(() => child2.info('nested child message')).not.toThrow();
    });
  });

  describe('level property', () => {
    it('should expose the configured level', () => {
      const logger = createLogger(minimalConfig);
      expect(logger.level).toBe('trace');
    });

    it('should reflect config level', () => {
      const logger = createLogger({ ...minimalConfig, level: 'warn' as const });
      expect(logger.level).toBe('warn');
    });
  });

  describe('createNoopLogger()', () => {
    it('returns itself from child()', () => {
      const noop = createNoopLogger();
      expect(noop.child({ component: 'x' })).toBe(noop);
      expect(() => noop.error('dropped')).not.toThrow();
    });
  });

  it('keeps no process-wide logger', () => {
    expect(Object.keys(logging).sort()).toEqual(['createLogger', 'createNoopLogger']);
  });
});

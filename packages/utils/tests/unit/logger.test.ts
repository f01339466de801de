/**
 * Logger Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { createLogger, logger, Logger, LogLevel, winstonLogger } from '../../src/logger.js';

describe('Logger', () => {
  it('exposes the log levels', () => {
    expect(LogLevel.ERROR).toBe('error');
    expect(LogLevel.WARN).toBe('warn');
    expect(LogLevel.INFO).toBe('info');
    expect(LogLevel.DEBUG).toBe('debug');
    expect(LogLevel.TRACE).toBe('trace');
  });

  it('is silent without transports', () => {
    expect(winstonLogger.silent).toBe(true);
  });

  it('adds namespace and persistent context to every message', () => {
    const spy = vi.spyOn(winstonLogger, 'info').mockReturnValue(winstonLogger);
    const engineLogger = createLogger('@prepflow/engine');
    engineLogger.setContext({ transformId: 'example.basic' });

    engineLogger.info('Pipeline analyzing', { records: 3 });

    expect(spy).toHaveBeenCalledWith('Pipeline analyzing', {
      namespace: '@prepflow/engine',
      transformId: 'example.basic',
      records: 3,
    });
  });

  it('creates child loggers that inherit context', () => {
    const spy = vi.spyOn(winstonLogger, 'warn').mockReturnValue(winstonLogger);
    const parent = new Logger('@prepflow/cli');
    parent.setContext({ phase: 'init' });

    const child = parent.child({ artifactId: 'abc123' });
    child.warn('Skipping invalid records');

    expect(child.getNamespace()).toBe('@prepflow/cli');
    expect(child.getContext()).toEqual({ phase: 'init', artifactId: 'abc123' });
    expect(parent.getContext()).toEqual({ phase: 'init' });
    expect(spy).toHaveBeenCalledWith('Skipping invalid records', {
      namespace: '@prepflow/cli',
      phase: 'init',
      artifactId: 'abc123',
    });
  });

  it('serializes Error objects passed to error()', () => {
    const spy = vi.spyOn(winstonLogger, 'error').mockReturnValue(winstonLogger);
    const failure = new Error('disk full');

    logger.error('Write failed', failure, { path: 'artifact.json' });

    expect(spy).toHaveBeenCalledWith('Write failed', {
      namespace: 'prepflow',
      path: 'artifact.json',
      error: { message: 'disk full', stack: failure.stack, name: 'Error' },
    });
  });

  it('clears context', () => {
    const scoped = createLogger('scoped');
    scoped.setContext({ phase: 'frozen' });
    scoped.clearContext();

    expect(scoped.getContext()).toEqual({});
  });
});

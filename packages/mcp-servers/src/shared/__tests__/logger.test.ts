import { describe, it, expect } from 'vitest';
import { createLogger, isLogLevel, serializeError } from '../logger.js';

function capture(level?: 'debug' | 'info' | 'warn' | 'error') {
  const lines: string[] = [];
  const logger = createLogger('qlik-sense-mcp', { level, write: (line) => lines.push(line) });
  const entries = () => lines.map((line) => JSON.parse(line) as Record<string, unknown>);
  return { logger, entries };
}

describe('createLogger', () => {
  it('should write one JSON entry per call', () => {
    const { logger, entries } = capture('info');

    logger.info('Fetched apps', { count: 3 });

    expect(entries()).toEqual([{
      '@timestamp': expect.any(String),
      level: 'info',
      service: 'qlik-sense-mcp',
      message: 'Fetched apps',
      count: 3,
    }]);
  });

  it('should drop entries below the configured level', () => {
    const { logger, entries } = capture('warn');

    logger.debug('noise');
    logger.info('noise');
    logger.warn('kept');
    logger.error('kept too');

    expect(entries().map((entry) => entry.level)).toEqual(['warn', 'error']);
  });

  it('should serialize errors in context', () => {
    const { logger, entries } = capture('debug');

    logger.error('Tool call failed', { error: new TypeError('bad input') });

    expect(entries()[0].error).toEqual({ message: 'bad input', name: 'TypeError' });
  });

  it('should scope child loggers', () => {
    const { logger, entries } = capture('debug');

    logger.child('qrs').child('retry').info('attempt');

    expect(entries()[0].service).toBe('qlik-sense-mcp:qrs:retry');
  });
});

describe('isLogLevel', () => {
  it('should accept only known level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(1)).toBe(false);
  });
});

describe('serializeError', () => {
  it('should stringify non-error values', () => {
    expect(serializeError('plain')).toEqual({ message: 'plain' });
  });
});

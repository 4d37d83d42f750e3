/**
 * Tests for the component logger
 */
import { jest } from '@jest/globals';
import {
  createLogger,
  getLogLevel,
  isDebugMode,
  isLogLevel,
  setDebugMode,
  setLogLevel,
  setLogSink,
  type LogEntry,
} from '../utils/logger.js';

describe('Logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setDebugMode(false);
    setLogLevel('warn');
    setLogSink((entry) => entries.push(entry));
  });

  afterEach(() => {
    setLogSink(null);
    setDebugMode(false);
    setLogLevel('warn');
    jest.restoreAllMocks();
  });

  it('should drop entries below the global level', () => {
    const logger = createLogger('Test');
    logger.debug('d');
    logger.info('i');

    expect(entries).toHaveLength(0);
  });

  it('should emit entries at or above the global level', () => {
    const logger = createLogger('Test');
    logger.warn('careful', { bytes: 3 });
    logger.error('failed');

    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({
      level: 'warn',
      component: 'Test',
      message: 'careful',
      context: { bytes: 3 },
    });
    expect(entries[1]).toMatchObject({ level: 'error', message: 'failed' });
    expect(entries[1].context).toBeUndefined();
    expect(typeof entries[0].timestamp).toBe('number');
  });

  it('should follow setLogLevel', () => {
    const logger = createLogger('Test');
    setLogLevel('error');
    logger.warn('hidden');
    setLogLevel('info');
    logger.info('shown');

    expect(getLogLevel()).toBe('info');
    expect(entries.map((e) => e.message)).toEqual(['shown']);
  });

  it('should emit every level in debug mode', () => {
    const logger = createLogger('Test');
    setLogLevel('error');
    setDebugMode(true);
    logger.debug('trace me');

    expect(isDebugMode()).toBe(true);
    expect(logger.isEnabled('debug')).toBe(true);
    expect(entries.map((e) => e.level)).toEqual(['debug']);
  });

  it('should write to the console by default', () => {
    setLogSink(null);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('Codec');

    logger.warn('hello');
    logger.warn('with context', { a: 1 });

    expect(warn).toHaveBeenNthCalledWith(1, '[nalu:Codec] hello');
    expect(warn).toHaveBeenNthCalledWith(2, '[nalu:Codec] with context', { a: 1 });
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(30)).toBe(false);
  });
});

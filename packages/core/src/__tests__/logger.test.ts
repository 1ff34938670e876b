import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  Logger,
  createLogger,
  createQuietLogger,
  isDebugMode,
  setDebugMode,
  type LogEntry,
} from '../observability/logger.js';

function collect(level: 'debug' | 'info' | 'warn' | 'error' = 'info') {
  const entries: LogEntry[] = [];
  const logger = createLogger({ module: 'test', level, handler: (entry) => entries.push(entry) });
  return { entries, logger };
}

describe('Logger', () => {
  afterEach(() => {
    setDebugMode(false);
    vi.restoreAllMocks();
  });

  describe('creation', () => {
    it('should create via factory', () => {
      expect(createLogger({ module: 'test' })).toBeInstanceOf(Logger);
    });

    it('should derive child module names', () => {
      const child = createLogger({ module: 'gateway' }).child('relay');
      expect(child.module).toBe('gateway:relay');
      expect(child.child('decoder').module).toBe('gateway:relay:decoder');
    });

    it('should pass the handler on to children', () => {
      const { entries, logger } = collect();
      logger.child('buffer').info('flushed');
      expect(entries.map((e) => e.module)).toEqual(['test:buffer']);
    });
  });

  describe('log levels', () => {
    it('should drop debug at the default level', () => {
      const { entries, logger } = collect();
      logger.debug('debug msg');
      logger.info('info msg');
      logger.warn('warn msg');
      logger.error('error msg');
      expect(entries.map((e) => e.level)).toEqual(['info', 'warn', 'error']);
    });

    it('should only emit errors at error level', () => {
      const { entries, logger } = collect('error');
      logger.info('info');
      logger.warn('warn');
      logger.error('error');
      expect(entries).toHaveLength(1);
    });

    it('should treat quiet loggers as error level', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      createQuietLogger('quiet').warn('hidden');
      expect(spy).not.toHaveBeenCalled();
    });
  });

  describe('debug mode', () => {
    it('should toggle global debug mode', () => {
      setDebugMode(true);
      expect(isDebugMode()).toBe(true);
      setDebugMode(false);
      expect(isDebugMode()).toBe(false);
    });

    it('should override level when debug mode is on', () => {
      const { entries, logger } = collect('error');
      setDebugMode(true);
      logger.debug('visible');
      expect(entries).toHaveLength(1);
    });
  });

  describe('entries', () => {
    it('should attach error details to the context', () => {
      const { entries, logger } = collect();
      const error = new Error('boom');
      logger.error('failed', error, { topic: 'a/b' });

      expect(entries[0]?.context).toEqual({
        topic: 'a/b',
        error: { message: 'boom', stack: error.stack },
      });
    });

    it('should omit context when none is given', () => {
      const { entries, logger } = collect();
      logger.info('plain');
      expect(entries[0]).not.toHaveProperty('context');
    });

    it('should log timings at debug level', () => {
      const { entries, logger } = collect('debug');
      const end = logger.time('flush');
      end({ records: 3 });

      expect(entries[0]?.message).toBe('flush completed');
      expect(entries[0]?.context?.['records']).toBe(3);
      expect(typeof entries[0]?.context?.['durationMs']).toBe('number');
    });
  });

  describe('console output', () => {
    it('should write text lines', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      vi.spyOn(Date, 'now').mockReturnValue(Date.UTC(2024, 0, 2, 3, 4, 5));

      createLogger({ module: 'server' }).info('Listening', { port: 5000 });

      expect(spy).toHaveBeenCalledWith('2024-01-02T03:04:05.000Z INFO [server] Listening {"port":5000}');
    });

    it('should write JSON lines', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      vi.spyOn(Date, 'now').mockReturnValue(1000);

      createLogger({ module: 'relay', format: 'json' }).warn('Dropped message');

      expect(spy).toHaveBeenCalledWith(
        '{"level":"warn","message":"Dropped message","timestamp":1000,"module":"relay"}'
      );
    });
  });
});

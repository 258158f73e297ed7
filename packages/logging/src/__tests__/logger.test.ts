/**
 * Tests for the structured logger and its transports
 */

import { describe, it, expect, vi } from 'vitest';

import {
  ConsoleTransport,
  type LogEntry,
  LogLevel,
  Logger,
  LoggerFactory,
  MemoryTransport,
  formatJson,
  formatText,
  parseLogLevel,
} from '../index.js';

const timestamp = new Date('2024-01-02T03:04:05.000Z');

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return { timestamp, level: LogLevel.INFO, component: 'app', message: 'hello', ...overrides };
}

describe('Logging', () => {
  describe('parseLogLevel', () => {
    it('should parse level names case-insensitively', () => {
      expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
      expect(parseLogLevel(' Error ')).toBe(LogLevel.ERROR);
      expect(parseLogLevel('warning')).toBe(LogLevel.WARN);
      expect(parseLogLevel(LogLevel.SILENT)).toBe(LogLevel.SILENT);
    });

    it('should reject unknown level names', () => {
      expect(() => parseLogLevel('verbose')).toThrow('Invalid log level: verbose');
    });
  });

  describe('Logger', () => {
    it('should drop entries below its level', () => {
      const { logger, transport } = LoggerFactory.createMemoryLogger('app', 'WARN');

      logger.debug('debug message');
      logger.info('info message');
      logger.warn('warn message');
      logger.error('error message');

      expect(transport.messages()).toEqual(['warn message', 'error message']);
    });

    it('should write nothing when silent', () => {
      const { logger, transport } = LoggerFactory.createMemoryLogger('app', LogLevel.SILENT);

      logger.error('error message');

      expect(transport.entries).toHaveLength(0);
      expect(logger.isLevelEnabled(LogLevel.SILENT)).toBe(false);
    });

    it('should change level at runtime', () => {
      const { logger, transport } = LoggerFactory.createMemoryLogger('app', 'INFO');

      logger.debug('hidden');
      logger.setLevel('debug');
      logger.debug('shown');

      expect(logger.getLevel()).toBe(LogLevel.DEBUG);
      expect(transport.messages(LogLevel.DEBUG)).toEqual(['shown']);
    });

    it('should attach data and errors to entries', () => {
      const { logger, transport } = LoggerFactory.createMemoryLogger('app');
      const failure = new Error('boom');

      logger.info('plain');
      logger.error('failed', failure, { attempt: 2 });
      logger.error('not an error', 'boom');

      const [plain, failed, notAnError] = transport.entries;
      expect(plain).not.toHaveProperty('data');
      expect(failed?.data).toEqual({ attempt: 2 });
      expect(failed?.error).toBe(failure);
      expect(notAnError).not.toHaveProperty('error');
    });

    it('should share transports with children and merge bindings', () => {
      const { logger, transport } = LoggerFactory.createMemoryLogger('app');
      const child = logger.child('worker', { job: 'sync' }).child('task', { step: 1 });

      child.info('started', { step: 2 });

      expect(child.getComponent()).toBe('app:worker:task');
      expect(transport.entries[0]?.component).toBe('app:worker:task');
      expect(transport.entries[0]?.data).toEqual({ job: 'sync', step: 2 });
    });

    it('should manage transports', async () => {
      const first = new MemoryTransport();
      const second = new MemoryTransport();
      const logger = new Logger({ component: 'app', level: 'INFO', transports: [first] });

      logger.addTransport(second);
      logger.info('both');
      logger.removeTransport('memory');
      logger.info('neither');
      await logger.close();

      expect(first.messages()).toEqual(['both']);
      expect(second.messages()).toEqual(['both']);
    });
  });

  describe('formatting', () => {
    it('should format text lines', () => {
      expect(formatText(entry({ data: { a: 1 } }))).toBe(
        '2024-01-02T03:04:05.000Z INFO [app] hello {"a":1}'
      );
      expect(formatText(entry({ level: LogLevel.WARN, data: {} }))).toBe(
        '2024-01-02T03:04:05.000Z WARN [app] hello'
      );
    });

    it('should color the level when asked', () => {
      expect(formatText(entry(), true)).toBe(
        '2024-01-02T03:04:05.000Z \x1b[32mINFO\x1b[0m [app] hello'
      );
    });

    it('should append the error stack', () => {
      const error = new Error('boom');
      error.stack = 'Error: boom\n    at test';

      expect(formatText(entry({ level: LogLevel.ERROR, error }))).toBe(
        '2024-01-02T03:04:05.000Z ERROR [app] hello\nError: boom\n    at test'
      );
    });

    it('should format JSON lines', () => {
      expect(JSON.parse(formatJson(entry({ data: { attempt: 1 } })))).toEqual({
        timestamp: '2024-01-02T03:04:05.000Z',
        level: 'INFO',
        component: 'app',
        message: 'hello',
        data: { attempt: 1 },
      });
    });
  });

  describe('ConsoleTransport', () => {
    it('should route entries to the console method for their level', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      const transport = new ConsoleTransport({ format: 'json', colors: false });

      await transport.log(entry({ level: LogLevel.WARN, message: 'careful' }));

      expect(debug).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith(
        '{"timestamp":"2024-01-02T03:04:05.000Z","level":"WARN","component":"app","message":"careful"}'
      );
    });

    it('should be the default transport', () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
      const logger = new Logger({ component: 'app', level: 'INFO' });

      logger.info('hello');

      expect(info).toHaveBeenCalledOnce();
    });
  });
});

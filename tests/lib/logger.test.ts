import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  StructuredLogger,
  beginRequest,
  endRequest,
  isLogLevel,
  loggers,
  setLogLevel,
  type LogEntry,
} from '../../src/lib/logger.js';

function parse(line: string | undefined): LogEntry {
  return JSON.parse(line ?? '');
}

describe('StructuredLogger', () => {
  let lines: string[];
  let logger: StructuredLogger;

  beforeEach(() => {
    lines = [];
    logger = new StructuredLogger('TestComponent', { minLevel: 'debug', sink: (line) => lines.push(line) });
  });

  describe('Basic Logging', () => {
    it('should write one JSON line per entry', () => {
      logger.info('Token derived', { token: 'user' });

      expect(lines).toHaveLength(1);
      const entry = parse(lines[0]);
      expect(entry.level).toBe('info');
      expect(entry.message).toBe('Token derived');
      expect(entry.component).toBe('TestComponent');
      expect(entry.context).toEqual({ token: 'user' });
      expect(Number.isNaN(Date.parse(entry.timestamp))).toBe(false);
    });

    it('should keep metadata separate from context', () => {
      logger.debug('Exchange request started', { url: 'https://example.test' }, { attempt: 1 });

      expect(parse(lines[0]).metadata).toEqual({ attempt: 1 });
    });

    it('should record error details', () => {
      const error = Object.assign(new Error('write failed'), { code: 'EACCES' });

      logger.error('Token file write failed', error, { file: '/tmp/tokens.json' });

      const entry = parse(lines[0]);
      expect(entry.error?.name).toBe('Error');
      expect(entry.error?.message).toBe('write failed');
      expect(entry.error?.code).toBe('EACCES');
      expect(entry.error?.stack).toContain('write failed');
    });

    it('should omit the stack when configured', () => {
      const quiet = new StructuredLogger('Quiet', { includeStack: false, sink: (line) => lines.push(line) });

      quiet.error('failed', new Error('boom'));

      expect(parse(lines[0]).error?.stack).toBeUndefined();
    });
  });

  describe('Log Levels', () => {
    it('should default to warn', () => {
      const defaults = new StructuredLogger('Defaults', { sink: (line) => lines.push(line) });

      defaults.debug('hidden');
      defaults.info('hidden');
      defaults.warn('shown');
      defaults.error('shown');

      expect(lines.map((line) => parse(line).level)).toEqual(['warn', 'error']);
    });

    it('should follow setMinLevel', () => {
      logger.setMinLevel('error');
      logger.warn('hidden');
      logger.error('shown');

      expect(lines).toHaveLength(1);
      expect(logger.getMinLevel()).toBe('error');
    });

    it('should recognise level names', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('trace')).toBe(false);
    });
  });

  describe('Request ID', () => {
    it('should attach the current request id', () => {
      logger.pushRequestId('req-1');
      logger.info('inside');
      logger.popRequestId();
      logger.info('outside');

      expect(parse(lines[0]).context).toEqual({ requestId: 'req-1' });
      expect(parse(lines[1]).context).toBeUndefined();
    });

    it('should not override an explicit request id', () => {
      logger.pushRequestId('req-outer');
      logger.info('explicit', { requestId: 'req-inner' });

      expect(parse(lines[0]).context?.requestId).toBe('req-inner');
    });

    it('should support nesting', () => {
      logger.pushRequestId('req-outer');
      logger.pushRequestId('req-inner');
      expect(logger.getCurrentRequestId()).toBe('req-inner');
      logger.popRequestId();
      expect(logger.getCurrentRequestId()).toBe('req-outer');
    });
  });
});

describe('default loggers', () => {
  afterEach(() => {
    setLogLevel('warn');
    vi.restoreAllMocks();
  });

  it('should write to stderr', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    loggers.store.warn('Token file is not valid JSON, starting empty');

    expect(stderr).toHaveBeenCalledOnce();
    expect(stdout).not.toHaveBeenCalled();
  });

  it('should set the level on every logger', () => {
    setLogLevel('debug');

    expect(Object.values(loggers).map((logger) => logger.getMinLevel())).toEqual(['debug', 'debug', 'debug', 'debug']);
  });

  it('should share one request id across loggers for a command', () => {
    const id = beginRequest('req-cli');

    expect(loggers.auth.getCurrentRequestId()).toBe(id);
    expect(loggers.exchange.getCurrentRequestId()).toBe('req-cli');
    endRequest();
    expect(loggers.cli.getCurrentRequestId()).toBeUndefined();
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  StructuredLogger,
  consoleSink,
  createLoggers,
  isLogLevel,
} from '../../src/lib/logger.js';
import type { LogEntry, LogLevel, LogSink } from '../../src/lib/logger.js';
import { ApiError } from '../../src/lib/errors.js';

function collectingSink(): { sink: LogSink; entries: () => LogEntry[]; levels: LogLevel[] } {
  const lines: string[] = [];
  const levels: LogLevel[] = [];
  return {
    sink: (line, level) => {
      lines.push(line);
      levels.push(level);
    },
    entries: () => lines.map((line) => JSON.parse(line)),
    levels,
  };
}

describe('StructuredLogger', () => {
  let output: ReturnType<typeof collectingSink>;
  let logger: StructuredLogger;

  beforeEach(() => {
    output = collectingSink();
    logger = new StructuredLogger('TestComponent', { minLevel: 'debug', sink: output.sink });
  });

  describe('Basic Logging', () => {
    it('should log info messages as JSON', () => {
      logger.info('Test message');

      const [entry] = output.entries();
      expect(entry.level).toBe('info');
      expect(entry.message).toBe('Test message');
      expect(entry.component).toBe('TestComponent');
      expect(entry.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    });

    it('should log with context and metadata', () => {
      logger.info('API request completed', { method: 'GET', url: '/teams/search', statusCode: 200 }, { page: 1 });

      const [entry] = output.entries();
      expect(entry.context).toEqual({ method: 'GET', url: '/teams/search', statusCode: 200 });
      expect(entry.metadata).toEqual({ page: 1 });
    });

    it('should pass the level to the sink', () => {
      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(output.levels).toEqual(['debug', 'info', 'warn', 'error']);
    });
  });

  describe('Log Level Filtering', () => {
    it('should drop messages below the minimum level', () => {
      const filtered = collectingSink();
      const warnLogger = new StructuredLogger('Filtered', { minLevel: 'warn', sink: filtered.sink });

      warnLogger.debug('hidden');
      warnLogger.info('hidden');
      warnLogger.warn('shown');
      warnLogger.error('shown');

      expect(filtered.entries().map((entry) => entry.level)).toEqual(['warn', 'error']);
    });

    it('should change level at runtime', () => {
      logger.setMinLevel('error');
      logger.warn('hidden');
      logger.error('shown');

      expect(output.entries()).toHaveLength(1);
    });
  });

  describe('Error Logging', () => {
    it('should include error name, message and code', () => {
      logger.error('Request failed', new ApiError(404, 'GET /teams/1 failed with 404: Not Found'));

      const [entry] = output.entries();
      expect(entry.error?.name).toBe('ApiError');
      expect(entry.error?.message).toBe('GET /teams/1 failed with 404: Not Found');
      expect(entry.error?.code).toBe('API_ERROR');
      expect(entry.error?.stack).toBeDefined();
    });

    it('should omit the stack when includeStack is false', () => {
      const quiet = collectingSink();
      const noStack = new StructuredLogger('NoStack', { sink: quiet.sink, includeStack: false });

      noStack.error('Boom', new Error('boom'));

      expect(quiet.entries()[0].error?.stack).toBeUndefined();
    });
  });

  describe('Request ID Tracking', () => {
    it('should attach the current request id to entries', () => {
      const id = logger.pushRequestId('req-1');
      logger.info('inside');
      logger.popRequestId();
      logger.info('outside');

      const [inside, outside] = output.entries();
      expect(id).toBe('req-1');
      expect(inside.context?.requestId).toBe('req-1');
      expect(outside.context).toBeUndefined();
    });

    it('should support nested request ids', () => {
      logger.pushRequestId('outer');
      logger.pushRequestId('inner');
      expect(logger.getCurrentRequestId()).toBe('inner');
      logger.popRequestId();
      expect(logger.getCurrentRequestId()).toBe('outer');
      logger.popRequestId();
      expect(logger.getCurrentRequestId()).toBeUndefined();
    });

    it('should generate an id when none is given', () => {
      const id = logger.pushRequestId();

      expect(id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should keep an explicit request id in the context', () => {
      logger.pushRequestId('stack-id');
      logger.info('explicit', { requestId: 'explicit-id' });

      expect(output.entries()[0].context?.requestId).toBe('explicit-id');
    });
  });

  describe('trackAsync', () => {
    it('should log completion with a duration', async () => {
      const result = await logger.trackAsync('Load teams', async () => 42, { url: '/teams' });

      const [entry] = output.entries();
      expect(result).toBe(42);
      expect(entry.message).toBe('Load teams completed');
      expect(entry.context?.url).toBe('/teams');
      expect(typeof entry.context?.duration).toBe('number');
    });

    it('should log and rethrow failures', async () => {
      await expect(
        logger.trackAsync('Load teams', async () => {
          throw new Error('network down');
        })
      ).rejects.toThrow('network down');

      const [entry] = output.entries();
      expect(entry.level).toBe('error');
      expect(entry.message).toBe('Load teams failed');
      expect(entry.error?.message).toBe('network down');
    });
  });
});

describe('consoleSink', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should route levels to matching console methods', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    consoleSink('info-line', 'info');
    consoleSink('warn-line', 'warn');
    consoleSink('error-line', 'error');

    expect(log).toHaveBeenCalledWith('info-line');
    expect(warn).toHaveBeenCalledWith('warn-line');
    expect(error).toHaveBeenCalledWith('error-line');
  });
});

describe('createLoggers', () => {
  it('should create one logger per component with shared config', () => {
    const output = collectingSink();
    const set = createLoggers({ minLevel: 'info', sink: output.sink });

    set.api.info('a');
    set.auth.info('b');
    set.store.info('c');
    set.mcp.info('d');
    set.cli.info('e');

    expect(output.entries().map((entry) => entry.component)).toEqual(['API', 'Auth', 'TokenStore', 'MCP', 'CLI']);
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

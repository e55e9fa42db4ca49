import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  createLogger,
  configureLogging,
  resetLogging,
  NEVER_LOG_FIELDS,
  META_STRING_MAX_LENGTH,
  type LogEntry,
} from './logger.js';
import { createTestSink } from '../testing/factories.js';

describe('Logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    const test = createTestSink();
    entries = test.entries;
    configureLogging({ level: 'debug', sink: test.sink });
  });

  afterEach(() => {
    resetLogging();
    vi.restoreAllMocks();
  });

  // -----------------------------------------------------------------------
  // Entry structure
  // -----------------------------------------------------------------------

  describe('log entry structure', () => {
    it('writes level, ts, component and msg', () => {
      createLogger('catalog-client').info('search');
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({ level: 'info', component: 'catalog-client', msg: 'search' });
      expect(new Date(entries[0].ts).toISOString()).toBe(entries[0].ts);
    });

    it('keeps metadata under meta', () => {
      createLogger('test').debug('hits', { query: 'fastapi', hits: 3 });
      expect(entries[0].meta).toEqual({ query: 'fastapi', hits: 3 });
    });

    it('omits meta when none is given', () => {
      createLogger('test').warn('plain');
      expect(entries[0]).not.toHaveProperty('meta');
    });
  });

  // -----------------------------------------------------------------------
  // Level filtering
  // -----------------------------------------------------------------------

  describe('level filtering', () => {
    it('drops entries below the configured level', () => {
      configureLogging({ level: 'warn' });
      const logger = createLogger('test');
      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');
      expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
    });

    it('resetLogging restores info level and the stdout sink', () => {
      const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      resetLogging();
      const logger = createLogger('test');
      logger.debug('hidden');
      logger.info('shown', { n: 1 });

      expect(entries).toHaveLength(0);
      expect(write).toHaveBeenCalledTimes(1);
      const line = String(write.mock.calls[0][0]);
      expect(line.endsWith('\n')).toBe(true);
      expect(JSON.parse(line)).toMatchObject({ level: 'info', msg: 'shown', meta: { n: 1 } });
    });
  });

  // -----------------------------------------------------------------------
  // Child loggers and context
  // -----------------------------------------------------------------------

  describe('child loggers', () => {
    it('prefixes the sub-component', () => {
      createLogger('server').child('http').info('x');
      expect(entries[0].component).toBe('server:http');
    });

    it('keeps bound context', () => {
      createLogger('server', { correlation: 'c-1' }).child('http').info('x');
      expect(entries[0].correlation).toBe('c-1');
    });
  });

  describe('withContext', () => {
    it('promotes correlation and tool to the entry', () => {
      createLogger('executor').withContext({ correlation: 'c-9', tool: 'get_library_docs' }).info('x');
      expect(entries[0]).toMatchObject({ correlation: 'c-9', tool: 'get_library_docs' });
    });

    it('merges with existing context', () => {
      createLogger('executor', { correlation: 'c-1' }).withContext({ tool: 'resolve_library_id' }).info('x');
      expect(entries[0]).toMatchObject({ correlation: 'c-1', tool: 'resolve_library_id' });
    });

    it('lets meta fields override bound context', () => {
      createLogger('executor', { correlation: 'c-1' }).info('x', { correlation: 'c-2' });
      expect(entries[0].correlation).toBe('c-2');
      expect(entries[0]).not.toHaveProperty('meta');
    });
  });

  describe('promoted metadata fields', () => {
    it('lifts duration_ms, ok and error_code out of meta', () => {
      createLogger('executor').error('failed', {
        duration_ms: 12,
        ok: false,
        error_code: 'LIBRARY_NOT_FOUND',
        attempt: 1,
      });
      expect(entries[0]).toMatchObject({ duration_ms: 12, ok: false, error_code: 'LIBRARY_NOT_FOUND' });
      expect(entries[0].meta).toEqual({ attempt: 1 });
    });
  });

  // -----------------------------------------------------------------------
  // Sanitization
  // -----------------------------------------------------------------------

  describe('error serialization', () => {
    it('serializes Error objects in metadata', () => {
      const err = new TypeError('fetch failed');
      createLogger('test').error('boom', { error: err });
      expect(entries[0].meta?.['error']).toEqual({
        name: 'TypeError',
        message: 'fetch failed',
        stack: err.stack,
      });
    });
  });

  describe('NEVER_LOG_FIELDS', () => {
    it('strips secret-bearing keys from metadata', () => {
      createLogger('test').info('call', {
        api_key: 'test-secret',
        authorization: 'Bearer test-secret',
        encryption_key: 'test-secret',
        query: 'fastapi',
      });
      expect(entries[0].meta).toEqual({ query: 'fastapi' });
    });

    it('omits meta entirely when every field is denied', () => {
      const meta: Record<string, unknown> = {};
      for (const key of NEVER_LOG_FIELDS) meta[key] = 'test-secret';
      createLogger('test').info('call', meta);
      expect(entries[0]).not.toHaveProperty('meta');
    });
  });

  describe('metadata string truncation', () => {
    it('truncates long strings', () => {
      createLogger('test').info('big', { body: 'x'.repeat(META_STRING_MAX_LENGTH + 10) });
      expect(entries[0].meta?.['body']).toBe('x'.repeat(META_STRING_MAX_LENGTH) + '...[truncated]');
    });

    it('keeps strings at the limit', () => {
      const body = 'y'.repeat(META_STRING_MAX_LENGTH);
      createLogger('test').info('edge', { body });
      expect(entries[0].meta?.['body']).toBe(body);
    });
  });
});

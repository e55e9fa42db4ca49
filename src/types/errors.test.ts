import { describe, it, expect } from 'vitest';
import { ErrorCode, ERROR_RETRIABLE_DEFAULTS, ERROR_HTTP_STATUS } from './errors.js';

describe('ErrorCode', () => {
  it('maps each key to the same string value', () => {
    for (const [key, value] of Object.entries(ErrorCode)) {
      expect(value).toBe(key);
    }
  });

  it('names exactly the codes a tool response can carry', () => {
    expect(Object.values(ErrorCode)).toEqual([
      'VALIDATION_FAILED',
      'INVALID_REQUEST',
      'UNKNOWN_TOOL',
      'LIBRARY_NOT_FOUND',
      'DOCUMENTATION_NOT_FOUND',
      'ENCRYPTION_CONFIG',
      'TOOL_TIMEOUT',
      'INTERNAL_ERROR',
    ]);
  });

  it('has a retriable default and an HTTP status for every code', () => {
    const codes = Object.values(ErrorCode).sort();
    expect(Object.keys(ERROR_RETRIABLE_DEFAULTS).sort()).toEqual(codes);
    expect(Object.keys(ERROR_HTTP_STATUS).sort()).toEqual(codes);
  });

  it('marks only transient failures as retriable', () => {
    const retriable = Object.entries(ERROR_RETRIABLE_DEFAULTS)
      .filter(([, value]) => value)
      .map(([code]) => code)
      .sort();
    expect(retriable).toEqual(['TOOL_TIMEOUT']);
  });

  it('maps not-found codes to 404 and request problems to 400', () => {
    expect(ERROR_HTTP_STATUS.LIBRARY_NOT_FOUND).toBe(404);
    expect(ERROR_HTTP_STATUS.DOCUMENTATION_NOT_FOUND).toBe(404);
    expect(ERROR_HTTP_STATUS.UNKNOWN_TOOL).toBe(404);
    expect(ERROR_HTTP_STATUS.VALIDATION_FAILED).toBe(400);
    expect(ERROR_HTTP_STATUS.INVALID_REQUEST).toBe(400);
    expect(ERROR_HTTP_STATUS.TOOL_TIMEOUT).toBe(504);
  });
});

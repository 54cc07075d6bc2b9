import { describe, expect, it } from 'vitest';
import {
  CacheInconsistencyError,
  ConfigurationError,
  ErrorCode,
  TransportError,
  isConditionalFetchError,
} from '../errors.js';

describe('errors', () => {
  it('keeps the cause of a transport failure', () => {
    const cause = new Error('getaddrinfo ENOTFOUND cdn.test');
    const error = new TransportError('https://cdn.test/a', cause);

    expect(error.code).toBe(ErrorCode.TRANSPORT_FAILURE);
    expect(error.message).toBe('Request to https://cdn.test/a failed: getaddrinfo ENOTFOUND cdn.test');
    expect(error.cause).toBe(cause);
  });

  it('serializes code, message and metadata', () => {
    const error = new CacheInconsistencyError('/c', 'origin replied 304 Not Modified but no body is cached');

    expect(error.toJSON()).toEqual({
      code: 'CACHE_INCONSISTENCY',
      message: 'Cache inconsistency for /c: origin replied 304 Not Modified but no body is cached',
      metadata: { resourceId: '/c' },
    });
  });

  it('recognises its own errors only', () => {
    expect(isConditionalFetchError(new ConfigurationError('bad budget'))).toBe(true);
    expect(isConditionalFetchError(new Error('plain'))).toBe(false);
  });
});

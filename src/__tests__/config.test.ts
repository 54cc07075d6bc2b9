import { describe, expect, it } from 'vitest';
import {
  DEFAULT_MAX_BYTES,
  buildFetchContext,
  normalizeResources,
  parsePositiveInteger,
  parseScheme,
} from '../config.js';
import { ConfigurationError } from '../errors.js';

describe('buildFetchContext', () => {
  it('applies defaults', () => {
    expect(buildFetchContext(['/a.png'], { host: 'cdn.test' }, {})).toEqual({
      host: 'cdn.test',
      scheme: 'https',
      resources: ['/a.png'],
      maxBytes: DEFAULT_MAX_BYTES,
      repeat: 2,
      timeoutMs: 30_000,
      verbose: false,
    });
  });

  it('falls back to the environment', () => {
    const context = buildFetchContext(['/a.png'], {}, {
      FETCH_HOST: 'env.test:8080',
      FETCH_SCHEME: 'HTTP',
      CACHE_MAX_BYTES: '1024',
      FETCH_TIMEOUT_MS: '500',
    });

    expect(context.host).toBe('env.test:8080');
    expect(context.scheme).toBe('http');
    expect(context.maxBytes).toBe(1024);
    expect(context.timeoutMs).toBe(500);
  });

  it('prefers flags over the environment', () => {
    const context = buildFetchContext(
      ['/a.png'],
      { host: 'flag.test', maxBytes: '2048', repeat: '3', verbose: true },
      { FETCH_HOST: 'env.test', CACHE_MAX_BYTES: '1024' },
    );

    expect(context.host).toBe('flag.test');
    expect(context.maxBytes).toBe(2048);
    expect(context.repeat).toBe(3);
    expect(context.verbose).toBe(true);
  });

  it('requires a host', () => {
    expect(() => buildFetchContext(['/a.png'], {}, {})).toThrow('A host is required: pass --host or set FETCH_HOST.');
  });

  it('requires at least one resource', () => {
    expect(() => buildFetchContext(['  '], { host: 'cdn.test' }, {})).toThrow(ConfigurationError);
  });
});

describe('parsePositiveInteger', () => {
  it('returns the fallback for missing or blank input', () => {
    expect(parsePositiveInteger(undefined, 7, 'repeat')).toBe(7);
    expect(parsePositiveInteger(' ', 7, 'repeat')).toBe(7);
  });

  it('floors fractional values', () => {
    expect(parsePositiveInteger('10.9', 7, 'repeat')).toBe(10);
  });

  it.each(['0', '0.5', '-5', 'lots'])('rejects %s', (value) => {
    expect(() => parsePositiveInteger(value, 7, 'max-bytes')).toThrow('Option --max-bytes must be a positive number.');
  });
});

describe('parseScheme', () => {
  it('defaults to https', () => {
    expect(parseScheme(undefined)).toBe('https');
  });

  it('rejects anything but http and https', () => {
    expect(() => parseScheme('ftp')).toThrow('Option --scheme must be http or https, received "ftp".');
  });
});

describe('normalizeResources', () => {
  it('adds a leading slash, trims and drops duplicates', () => {
    expect(normalizeResources([' images/a.png ', '/images/a.png', '', '/b.css'])).toEqual(['/images/a.png', '/b.css']);
  });
});

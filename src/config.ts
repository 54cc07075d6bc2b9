import { ConfigurationError } from './errors.js';
import type { Scheme } from './clients/transport.js';

export const DEFAULT_MAX_BYTES = 200 * 1024;
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_REPEAT = 2;

export interface RawFetchOptions {
  host?: string;
  scheme?: string;
  maxBytes?: string;
  repeat?: string;
  timeout?: string;
  verbose?: boolean;
}

export interface FetchContext {
  host: string;
  scheme: Scheme;
  resources: string[];
  maxBytes: number;
  repeat: number;
  timeoutMs: number;
  verbose: boolean;
}

type Env = Record<string, string | undefined>;

/** Flags take precedence over `FETCH_HOST`, `FETCH_SCHEME`, `CACHE_MAX_BYTES` and `FETCH_TIMEOUT_MS`. */
export function buildFetchContext(resources: string[], raw: RawFetchOptions, env: Env = process.env): FetchContext {
  const host = (raw.host ?? env.FETCH_HOST)?.trim();
  if (!host) {
    throw new ConfigurationError('A host is required: pass --host or set FETCH_HOST.');
  }

  const normalizedResources = normalizeResources(resources);
  if (normalizedResources.length === 0) {
    throw new ConfigurationError('At least one resource path is required.');
  }

  return {
    host,
    scheme: parseScheme(raw.scheme ?? env.FETCH_SCHEME),
    resources: normalizedResources,
    maxBytes: parsePositiveInteger(raw.maxBytes ?? env.CACHE_MAX_BYTES, DEFAULT_MAX_BYTES, 'max-bytes'),
    repeat: parsePositiveInteger(raw.repeat, DEFAULT_REPEAT, 'repeat'),
    timeoutMs: parsePositiveInteger(raw.timeout ?? env.FETCH_TIMEOUT_MS, DEFAULT_TIMEOUT_MS, 'timeout'),
    verbose: raw.verbose ?? false,
  };
}

export function parsePositiveInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Math.floor(Number(value));
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new ConfigurationError(`Option --${flagName} must be a positive number.`, { flag: flagName, value });
  }
  return parsed;
}

export function parseScheme(value: string | undefined): Scheme {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return 'https';
  }
  if (normalized === 'http' || normalized === 'https') {
    return normalized;
  }
  throw new ConfigurationError(`Option --scheme must be http or https, received "${value}".`, { value });
}

/** Trims, prefixes a missing leading slash and drops duplicates while keeping order. */
export function normalizeResources(resources: string[]): string[] {
  const seen = new Set<string>();
  const normalized: string[] = [];
  for (const raw of resources) {
    const trimmed = raw.trim();
    if (!trimmed) {
      continue;
    }
    const path = trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
    if (seen.has(path)) {
      continue;
    }
    seen.add(path);
    normalized.push(path);
  }
  return normalized;
}

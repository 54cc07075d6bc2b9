import { ConfigurationError } from '../errors.js';
import type { CacheEntry, CacheField, Logger } from '../types/index.js';
import { CACHE_FIELDS } from '../types/index.js';
import { decodeText, plural, truncate } from '../utils/text.js';
import type { ResourceCache } from './cache.js';
import { RecencyList } from './recencyList.js';

const DESCRIBE_VALUE_LENGTH = 70;

export interface BoundedKeyedCacheOptions {
  maxBytes: number;
  logger?: Logger;
  /** Log byte accounting for every write, not only evictions. */
  verbose?: boolean;
}

/**
 * In-memory store of validators and bodies per resource, bounded by the total byte length of the
 * stored values. Resource ids are not counted toward the budget.
 *
 * When a write would bring the total to or past `maxBytes`, whole entries are evicted in
 * least-recently-used order until it fits. A value that could never fit is rejected up front.
 */
export class BoundedKeyedCache implements ResourceCache {
  readonly maxBytes: number;
  private readonly entries = new Map<string, CacheEntry>();
  private readonly recency = new RecencyList();
  private readonly logger: Logger | undefined;
  private readonly verbose: boolean;
  private currentBytes = 0;

  constructor(options: BoundedKeyedCacheOptions) {
    if (!Number.isInteger(options.maxBytes) || options.maxBytes <= 0) {
      throw new ConfigurationError(`Cache byte budget must be a positive integer, received ${options.maxBytes}.`, {
        maxBytes: options.maxBytes,
      });
    }

    this.maxBytes = options.maxBytes;
    this.logger = options.logger;
    this.verbose = options.verbose ?? false;
  }

  get usedBytes(): number {
    return this.currentBytes;
  }

  get size(): number {
    return this.entries.size;
  }

  has(resourceId: string): boolean {
    return this.entries.has(resourceId);
  }

  /** Resource ids ordered from most to least recently used. */
  keys(): string[] {
    return this.recency.keys();
  }

  /** Reads an entry without counting as a use. */
  peek(resourceId: string): Readonly<CacheEntry> | undefined {
    return this.entries.get(resourceId);
  }

  /**
   * Stores `value` under `(resourceId, field)`. Returns false when nothing was stored: the value
   * was absent or empty, or it is too large for the budget.
   */
  set(resourceId: string, field: CacheField, value: Uint8Array | undefined): boolean {
    if (!value || value.byteLength === 0) {
      return false;
    }

    const length = value.byteLength;
    if (length >= this.maxBytes) {
      this.logger?.(
        `Error: cannot store ${length} bytes for ${resourceId} ${field} in a cache of maximum size ${this.maxBytes} bytes.`,
      );
      return false;
    }

    this.makeRoom(length);

    let entry = this.entries.get(resourceId);
    if (!entry) {
      entry = { resourceId, fields: {}, size: 0 };
      this.entries.set(resourceId, entry);
    }

    const sizeBefore = entry.size;
    const previous = entry.fields[field];
    if (previous) {
      entry.size -= previous.byteLength;
      this.currentBytes -= previous.byteLength;
    }

    entry.fields[field] = value;
    entry.size += length;
    this.currentBytes += length;

    if (this.verbose) {
      this.logger?.(
        `${resourceId} ${field}: ${length} bytes, entry ${sizeBefore} -> ${entry.size} bytes, cache ${this.currentBytes}/${this.maxBytes} bytes`,
      );
    }

    this.recency.touch(resourceId);
    return true;
  }

  get(resourceId: string, field: CacheField): Uint8Array | undefined {
    const value = this.entries.get(resourceId)?.fields[field];
    if (!value) {
      return undefined;
    }

    this.recency.touch(resourceId);
    return value;
  }

  /** Removes every field of `resourceId`. Returns false when nothing was cached for it. */
  remove(resourceId: string): boolean {
    if (!this.entries.has(resourceId)) {
      return false;
    }

    this.drop(resourceId);
    return true;
  }

  clear(): void {
    this.entries.clear();
    this.recency.clear();
    this.currentBytes = 0;
  }

  describe(): string {
    const lines = [`${plural(this.entries.size, 'cache item')}:`];
    const order = this.recency.keys();

    for (const resourceId of order) {
      const entry = this.entries.get(resourceId);
      if (!entry) {
        continue;
      }
      lines.push(`  ${resourceId} (${entry.size} bytes)`);
      for (const field of CACHE_FIELDS) {
        const value = entry.fields[field];
        if (value) {
          lines.push(`    ${field}: ${describeValue(field, value)}`);
        }
      }
    }

    lines.push('LRU order (last key is least recently used):');
    for (const resourceId of order) {
      lines.push(`  ${resourceId}`);
    }
    lines.push(`Max cache size: ${this.maxBytes} bytes`);
    lines.push(`  Current size: ${this.currentBytes} bytes`);
    lines.push(`        Unused: ${this.maxBytes - this.currentBytes} bytes`);
    return lines.join('\n');
  }

  private makeRoom(length: number): void {
    while (this.currentBytes + length >= this.maxBytes) {
      const resourceId = this.recency.leastRecent();
      if (resourceId === undefined) {
        return;
      }
      const recovered = this.drop(resourceId);
      this.logger?.(`Evicted ${resourceId} from the cache and recovered ${recovered} bytes.`);
    }
  }

  private drop(resourceId: string): number {
    const recovered = this.entries.get(resourceId)?.size ?? 0;
    this.entries.delete(resourceId);
    this.recency.remove(resourceId);
    this.currentBytes -= recovered;
    return recovered;
  }
}

function describeValue(field: CacheField, value: Uint8Array): string {
  switch (field) {
    case 'etag':
    case 'lastModified':
      return truncate(decodeText(value), DESCRIBE_VALUE_LENGTH);
    case 'body':
      return `${value.byteLength} bytes`;
    case 'bodyFingerprint':
      return Buffer.from(value).toString('hex');
  }
}

import pLimit from 'p-limit';
import type { ResourceCache } from '../cache/cache.js';
import { CacheInconsistencyError, TransportError } from '../errors.js';
import type { FetchResult, Logger } from '../types/index.js';
import { fingerprint, fingerprintsMatch } from '../utils/hash.js';
import { decodeText, encodeText } from '../utils/text.js';
import type { Transport, TransportResponse } from './transport.js';

const IF_NONE_MATCH = 'If-None-Match';
const IF_MODIFIED_SINCE = 'If-Modified-Since';
const ETAG = 'ETag';
const LAST_MODIFIED = 'Last-Modified';

const EMPTY_FINGERPRINT = fingerprint(new Uint8Array(0));

export interface ConditionalFetcherOptions {
  cache: ResourceCache;
  transport: Transport;
  logger?: Logger;
}

/**
 * Fetches resources with conditional requests, answering from the shared cache when the origin
 * replies 304 Not Modified.
 */
export class ConditionalFetcher {
  private readonly cache: ResourceCache;
  private readonly transport: Transport;
  private readonly logger: Logger | undefined;
  // The validator lookup and the write-back must not interleave with another request.
  private readonly queue = pLimit(1);

  constructor(options: ConditionalFetcherOptions) {
    this.cache = options.cache;
    this.transport = options.transport;
    this.logger = options.logger;
  }

  /**
   * Throws {@link CacheInconsistencyError} when the origin says 304 but no matching body is cached.
   * Transport failures and unexpected statuses resolve with `success: false`.
   */
  get(host: string, resourceId: string): Promise<FetchResult> {
    return this.queue(() => this.fetchOnce(host, resourceId));
  }

  private async fetchOnce(host: string, resourceId: string): Promise<FetchResult> {
    const headers = this.conditionalHeaders(resourceId);

    let response: TransportResponse;
    try {
      response = await this.transport.send({ host, path: resourceId, headers });
    } catch (error) {
      if (error instanceof TransportError) {
        this.logger?.(error.message);
        return { success: false, fromCache: false, status: 0, error };
      }
      throw error;
    }

    this.storeValidators(resourceId, response.headers);

    if (response.status === 200) {
      const body = response.body ?? new Uint8Array(0);
      const digest = fingerprint(body);
      const bodyStored = body.byteLength === 0 || this.cache.set(resourceId, 'body', body);
      if (!bodyStored || !this.cache.set(resourceId, 'bodyFingerprint', digest)) {
        // Validators are only kept alongside a cached body.
        this.cache.remove(resourceId);
        this.logger?.(`Not caching ${resourceId}: ${body.byteLength} bytes do not fit the cache budget`);
      }
      return { success: true, fromCache: false, status: 200, body, fingerprint: digest };
    }

    if (response.status === 304) {
      const { body, digest } = this.readCachedBody(resourceId);
      return { success: true, fromCache: true, status: 304, body, fingerprint: digest };
    }

    this.logger?.(`Unhandled status ${response.status} for ${resourceId}`);
    return { success: false, fromCache: false, status: response.status };
  }

  private conditionalHeaders(resourceId: string): Record<string, string> {
    const etag = this.cache.get(resourceId, 'etag');
    const lastModified = this.cache.get(resourceId, 'lastModified');
    if (!etag || !lastModified) {
      return {};
    }

    return {
      [IF_NONE_MATCH]: decodeText(etag),
      [IF_MODIFIED_SINCE]: decodeText(lastModified),
    };
  }

  private storeValidators(resourceId: string, headers: Headers): void {
    const etag = headers.get(ETAG);
    if (etag) {
      this.cache.set(resourceId, 'etag', encodeText(etag));
    }

    const lastModified = headers.get(LAST_MODIFIED);
    if (lastModified) {
      this.cache.set(resourceId, 'lastModified', encodeText(lastModified));
    }
  }

  private readCachedBody(resourceId: string): { body: Uint8Array; digest: Uint8Array } {
    const body = this.cache.get(resourceId, 'body');
    const digest = this.cache.get(resourceId, 'bodyFingerprint');

    if (!body) {
      // Empty bodies are never stored, only their fingerprint.
      if (digest && fingerprintsMatch(digest, EMPTY_FINGERPRINT)) {
        return { body: new Uint8Array(0), digest };
      }
      throw new CacheInconsistencyError(resourceId, 'origin replied 304 Not Modified but no body is cached');
    }

    const actual = fingerprint(body);
    if (digest && !fingerprintsMatch(digest, actual)) {
      throw new CacheInconsistencyError(resourceId, 'cached body does not match its stored fingerprint');
    }

    return { body, digest: digest ?? actual };
  }
}

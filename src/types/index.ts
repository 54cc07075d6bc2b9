export type CacheField = 'etag' | 'lastModified' | 'body' | 'bodyFingerprint';

export const CACHE_FIELDS: readonly CacheField[] = ['etag', 'lastModified', 'body', 'bodyFingerprint'];

export type CacheEntryFields = Partial<Record<CacheField, Uint8Array>>;

export interface CacheEntry {
  resourceId: string;
  fields: CacheEntryFields;
  /** Sum of the byte lengths of every present field. */
  size: number;
}

export interface FetchResult {
  success: boolean;
  fromCache: boolean;
  /** HTTP status, or 0 when the transport failed before a response arrived. */
  status: number;
  body?: Uint8Array | undefined;
  fingerprint?: Uint8Array | undefined;
  error?: Error | undefined;
}

export type Logger = (message: string) => void;

import type { CacheField } from '../types/index.js';

export interface ResourceCache {
  readonly maxBytes: number;
  readonly usedBytes: number;
  set(resourceId: string, field: CacheField, value: Uint8Array | undefined): boolean;
  get(resourceId: string, field: CacheField): Uint8Array | undefined;
  remove(resourceId: string): boolean;
  clear(): void;
}

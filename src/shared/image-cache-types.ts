/**
 * Image cache type definitions shared between the cache store, the decoder and
 * the navigation layer.
 */

import type { EngineError, ImageIdentity } from './types';

export interface ImageMetadata {
  identity: ImageIdentity;
  width: number;
  height: number;
  byteSize: number;
  format: string;
  modifiedAt: number; // epoch milliseconds
}

/**
 * Decoded pixel payload. Opaque to the cache; `data.byteLength` is its cost.
 */
export interface DecodedImage {
  data: Buffer;
  width: number;
  height: number;
  channels: number;
}

export interface ReadyCacheEntry {
  identity: ImageIdentity;
  status: 'ready';
  content: DecodedImage;
  metadata: ImageMetadata;
  cost: number;
  lastAccess: number;
}

export interface ErrorCacheEntry {
  identity: ImageIdentity;
  status: 'error';
  error: EngineError;
  cost: 0;
  lastAccess: number;
}

export type CacheEntry = ReadyCacheEntry | ErrorCacheEntry;

/**
 * What callers outside the store get back: a read-only borrow.
 */
export type CacheEntryView = Readonly<CacheEntry>;

export type EntryStatus = 'absent' | 'pending' | 'ready' | 'error';

export type AdmissionResult =
  | { admitted: true; evicted: ImageIdentity[] }
  | { admitted: false; reason: 'capacity' };

export interface CacheStats {
  totalSize: number;
  itemCount: number;
  pinnedCount: number;
  evictions: number;
  hits: number;
  misses: number;
}

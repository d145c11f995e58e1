/**
 * Decoded Image Cache Store
 *
 * Bounded mapping from image identity to decoded content and metadata.
 * Every public method is a synchronous critical section: no I/O happens here,
 * all reading and decoding is done before `put`.
 */

import {
  AdmissionResult,
  CacheEntry,
  CacheEntryView,
  CacheStats,
  DecodedImage,
  ImageMetadata,
} from '../../shared/image-cache-types';
import { CacheBudget, EngineError, ImageIdentity } from '../../shared/types';
import { EventHub } from '../events';

/**
 * Distance of an identity from the cursor, or undefined when it is not in the index.
 */
export type ProximityFn = (identity: ImageIdentity) => number | undefined;

export interface CacheStoreOptions {
  budget: CacheBudget;
  clock?: () => number;
  events?: EventHub;
}

// ============================================================================
// CONTRACT: CacheStore class
// ============================================================================

/**
 * CONTRACT:
 *   State:
 *     - entries: identity -> CacheEntry (ready or error)
 *     - totalSize: sum of entry costs
 *     - pinned: identities exempt from eviction
 *
 *   Invariants:
 *     - entries.size <= budget.maxEntries and totalSize <= budget.maxBytes after every call
 *     - A pinned identity is never evicted
 *     - Victims are chosen by oldest lastAccess; equal lastAccess evicts the entry
 *       furthest from the cursor first (unknown distance counts as furthest)
 *     - A rejected admission evicts nothing
 *     - invalidate() is idempotent
 */
export class CacheStore {
  private readonly budget: CacheBudget;
  private readonly clock: () => number;
  private readonly events: EventHub | undefined;
  private entries = new Map<ImageIdentity, CacheEntry>();
  private pinned = new Set<ImageIdentity>();
  private proximity: ProximityFn = () => undefined;
  private totalSize = 0;
  private evictions = 0;
  private hits = 0;
  private misses = 0;

  constructor(options: CacheStoreOptions) {
    if (options.budget.maxEntries < 1) {
      throw new Error('CacheStore maxEntries must be at least 1');
    }
    if (options.budget.maxBytes < 1) {
      throw new Error('CacheStore maxBytes must be at least 1');
    }
    this.budget = { ...options.budget };
    this.clock = options.clock ?? Date.now;
    this.events = options.events;
  }

  /**
   * Returns the entry and refreshes its last-access time, or undefined on a miss.
   */
  get(identity: ImageIdentity): CacheEntryView | undefined {
    const entry = this.entries.get(identity);
    if (!entry) {
      this.misses += 1;
      return undefined;
    }
    entry.lastAccess = this.clock();
    this.hits += 1;
    return entry;
  }

  /**
   * Looks at an entry without touching its access time or the hit counters.
   */
  peek(identity: ImageIdentity): CacheEntryView | undefined {
    return this.entries.get(identity);
  }

  contains(identity: ImageIdentity): boolean {
    return this.entries.has(identity);
  }

  /**
   * put(identity, content, metadata)
   *
   * CONTRACT:
   *   Inputs:
   *     - identity: image key
   *     - content: decoded payload, cost = content.data.byteLength
   *     - metadata: metadata read alongside the content
   *
   *   Outputs:
   *     - { admitted: true, evicted } with the identities evicted to make room
   *     - { admitted: false, reason: 'capacity' } when the entry cannot fit even
   *       after evicting every unpinned entry; nothing is evicted in that case
   *
   *   Algorithm:
   *     1. Reject outright if cost > maxBytes
   *     2. Collect unpinned entries other than identity, ordered as eviction victims
   *     3. Take victims until count and bytes fit with the new entry
   *     4. If they never fit, reject
   *     5. Evict the chosen victims, then insert (replacing any previous entry)
   */
  put(identity: ImageIdentity, content: DecodedImage, metadata: ImageMetadata): AdmissionResult {
    const cost = content.data.byteLength;
    return this.admit({
      identity,
      status: 'ready',
      content,
      metadata,
      cost,
      lastAccess: this.clock(),
    });
  }

  /**
   * Records a displayable error state so the same identity is not decoded again
   * on every visit. Costs no bytes but occupies an entry slot.
   */
  putError(identity: ImageIdentity, error: EngineError): AdmissionResult {
    return this.admit({
      identity,
      status: 'error',
      error,
      cost: 0,
      lastAccess: this.clock(),
    });
  }

  invalidate(identity: ImageIdentity): boolean {
    const entry = this.entries.get(identity);
    if (!entry) {
      return false;
    }
    this.entries.delete(identity);
    this.totalSize -= entry.cost;
    return true;
  }

  setPinned(identities: Iterable<ImageIdentity>): void {
    this.pinned = new Set(identities);
  }

  isPinned(identity: ImageIdentity): boolean {
    return this.pinned.has(identity);
  }

  setProximity(proximity: ProximityFn): void {
    this.proximity = proximity;
  }

  keys(): ImageIdentity[] {
    return Array.from(this.entries.keys());
  }

  stats(): CacheStats {
    return {
      totalSize: this.totalSize,
      itemCount: this.entries.size,
      pinnedCount: Array.from(this.pinned).filter((identity) => this.entries.has(identity)).length,
      evictions: this.evictions,
      hits: this.hits,
      misses: this.misses,
    };
  }

  private admit(entry: CacheEntry): AdmissionResult {
    if (entry.cost > this.budget.maxBytes) {
      return { admitted: false, reason: 'capacity' };
    }

    const previous = this.entries.get(entry.identity);
    let count = this.entries.size - (previous ? 1 : 0) + 1;
    let size = this.totalSize - (previous ? previous.cost : 0) + entry.cost;

    const victims: CacheEntry[] = [];
    if (count > this.budget.maxEntries || size > this.budget.maxBytes) {
      for (const candidate of this.evictionOrder(entry.identity)) {
        if (count <= this.budget.maxEntries && size <= this.budget.maxBytes) {
          break;
        }
        victims.push(candidate);
        count -= 1;
        size -= candidate.cost;
      }
      if (count > this.budget.maxEntries || size > this.budget.maxBytes) {
        return { admitted: false, reason: 'capacity' };
      }
    }

    for (const victim of victims) {
      this.entries.delete(victim.identity);
      this.totalSize -= victim.cost;
      this.evictions += 1;
      this.events?.emit({ type: 'eviction', identity: victim.identity, cost: victim.cost });
    }

    if (previous) {
      this.entries.delete(entry.identity);
      this.totalSize -= previous.cost;
    }
    this.entries.set(entry.identity, entry);
    this.totalSize += entry.cost;

    return { admitted: true, evicted: victims.map((victim) => victim.identity) };
  }

  private evictionOrder(incoming: ImageIdentity): CacheEntry[] {
    const distance = (identity: ImageIdentity) => this.proximity(identity) ?? Number.POSITIVE_INFINITY;
    return Array.from(this.entries.values())
      .filter((entry) => entry.identity !== incoming && !this.pinned.has(entry.identity))
      .sort((a, b) => {
        if (a.lastAccess !== b.lastAccess) {
          return a.lastAccess - b.lastAccess;
        }
        const da = distance(a.identity);
        const db = distance(b.identity);
        if (da === db) return 0;
        return da > db ? -1 : 1;
      });
  }
}

/**
 * Navigation Orchestrator
 *
 * Turns a navigation command into a cursor move, a load for the new current
 * image and a refreshed prefetch window around it.
 */

import { CacheEntryView, EntryStatus, ImageMetadata, ReadyCacheEntry } from '../../shared/image-cache-types';
import { Direction, EngineError, ImageIdentity } from '../../shared/types';
import { engineError } from '../errors';
import { EventHub } from '../events';
import { CacheStore } from '../image-cache/cache-store';
import { DecodeResult, ImageDecoder } from '../image-cache/image-decoder';
import { ImageIndex } from '../library/image-index';
import { describeError, log } from '../logging';
import { TaskHandle, TaskPriority, TaskResult, TaskScheduler } from '../scheduler/task-scheduler';

export type LoadOutcome =
  | { status: 'ready'; identity: ImageIdentity; entry: Readonly<ReadyCacheEntry>; transient: boolean }
  | { status: 'error'; identity: ImageIdentity; error: EngineError }
  | { status: 'cancelled'; identity: ImageIdentity }
  | { status: 'empty' };

/**
 * Returned synchronously by navigate(); the outcome settles once the image is
 * available (immediately on a cache hit).
 */
export interface NavigationHandle {
  identity: ImageIdentity | null;
  position: number;
  total: number;
  outcome: Promise<LoadOutcome>;
}

export type MetadataOutcome = { ok: true; metadata: ImageMetadata } | { ok: false; error: EngineError };

export interface NavigationOrchestratorOptions {
  index: ImageIndex;
  cache: CacheStore;
  scheduler: TaskScheduler;
  decoder: ImageDecoder;
  events: EventHub;
  prefetchRadius: number;
}

interface InflightLoad {
  handle: TaskHandle<DecodeResult>;
  outcome: Promise<LoadOutcome>;
}

const PIN_RADIUS = 1;

function outcomeFromEntry(entry: CacheEntryView): LoadOutcome {
  if (entry.status === 'ready') {
    return { status: 'ready', identity: entry.identity, entry, transient: false };
  }
  return { status: 'error', identity: entry.identity, error: entry.error };
}

// ============================================================================
// CONTRACT: NavigationOrchestrator class
// ============================================================================

/**
 * CONTRACT:
 *   State:
 *     - inflight: identity -> the single load task (and its outcome) in progress
 *
 *   Invariants:
 *     - At most one load task per identity at any time; later requests share it
 *     - An interactive request for a queued background load promotes it
 *     - Loads outside the current prefetch window are cancelled: background ones
 *       queued or running, interactive ones only while still queued
 *     - The current entry and its immediate neighbours are pinned in the cache
 *     - A decoded result is only admitted while its identity is still in the index
 *     - not-found removes the identity from both index and cache;
 *       decode errors are cached as error entries and the identity stays
 */
export class NavigationOrchestrator {
  private readonly index: ImageIndex;
  private readonly cache: CacheStore;
  private readonly scheduler: TaskScheduler;
  private readonly decoder: ImageDecoder;
  private readonly events: EventHub;
  private readonly prefetchRadius: number;
  private inflight = new Map<ImageIdentity, InflightLoad>();

  constructor(options: NavigationOrchestratorOptions) {
    this.index = options.index;
    this.cache = options.cache;
    this.scheduler = options.scheduler;
    this.decoder = options.decoder;
    this.events = options.events;
    this.prefetchRadius = Math.max(0, Math.floor(options.prefetchRadius));
    this.cache.setProximity((identity) => this.index.distanceFromCursor(identity));
  }

  /**
   * navigate(direction)
   *
   * CONTRACT:
   *   Inputs:
   *     - direction: next | previous | first | last | random
   *
   *   Outputs:
   *     - NavigationHandle, returned before any I/O happens
   *
   *   Algorithm:
   *     1. Advance the index cursor
   *     2. Cache hit: outcome resolves from the entry; miss: interactive load
   *     3. Pin neighbourhood(1), cancel loads left behind, prefetch
   *        neighbourhood(prefetchRadius)
   */
  navigate(direction: Direction): NavigationHandle {
    const identity = this.index.advance(direction) ?? null;
    return this.present(direction, identity);
  }

  /**
   * Re-resolves the current entry without moving, e.g. after a mutation or undo.
   */
  show(): NavigationHandle {
    return this.present('show', this.index.current() ?? null);
  }

  status(identity: ImageIdentity): EntryStatus {
    const entry = this.cache.peek(identity);
    if (entry) {
      return entry.status;
    }
    return this.inflight.has(identity) ? 'pending' : 'absent';
  }

  /**
   * Metadata without decoding pixels: from the cache entry when one is ready,
   * otherwise through a background metadata task.
   */
  async requestMetadata(identity: ImageIdentity): Promise<MetadataOutcome> {
    const entry = this.cache.peek(identity);
    if (entry?.status === 'ready') {
      return { ok: true, metadata: entry.metadata };
    }
    const handle = this.scheduler.submit({
      identity,
      kind: 'metadata',
      priority: 'background',
      run: (token) => this.decoder.readMetadata(identity, token),
    });
    const result = await handle.result;
    switch (result.status) {
      case 'ok':
        return { ok: true, metadata: result.value };
      case 'error':
        return { ok: false, error: result.error };
      case 'cancelled':
        return { ok: false, error: engineError('cancelled', 'Metadata request cancelled', identity) };
    }
  }

  private present(direction: Direction | 'show', identity: ImageIdentity | null): NavigationHandle {
    const position = this.index.position;
    const total = this.index.size;
    this.events.emit({ type: 'navigation', direction, identity, position, total });

    if (identity === null) {
      this.cache.setPinned([]);
      return { identity, position, total, outcome: Promise.resolve<LoadOutcome>({ status: 'empty' }) };
    }

    const outcome = this.resolve(identity);
    this.refreshWindow();
    return { identity, position, total, outcome };
  }

  private resolve(identity: ImageIdentity): Promise<LoadOutcome> {
    const cached = this.cache.get(identity);
    if (cached) {
      this.events.emit({ type: 'cache-hit', identity });
      return Promise.resolve(outcomeFromEntry(cached));
    }
    this.events.emit({ type: 'cache-miss', identity });
    return this.requestLoad(identity, 'interactive');
  }

  private requestLoad(identity: ImageIdentity, priority: TaskPriority): Promise<LoadOutcome> {
    const existing = this.inflight.get(identity);
    if (existing) {
      if (existing.handle.token.cancelled) {
        // Superseded load still running: wait for it, then start over.
        return existing.outcome.then(() => this.retry(identity, priority));
      }
      if (priority === 'interactive' && existing.handle.priority === 'background') {
        this.scheduler.promote(existing.handle);
      }
      return existing.outcome;
    }

    const handle = this.scheduler.submit({
      identity,
      kind: 'load',
      priority,
      run: (token) => this.decoder.decode(identity, token),
    });
    const outcome = handle.result.then((result) => {
      if (this.inflight.get(identity)?.handle === handle) {
        this.inflight.delete(identity);
      }
      return this.settle(identity, result);
    });
    this.inflight.set(identity, { handle, outcome });
    return outcome;
  }

  private retry(identity: ImageIdentity, priority: TaskPriority): Promise<LoadOutcome> {
    if (!this.index.has(identity)) {
      return Promise.resolve<LoadOutcome>({ status: 'cancelled', identity });
    }
    const cached = this.cache.peek(identity);
    if (cached) {
      return Promise.resolve(outcomeFromEntry(cached));
    }
    return this.requestLoad(identity, priority);
  }

  private settle(identity: ImageIdentity, result: TaskResult<DecodeResult>): LoadOutcome {
    switch (result.status) {
      case 'cancelled':
        return { status: 'cancelled', identity };

      case 'ok': {
        if (!this.index.has(identity)) {
          return { status: 'cancelled', identity };
        }
        const { content, metadata } = result.value;
        const admission = this.cache.put(identity, content, metadata);
        const entry = this.cache.peek(identity);
        if (admission.admitted && entry?.status === 'ready') {
          return { status: 'ready', identity, entry, transient: false };
        }
        log('debug', `[cache] ${identity} does not fit the cache budget, serving it uncached`);
        return {
          status: 'ready',
          identity,
          entry: { identity, status: 'ready', content, metadata, cost: content.data.byteLength, lastAccess: Date.now() },
          transient: true,
        };
      }

      case 'error': {
        const { error } = result;
        this.events.emit({ type: 'load-error', identity, error });
        if (error.kind === 'not-found') {
          this.index.remove(identity);
          this.cache.invalidate(identity);
        } else if (error.kind === 'decode' && this.index.has(identity)) {
          this.cache.putError(identity, error);
        }
        return { status: 'error', identity, error };
      }
    }
  }

  private refreshWindow(): void {
    const window = this.index.neighborhood(this.prefetchRadius);
    const inWindow = new Set(window);
    this.cache.setPinned(this.index.neighborhood(PIN_RADIUS));

    this.scheduler.cancelWhere(
      (task) =>
        task.kind === 'load' &&
        !inWindow.has(task.identity) &&
        (task.priority === 'background' || task.state === 'queued')
    );

    for (const identity of window) {
      const pending = this.inflight.get(identity);
      if (this.cache.contains(identity) || (pending && !pending.handle.token.cancelled)) {
        continue;
      }
      this.requestLoad(identity, 'background').catch((error) => {
        log('error', `[prefetch] unexpected failure for ${identity}: ${describeError(error)}`);
      });
    }
  }
}

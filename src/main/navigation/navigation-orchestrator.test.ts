/**
 * Tests for the Navigation Orchestrator
 *
 * Tests verify:
 * - navigate() returns synchronously and the outcome resolves from cache or a load
 * - Only one load per identity is ever in flight
 * - Queued prefetches are promoted when navigated to and cancelled when stale
 * - not-found drops the identity; decode errors are cached
 * - Oversized images are served transiently
 * - Results for identities removed during the load are discarded
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ImageMetadata } from '../../shared/image-cache-types';
import { EngineErrorKind, ImageIdentity } from '../../shared/types';
import { TaskFailure } from '../errors';
import { EngineEvent, EventHub } from '../events';
import { CacheStore } from '../image-cache/cache-store';
import { DecodeResult, ImageDecoder } from '../image-cache/image-decoder';
import { ImageIndex } from '../library/image-index';
import { CancellationToken, TaskScheduler } from '../scheduler/task-scheduler';
import { NavigationHandle, NavigationOrchestrator } from './navigation-orchestrator';

class FakeDecoder implements ImageDecoder {
  calls: ImageIdentity[] = [];
  metadataCalls: ImageIdentity[] = [];
  failures = new Map<ImageIdentity, EngineErrorKind>();
  sizes = new Map<ImageIdentity, number>();
  held = new Set<ImageIdentity>();
  private gates = new Map<ImageIdentity, () => void>();

  async decode(identity: ImageIdentity, _token: CancellationToken): Promise<DecodeResult> {
    this.calls.push(identity);
    if (this.held.has(identity)) {
      await new Promise<void>((resolve) => this.gates.set(identity, resolve));
    }
    const kind = this.failures.get(identity);
    if (kind) {
      throw new TaskFailure(kind, `fake ${kind} for ${identity}`);
    }
    const size = this.sizes.get(identity) ?? 10;
    return {
      content: { data: Buffer.alloc(size), width: size, height: 1, channels: 1 },
      metadata: this.metadataFor(identity, size),
    };
  }

  async readMetadata(identity: ImageIdentity, _token: CancellationToken): Promise<ImageMetadata> {
    this.metadataCalls.push(identity);
    return this.metadataFor(identity, this.sizes.get(identity) ?? 10);
  }

  release(identity: ImageIdentity): void {
    this.held.delete(identity);
    this.gates.get(identity)?.();
    this.gates.delete(identity);
  }

  private metadataFor(identity: ImageIdentity, size: number): ImageMetadata {
    return { identity, width: size, height: 1, byteSize: size, format: 'png', modifiedAt: 0 };
  }
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

const FIVE = ['/p/a.jpg', '/p/b.jpg', '/p/c.jpg', '/p/d.jpg', '/p/e.jpg'];

describe('NavigationOrchestrator', () => {
  let decoder: FakeDecoder;
  let scheduler: TaskScheduler;
  let events: EventHub;
  let seen: EngineEvent[];

  function build(identities: string[], options: { prefetchRadius?: number; workerCount?: number; maxBytes?: number } = {}) {
    scheduler = new TaskScheduler({ workerCount: options.workerCount ?? 2 });
    const index = new ImageIndex(identities);
    const cache = new CacheStore({ budget: { maxEntries: 50, maxBytes: options.maxBytes ?? 10_000 }, events });
    const orchestrator = new NavigationOrchestrator({
      index,
      cache,
      scheduler,
      decoder,
      events,
      prefetchRadius: options.prefetchRadius ?? 0,
    });
    return { index, cache, orchestrator };
  }

  beforeEach(() => {
    decoder = new FakeDecoder();
    events = new EventHub();
    seen = [];
    events.on((event) => seen.push(event));
  });

  afterEach(async () => {
    for (const identity of [...decoder.held]) {
      decoder.release(identity);
    }
    await scheduler.shutdown();
  });

  it('returns the resolved identity synchronously and loads it', async () => {
    const { cache, orchestrator } = build(FIVE);

    const handle = orchestrator.navigate('next');

    expect(handle.identity).toBe('/p/b.jpg');
    expect(handle.position).toBe(1);
    expect(handle.total).toBe(5);
    const outcome = await handle.outcome;
    expect(outcome.status).toBe('ready');
    expect(cache.contains('/p/b.jpg')).toBe(true);
    expect(seen[0]).toEqual({ type: 'navigation', direction: 'next', identity: '/p/b.jpg', position: 1, total: 5 });
  });

  it('serves a revisit from the cache without decoding again', async () => {
    const { orchestrator } = build(FIVE);
    await orchestrator.show().outcome;

    const outcome = await orchestrator.show().outcome;

    expect(outcome).toMatchObject({ status: 'ready', identity: '/p/a.jpg', transient: false });
    expect(decoder.calls).toEqual(['/p/a.jpg']);
    expect(seen.filter((event) => event.type === 'cache-hit')).toEqual([{ type: 'cache-hit', identity: '/p/a.jpg' }]);
  });

  it('prefetches the neighbourhood in the background', async () => {
    const { orchestrator } = build(FIVE, { prefetchRadius: 2 });
    orchestrator.navigate('next');
    await flush();

    expect([...decoder.calls].sort()).toEqual(['/p/a.jpg', '/p/b.jpg', '/p/c.jpg', '/p/d.jpg']);
  });

  it('never starts a second load for an identity already in flight', async () => {
    decoder.held.add('/p/b.jpg');
    const { orchestrator } = build(FIVE, { prefetchRadius: 1 });
    await orchestrator.show().outcome;
    expect(orchestrator.status('/p/b.jpg')).toBe('pending');

    const handle = orchestrator.navigate('next');
    decoder.release('/p/b.jpg');
    const outcome = await handle.outcome;

    expect(outcome.status).toBe('ready');
    expect(decoder.calls.filter((identity) => identity === '/p/b.jpg')).toHaveLength(1);
  });

  it('promotes a queued prefetch when it is navigated to', async () => {
    decoder.held.add('/p/a.jpg');
    const { orchestrator } = build(FIVE, { prefetchRadius: 1, workerCount: 1 });
    orchestrator.show();
    await flush();
    expect(scheduler.stats().queuedBackground).toBe(1);

    const handle = orchestrator.navigate('next');

    expect(scheduler.stats().queuedInteractive).toBe(1);
    decoder.release('/p/a.jpg');
    expect((await handle.outcome).status).toBe('ready');
  });

  it('cancels queued prefetches that fall outside the window', async () => {
    decoder.held.add('/p/img0.jpg');
    const identities = Array.from({ length: 8 }, (_, n) => `/p/img${n}.jpg`);
    const { orchestrator } = build(identities, { prefetchRadius: 1, workerCount: 1 });
    orchestrator.show();
    await flush();

    const handle = orchestrator.navigate('last');
    decoder.release('/p/img0.jpg');
    await handle.outcome;
    await flush();

    expect(decoder.calls).toEqual(['/p/img0.jpg', '/p/img7.jpg', '/p/img6.jpg']);
  });

  it('cancels queued loads of images skipped past', async () => {
    const identities = Array.from({ length: 21 }, (_, n) => `/p/${n}.jpg`);
    decoder.held.add('/p/0.jpg');
    const { orchestrator } = build(identities, { workerCount: 1 });
    orchestrator.show();
    await flush();

    const skipped: NavigationHandle[] = [];
    for (let n = 1; n < 20; n++) {
      skipped.push(orchestrator.navigate('next'));
    }
    const last = orchestrator.navigate('next');

    expect(last.identity).toBe('/p/20.jpg');
    expect(scheduler.stats()).toMatchObject({ running: 1, queuedInteractive: 1, cancelled: 19 });
    decoder.release('/p/0.jpg');
    expect((await last.outcome).status).toBe('ready');
    expect(await skipped[0].outcome).toEqual({ status: 'cancelled', identity: '/p/1.jpg' });
    expect(decoder.calls).toEqual(['/p/0.jpg', '/p/20.jpg']);
  });

  it('drops an identity whose file is gone', async () => {
    decoder.failures.set('/p/b.jpg', 'not-found');
    const { index, cache, orchestrator } = build(['/p/a.jpg', '/p/b.jpg', '/p/c.jpg']);

    const outcome = await orchestrator.navigate('next').outcome;

    expect(outcome).toMatchObject({ status: 'error', identity: '/p/b.jpg', error: { kind: 'not-found' } });
    expect(index.has('/p/b.jpg')).toBe(false);
    expect(index.current()).toBe('/p/c.jpg');
    expect(cache.contains('/p/b.jpg')).toBe(false);
  });

  it('keeps an undecodable identity and caches its error state', async () => {
    decoder.failures.set('/p/b.jpg', 'decode');
    const { index, orchestrator } = build(['/p/a.jpg', '/p/b.jpg', '/p/c.jpg']);

    const first = await orchestrator.navigate('next').outcome;
    orchestrator.navigate('previous');
    const second = await orchestrator.navigate('next').outcome;

    expect(first).toMatchObject({ status: 'error', error: { kind: 'decode' } });
    expect(second).toMatchObject({ status: 'error', error: { kind: 'decode' } });
    expect(index.has('/p/b.jpg')).toBe(true);
    expect(orchestrator.status('/p/b.jpg')).toBe('error');
    expect(decoder.calls.filter((identity) => identity === '/p/b.jpg')).toHaveLength(1);
    expect(seen.filter((event) => event.type === 'load-error')).toHaveLength(1);
  });

  it('serves an image larger than the byte budget transiently', async () => {
    decoder.sizes.set('/p/a.jpg', 500);
    const { cache, orchestrator } = build(['/p/a.jpg'], { maxBytes: 100 });

    const outcome = await orchestrator.show().outcome;

    expect(outcome).toMatchObject({ status: 'ready', transient: true });
    expect(cache.contains('/p/a.jpg')).toBe(false);
  });

  it('discards a result whose identity left the index during the load', async () => {
    decoder.held.add('/p/a.jpg');
    const { index, cache, orchestrator } = build(['/p/a.jpg', '/p/b.jpg']);
    const handle = orchestrator.show();
    await flush();

    index.remove('/p/a.jpg');
    decoder.release('/p/a.jpg');

    expect(await handle.outcome).toEqual({ status: 'cancelled', identity: '/p/a.jpg' });
    expect(cache.contains('/p/a.jpg')).toBe(false);
  });

  it('resolves an empty outcome for an empty index', async () => {
    const { orchestrator } = build([]);
    const handle = orchestrator.navigate('next');
    expect(handle.identity).toBeNull();
    expect(await handle.outcome).toEqual({ status: 'empty' });
  });

  it('pins the current entry and its neighbours', async () => {
    const { cache, orchestrator } = build(FIVE);
    orchestrator.navigate('next');
    orchestrator.navigate('next');
    expect(cache.isPinned('/p/b.jpg')).toBe(true);
    expect(cache.isPinned('/p/c.jpg')).toBe(true);
    expect(cache.isPinned('/p/d.jpg')).toBe(true);
    expect(cache.isPinned('/p/a.jpg')).toBe(false);
  });

  describe('requestMetadata', () => {
    it('reads metadata from a ready cache entry', async () => {
      const { orchestrator } = build(FIVE);
      await orchestrator.show().outcome;

      const result = await orchestrator.requestMetadata('/p/a.jpg');

      expect(result).toEqual({ ok: true, metadata: expect.objectContaining({ identity: '/p/a.jpg', width: 10 }) });
      expect(decoder.metadataCalls).toEqual([]);
    });

    it('runs a metadata task on a miss', async () => {
      const { orchestrator } = build(FIVE);

      const result = await orchestrator.requestMetadata('/p/c.jpg');

      expect(result.ok).toBe(true);
      expect(decoder.metadataCalls).toEqual(['/p/c.jpg']);
      expect(decoder.calls).toEqual([]);
    });
  });
});

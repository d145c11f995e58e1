/**
 * Image Triage Engine
 *
 * Wires index, cache, scheduler, decoder, mutation engine and slideshow into one
 * command surface. Rendering and raw key capture stay outside: callers feed key
 * names to dispatchKey() and consume NavigationHandle outcomes.
 */

import { EntryStatus, CacheStats } from '../shared/image-cache-types';
import { AppConfig, CycleDirection, Direction, ImageIdentity, MutationResult, UndoResult } from '../shared/types';
import { MetadataStore } from './database/metadata-store';
import { engineError } from './errors';
import { attachEventLogger, EventHub } from './events';
import { CacheStore } from './image-cache/cache-store';
import { ImageDecoder, SharpImageDecoder } from './image-cache/image-decoder';
import { buildKeyBindings, Command } from './key-bindings';
import { ImageIndex } from './library/image-index';
import { LibraryWatcher, WatchFactory } from './library/library-watcher';
import { scanImages } from './library/scanner';
import { describeError, log, setLogDirectory, setLogLevel } from './logging';
import { FileMutationEngine } from './mutation/file-mutation-engine';
import { UndoStack } from './mutation/undo-stack';
import { MetadataOutcome, NavigationHandle, NavigationOrchestrator } from './navigation/navigation-orchestrator';
import { SchedulerStats, TaskScheduler } from './scheduler/task-scheduler';
import { SlideshowState } from './slideshow/rate-controller';
import { Slideshow } from './slideshow/slideshow';

export interface ImageTriageOptions {
  /** Replaces the sharp decoder (and its metadata store). */
  decoder?: ImageDecoder;
  random?: () => number;
  clock?: () => number;
  /** Replaces the fs.watch based watcher used when config.watchFiles is set. */
  watch?: WatchFactory;
}

export interface MutationOutcome {
  result: MutationResult;
  handle: NavigationHandle;
}

export interface UndoOutcome {
  result: UndoResult;
  handle: NavigationHandle;
}

export type CommandOutcome =
  | { type: 'navigation'; handle: NavigationHandle }
  | { type: 'mutation'; outcome: MutationOutcome }
  | { type: 'undo'; outcome: UndoOutcome }
  | { type: 'slideshow'; state: SlideshowState }
  | { type: 'unbound'; key: string };

export interface EngineStats {
  images: number;
  position: number;
  undoDepth: number;
  cache: CacheStats;
  scheduler: SchedulerStats;
}

interface EngineParts {
  config: AppConfig;
  index: ImageIndex;
  cache: CacheStore;
  scheduler: TaskScheduler;
  events: EventHub;
  metadataStore: MetadataStore | null;
  clock: () => number;
  decoder: ImageDecoder;
  watch?: WatchFactory;
}

function isCycleDirection(direction: Direction): direction is CycleDirection {
  return direction === 'next' || direction === 'previous' || direction === 'random';
}

// ============================================================================
// CONTRACT: ImageTriage class
// ============================================================================

/**
 * CONTRACT:
 *   Invariants:
 *     - Mutations and undo act on the current identity and finish by showing
 *       whatever is current afterwards
 *     - Cycle keys (next, previous, random) also feed the slideshow rate controller
 *     - With config.watchFiles, outside changes to the start dirs update index and cache
 *     - After shutdown() move, delete and undo fail with invalid-request
 *     - shutdown() is idempotent
 */
export class ImageTriage {
  readonly config: AppConfig;
  readonly events: EventHub;
  private readonly index: ImageIndex;
  private readonly cache: CacheStore;
  private readonly scheduler: TaskScheduler;
  private readonly metadataStore: MetadataStore | null;
  private readonly orchestrator: NavigationOrchestrator;
  private readonly mutations: FileMutationEngine;
  private readonly slideshow: Slideshow;
  private readonly watcher: LibraryWatcher | null;
  private readonly bindings: ReadonlyMap<string, Command>;
  private readonly detachLogger: () => void;
  private closing: Promise<void> | null = null;

  constructor(parts: EngineParts) {
    this.config = parts.config;
    this.events = parts.events;
    this.index = parts.index;
    this.cache = parts.cache;
    this.scheduler = parts.scheduler;
    this.metadataStore = parts.metadataStore;
    this.detachLogger = attachEventLogger(this.events);

    this.orchestrator = new NavigationOrchestrator({
      index: this.index,
      cache: this.cache,
      scheduler: this.scheduler,
      decoder: parts.decoder,
      events: this.events,
      prefetchRadius: this.config.prefetchRadius,
    });
    this.mutations = new FileMutationEngine({
      index: this.index,
      cache: this.cache,
      scheduler: this.scheduler,
      undoStack: new UndoStack(this.config.undoCapacity),
      events: this.events,
      folders: this.config,
      clock: parts.clock,
    });
    this.slideshow = new Slideshow({
      config: this.config.slideshow,
      clock: parts.clock,
      advance: (direction) => {
        this.navigate(direction).outcome.catch((error) => {
          log('error', `[slideshow] advance failed: ${describeError(error)}`);
        });
      },
    });
    this.bindings = buildKeyBindings(this.config.categories);

    this.watcher = null;
    if (this.config.watchFiles) {
      this.watcher = new LibraryWatcher({
        index: this.index,
        cache: this.cache,
        scheduler: this.scheduler,
        events: this.events,
        folders: this.config,
        watch: parts.watch,
      });
      this.watcher.start();
    }
  }

  get size(): number {
    return this.index.size;
  }

  current(): ImageIdentity | undefined {
    return this.index.current();
  }

  images(): ImageIdentity[] {
    return this.index.toArray();
  }

  navigate(direction: Direction): NavigationHandle {
    return this.orchestrator.navigate(direction);
  }

  show(): NavigationHandle {
    return this.orchestrator.show();
  }

  status(identity: ImageIdentity): EntryStatus {
    return this.orchestrator.status(identity);
  }

  requestMetadata(identity: ImageIdentity): Promise<MetadataOutcome> {
    return this.orchestrator.requestMetadata(identity);
  }

  async move(category: string): Promise<MutationOutcome> {
    const identity = this.index.current();
    if (identity === undefined || this.closing) {
      return this.rejected('No current image to move');
    }
    const result = await this.mutations.move(identity, category);
    return { result, handle: this.show() };
  }

  async delete(): Promise<MutationOutcome> {
    const identity = this.index.current();
    if (identity === undefined || this.closing) {
      return this.rejected('No current image to delete');
    }
    const result = await this.mutations.delete(identity);
    return { result, handle: this.show() };
  }

  async undo(): Promise<UndoOutcome> {
    if (this.closing) {
      return { result: { ok: false, error: engineError('invalid-request', 'Engine is shut down') }, handle: this.show() };
    }
    const result = await this.mutations.undo();
    return { result, handle: this.show() };
  }

  toggleSlideshow(): SlideshowState {
    return this.slideshow.toggle();
  }

  get slideshowState(): SlideshowState {
    return this.slideshow.state;
  }

  /**
   * dispatchKey(key)
   *
   * CONTRACT:
   *   Inputs:
   *     - key: KeyboardEvent.key style name ('ArrowRight', 'r', 'Delete', '1', ...)
   *
   *   Outputs:
   *     - the outcome of the bound command, or { type: 'unbound' }
   */
  async dispatchKey(key: string): Promise<CommandOutcome> {
    const command = this.bindings.get(key);
    if (!command) {
      return { type: 'unbound', key };
    }
    switch (command.type) {
      case 'navigate':
        if (isCycleDirection(command.direction)) {
          this.slideshow.press(command.direction);
        }
        return { type: 'navigation', handle: this.navigate(command.direction) };
      case 'move':
        return { type: 'mutation', outcome: await this.move(command.category) };
      case 'delete':
        return { type: 'mutation', outcome: await this.delete() };
      case 'undo':
        return { type: 'undo', outcome: await this.undo() };
      case 'toggle-slideshow':
        return { type: 'slideshow', state: this.toggleSlideshow() };
    }
  }

  stats(): EngineStats {
    return {
      images: this.index.size,
      position: this.index.position,
      undoDepth: this.mutations.undoDepth,
      cache: this.cache.stats(),
      scheduler: this.scheduler.stats(),
    };
  }

  /**
   * Stops the slideshow and the watcher, waits for pending mutations, drains the
   * scheduler and flushes persisted metadata.
   */
  shutdown(): Promise<void> {
    if (!this.closing) {
      this.closing = this.close();
    }
    return this.closing;
  }

  private async close(): Promise<void> {
    this.slideshow.stop();
    await this.watcher?.close();
    await this.mutations.idle();
    await this.scheduler.shutdown();
    try {
      this.metadataStore?.close();
    } catch (error) {
      log('error', `Failed to flush metadata store: ${describeError(error)}`);
    }
    log('info', 'Engine shut down');
    this.detachLogger();
  }

  private rejected(message: string): MutationOutcome {
    const error = engineError('invalid-request', this.closing ? 'Engine is shut down' : message);
    return { result: { ok: false, error }, handle: this.show() };
  }
}

/**
 * createImageTriage(config, options?)
 *
 * CONTRACT:
 *   Algorithm:
 *     1. Apply log level and log directory from config
 *     2. Scan start dirs (sort folders and .thumbs skipped)
 *     3. Open the metadata store in cacheDir, unless a decoder is injected
 *     4. Build cache, scheduler and index, and wire the engine
 *     5. Start watching the start dirs when config.watchFiles is set
 *
 *   Invariants:
 *     - The cursor starts on the first image; nothing is loaded until show() or navigate()
 */
export async function createImageTriage(config: AppConfig, options: ImageTriageOptions = {}): Promise<ImageTriage> {
  setLogLevel(config.logLevel);
  setLogDirectory(config.logDir);

  const identities = await scanImages(config);
  const clock = options.clock ?? Date.now;
  const events = new EventHub();

  let metadataStore: MetadataStore | null = null;
  let decoder = options.decoder;
  if (!decoder) {
    metadataStore = await MetadataStore.open(config.cacheDir);
    decoder = new SharpImageDecoder({ metadataStore });
  }

  log('info', `Loaded ${identities.length} images from ${config.startDirs.join(', ')}`);
  return new ImageTriage({
    config,
    events,
    clock,
    decoder,
    metadataStore,
    watch: options.watch,
    index: new ImageIndex(identities, { random: options.random }),
    cache: new CacheStore({ budget: config.cache, clock, events }),
    scheduler: new TaskScheduler({
      workerCount: config.workerCount,
      maxBackgroundQueue: config.maxBackgroundQueue,
    }),
  });
}

/**
 * Library Watcher
 *
 * Keeps the index and cache in step with image files that other programs add,
 * change or remove inside the start directories.
 */

import fs from 'fs';
import path from 'path';
import { AppConfig, ImageIdentity } from '../../shared/types';
import { isErrnoException } from '../errors';
import { EventHub, LibraryChange } from '../events';
import { CacheStore } from '../image-cache/cache-store';
import { describeError, log } from '../logging';
import { THUMBNAIL_FOLDER_NAME, excludedFolders } from '../mutation/sort-folders';
import { TaskScheduler } from '../scheduler/task-scheduler';
import { ImageIndex } from './image-index';
import { isImageFile } from './scanner';

export interface WatchHandle {
  close(): void;
}

/**
 * Starts watching `dir` recursively, calling `onChange` with the absolute path
 * of every file that may have changed.
 */
export type WatchFactory = (
  dir: string,
  onChange: (file: string) => void,
  onError: (error: unknown) => void
) => WatchHandle;

export const watchRecursive: WatchFactory = (dir, onChange, onError) => {
  const watcher = fs.watch(dir, { recursive: true }, (_event, filename) => {
    if (filename) {
      onChange(path.join(dir, filename));
    }
  });
  watcher.on('error', onError);
  return watcher;
};

export interface LibraryWatcherOptions {
  index: ImageIndex;
  cache: CacheStore;
  scheduler: TaskScheduler;
  events: EventHub;
  folders: Pick<AppConfig, 'categories' | 'startDirs' | 'sortDir'>;
  watch?: WatchFactory;
}

function isInside(dir: string, file: string): boolean {
  const relative = path.relative(dir, file);
  return relative.length > 0 && !relative.startsWith('..') && !path.isAbsolute(relative);
}

// ============================================================================
// CONTRACT: LibraryWatcher class
// ============================================================================

/**
 * CONTRACT:
 *   State:
 *     - handles: one watch per start directory
 *     - queue: tail of the chain applying changes one at a time, in arrival order
 *
 *   Invariants:
 *     - Only image files inside a start dir count; sort folders and .thumbs are ignored
 *     - A change is applied from a fresh stat, never from the event kind:
 *         file present, not indexed  -> added to the index
 *         file present, indexed      -> cache entry invalidated (new content)
 *         file gone, indexed         -> removed from index and cache, loads cancelled
 *         file gone, not indexed     -> nothing
 *     - A start dir that cannot be watched is logged and skipped
 *     - Nothing is applied after close()
 */
export class LibraryWatcher {
  private readonly index: ImageIndex;
  private readonly cache: CacheStore;
  private readonly scheduler: TaskScheduler;
  private readonly events: EventHub;
  private readonly startDirs: string[];
  private readonly excluded: string[];
  private readonly watch: WatchFactory;
  private handles: WatchHandle[] = [];
  private queue: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(options: LibraryWatcherOptions) {
    this.index = options.index;
    this.cache = options.cache;
    this.scheduler = options.scheduler;
    this.events = options.events;
    this.startDirs = options.folders.startDirs.map((dir) => path.resolve(dir));
    this.excluded = Array.from(excludedFolders(options.folders));
    this.watch = options.watch ?? watchRecursive;
  }

  start(): void {
    for (const dir of this.startDirs) {
      try {
        this.handles.push(
          this.watch(
            dir,
            (file) => {
              void this.notify(file);
            },
            (error) => log('warn', `[library] watcher for ${dir} failed: ${describeError(error)}`)
          )
        );
      } catch (error) {
        log('warn', `[library] cannot watch ${dir}: ${describeError(error)}`);
      }
    }
  }

  /**
   * Queues `file` for a check and resolves with what was applied, or null.
   * Never rejects; failures are logged.
   */
  notify(file: string): Promise<LibraryChange | null> {
    const applied = this.queue
      .then(() => this.apply(path.resolve(file)))
      .catch((error) => {
        log('error', `[library] failed to apply change to ${file}: ${describeError(error)}`);
        return null;
      });
    this.queue = applied.then(() => undefined);
    return applied;
  }

  async close(): Promise<void> {
    this.closed = true;
    const handles = this.handles;
    this.handles = [];
    handles.forEach((handle) => handle.close());
    await this.queue;
  }

  private isTracked(file: string): boolean {
    return (
      isImageFile(file) &&
      this.startDirs.some((dir) => isInside(dir, file)) &&
      !this.excluded.some((dir) => isInside(dir, file)) &&
      !file.split(path.sep).includes(THUMBNAIL_FOLDER_NAME)
    );
  }

  private async apply(file: ImageIdentity): Promise<LibraryChange | null> {
    if (this.closed || !this.isTracked(file)) {
      return null;
    }
    const present = await this.isFile(file);
    if (this.closed) {
      return null;
    }

    const indexed = this.index.has(file);
    let change: LibraryChange | null = null;
    if (present && !indexed) {
      this.index.add([file]);
      change = 'added';
    } else if (present) {
      this.cache.invalidate(file);
      change = 'modified';
    } else if (indexed) {
      this.index.remove(file);
      this.cache.invalidate(file);
      this.scheduler.cancelAllFor(file, ['load', 'metadata']);
      change = 'removed';
    }
    if (change) {
      this.events.emit({ type: 'library', change, identity: file });
    }
    return change;
  }

  private async isFile(file: string): Promise<boolean> {
    try {
      return (await fs.promises.stat(file)).isFile();
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }
}

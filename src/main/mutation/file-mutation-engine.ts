/**
 * File Mutation Engine
 *
 * Moves images into category folders, deletes them into the deleted folder and
 * undoes either. The filesystem work runs as scheduler tasks; the index, cache
 * and undo stack are only touched once the files have actually moved.
 */

import path from 'path';
import {
  AppConfig,
  EngineError,
  ImageIdentity,
  MovedFile,
  MutationAction,
  MutationResult,
  UndoRecord,
  UndoResult,
} from '../../shared/types';
import { engineError } from '../errors';
import { EventHub } from '../events';
import { CacheStore } from '../image-cache/cache-store';
import { ImageIndex } from '../library/image-index';
import { TaskResult, TaskScheduler } from '../scheduler/task-scheduler';
import { moveWithRelated, removeIfEmpty, restoreBatch } from './file-operations';
import { sortFoldersFor } from './sort-folders';
import { UndoStack } from './undo-stack';

export interface FileMutationEngineOptions {
  index: ImageIndex;
  cache: CacheStore;
  scheduler: TaskScheduler;
  undoStack: UndoStack;
  events: EventHub;
  folders: Pick<AppConfig, 'categories' | 'startDirs' | 'sortDir'>;
  clock?: () => number;
}

/**
 * Failures of the filesystem step surface as `filesystem` errors whatever the
 * underlying cause; cancellation keeps its own kind.
 */
function failureOf(result: Exclude<TaskResult<unknown>, { status: 'ok' }>, identity: ImageIdentity, what: string): EngineError {
  if (result.status === 'cancelled') {
    return engineError('cancelled', `${what} cancelled`, identity);
  }
  return engineError('filesystem', `${what} failed: ${result.error.message}`, identity, result.error);
}

// ============================================================================
// CONTRACT: FileMutationEngine class
// ============================================================================

/**
 * CONTRACT:
 *   State:
 *     - locks: identity -> tail of the chain of mutations queued for it
 *     - pending: mutations not yet finished (undo waits for them)
 *
 *   Invariants:
 *     - Mutations of the same identity run one after another, never dropped
 *     - On success, in this order: identity removed from the index, cache entry
 *       invalidated, its loads cancelled, undo record pushed
 *     - On failure none of index, cache or undo stack changes, except that an
 *       image whose file is gone is dropped from index and cache (not-found)
 *     - undo() failing puts the record back on the stack
 *     - Every outcome is also emitted as a mutation or undo event
 */
export class FileMutationEngine {
  private readonly index: ImageIndex;
  private readonly cache: CacheStore;
  private readonly scheduler: TaskScheduler;
  private readonly undoStack: UndoStack;
  private readonly events: EventHub;
  private readonly folders: Pick<AppConfig, 'categories' | 'startDirs' | 'sortDir'>;
  private readonly clock: () => number;
  private locks = new Map<ImageIdentity, Promise<void>>();
  private pending = new Set<Promise<unknown>>();

  constructor(options: FileMutationEngineOptions) {
    this.index = options.index;
    this.cache = options.cache;
    this.scheduler = options.scheduler;
    this.undoStack = options.undoStack;
    this.events = options.events;
    this.folders = options.folders;
    this.clock = options.clock ?? Date.now;
  }

  move(identity: ImageIdentity, category: string): Promise<MutationResult> {
    if (!this.folders.categories.includes(category)) {
      return Promise.resolve(this.fail('move', identity, engineError('invalid-request', `Unknown category: ${category}`, identity)));
    }
    return this.track(this.withLock(identity, () => this.apply(identity, 'move', category)));
  }

  delete(identity: ImageIdentity): Promise<MutationResult> {
    return this.track(this.withLock(identity, () => this.apply(identity, 'delete')));
  }

  /**
   * undo()
   *
   * CONTRACT:
   *   Outputs:
   *     - { ok: true, record } once the files are back and the identity is current again
   *     - { ok: false, error: empty-undo } when there is nothing to undo
   *     - { ok: false, error: filesystem } when the files could not be moved back
   *
   *   Algorithm:
   *     1. Wait for every pending mutation
   *     2. Pop the latest record
   *     3. Move its files back and remove the emptied destination folder
   *     4. Reinsert the identity at its sorted position and make it current
   */
  async undo(): Promise<UndoResult> {
    await this.idle();

    const record = this.undoStack.pop();
    if (!record) {
      const error = engineError('empty-undo', 'Nothing to undo');
      this.events.emit({ type: 'undo', identity: null, ok: false, error });
      return { ok: false, error };
    }

    return this.withLock<UndoResult>(record.identity, async () => {
      const handle = this.scheduler.submit({
        identity: record.identity,
        kind: 'move',
        priority: 'interactive',
        run: async () => {
          await restoreBatch(record.movedFiles);
          await removeIfEmpty(record.destinationDirectory);
        },
      });
      const result = await handle.result;
      if (result.status !== 'ok') {
        this.undoStack.push(record);
        const error = failureOf(result, record.identity, `Undo of ${record.action}`);
        this.events.emit({ type: 'undo', identity: record.identity, ok: false, error });
        return { ok: false, error };
      }

      this.index.insertSorted(record.identity);
      this.index.setCurrent(record.identity);
      this.cache.invalidate(record.identity);
      this.events.emit({ type: 'undo', identity: record.identity, ok: true });
      return { ok: true, record };
    });
  }

  get undoDepth(): number {
    return this.undoStack.size;
  }

  /**
   * Resolves once every mutation started so far has finished.
   */
  async idle(): Promise<void> {
    await Promise.allSettled(Array.from(this.pending));
  }

  private async apply(identity: ImageIdentity, action: MutationAction, category?: string): Promise<MutationResult> {
    if (!this.index.has(identity)) {
      return this.fail(action, identity, engineError('invalid-request', `Not in the image list: ${identity}`, identity));
    }

    const folders = sortFoldersFor(identity, this.folders);
    const destinationDirectory = category === undefined ? folders.deleted : folders.categories.get(category);
    if (destinationDirectory === undefined) {
      return this.fail(action, identity, engineError('invalid-request', `Unknown category: ${category}`, identity));
    }

    const handle = this.scheduler.submit<MovedFile[]>({
      identity,
      kind: action,
      priority: 'interactive',
      run: () => moveWithRelated(identity, destinationDirectory),
    });
    const result = await handle.result;
    const what = action === 'delete' ? 'Delete' : 'Move';
    if (result.status === 'error' && result.error.kind === 'not-found') {
      this.forget(identity);
      return this.fail(action, identity, engineError('not-found', `${what} failed: ${result.error.message}`, identity, result.error));
    }
    if (result.status !== 'ok') {
      return this.fail(action, identity, failureOf(result, identity, what));
    }

    const record: UndoRecord = {
      identity,
      action,
      originalDirectory: path.dirname(identity),
      destinationDirectory,
      movedFiles: result.value,
      timestamp: this.clock(),
    };
    if (category !== undefined) {
      record.category = category;
    }

    this.forget(identity);
    this.undoStack.push(record);
    this.events.emit({ type: 'mutation', action, identity, ok: true });
    return { ok: true, record };
  }

  private forget(identity: ImageIdentity): void {
    this.index.remove(identity);
    this.cache.invalidate(identity);
    this.scheduler.cancelAllFor(identity, ['load', 'metadata']);
  }

  private fail(action: MutationAction, identity: ImageIdentity, error: EngineError): MutationResult {
    this.events.emit({ type: 'mutation', action, identity, ok: false, error });
    return { ok: false, error };
  }

  private withLock<T>(identity: ImageIdentity, work: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(identity) ?? Promise.resolve();
    const next = previous.then(work);
    const release = () => {
      if (this.locks.get(identity) === tail) {
        this.locks.delete(identity);
      }
    };
    const tail: Promise<void> = next.then(release, release);
    this.locks.set(identity, tail);
    return next;
  }

  private track<T>(work: Promise<T>): Promise<T> {
    const tracked: Promise<T> = work.finally(() => {
      this.pending.delete(tracked);
    });
    this.pending.add(tracked);
    return tracked;
  }
}

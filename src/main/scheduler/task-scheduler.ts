/**
 * Task Scheduler
 *
 * Fixed pool of worker loops fed by a two-class priority queue. Task bodies are
 * async (file reads, sharp decodes, renames), so the loops overlap their I/O on
 * the libuv thread pool while the coordinating loop stays free.
 */

import os from 'os';
import { EngineError, EngineErrorKind, ImageIdentity } from '../../shared/types';
import { toEngineError } from '../errors';
import { describeError, log } from '../logging';

export type TaskKind = 'load' | 'metadata' | 'move' | 'delete';

export type TaskPriority = 'interactive' | 'background';

export type TaskState = 'queued' | 'running' | 'done';

export type TaskResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'error'; error: EngineError }
  | { status: 'cancelled' };

export class CancellationToken {
  private cancelledFlag = false;

  get cancelled(): boolean {
    return this.cancelledFlag;
  }

  cancel(): void {
    this.cancelledFlag = true;
  }
}

export interface TaskSpec<T> {
  identity: ImageIdentity;
  kind: TaskKind;
  priority: TaskPriority;
  run: (token: CancellationToken) => Promise<T>;
}

export interface TaskHandle<T> {
  readonly id: number;
  readonly identity: ImageIdentity;
  readonly kind: TaskKind;
  readonly priority: TaskPriority;
  readonly state: TaskState;
  readonly token: CancellationToken;
  readonly result: Promise<TaskResult<T>>;
}

export interface TaskSchedulerOptions {
  workerCount?: number;
  maxBackgroundQueue?: number;
}

export interface SchedulerStats {
  workers: number;
  running: number;
  queuedInteractive: number;
  queuedBackground: number;
  completed: number;
  failed: number;
  cancelled: number;
}

type TaskInfo = Pick<TaskHandle<unknown>, 'id' | 'identity' | 'kind' | 'priority' | 'state' | 'token'>;

interface TaskRecord {
  info: {
    id: number;
    identity: ImageIdentity;
    kind: TaskKind;
    priority: TaskPriority;
    state: TaskState;
    token: CancellationToken;
  };
  execute: () => Promise<void>;
  settleCancelled: () => void;
}

const FALLBACK_ERROR_KIND: Record<TaskKind, EngineErrorKind> = {
  load: 'decode',
  metadata: 'decode',
  move: 'filesystem',
  delete: 'filesystem',
};

export const DEFAULT_MAX_BACKGROUND_QUEUE = 64;

export function defaultWorkerCount(): number {
  return Math.max(1, Math.min(4, os.availableParallelism()));
}

// ============================================================================
// CONTRACT: TaskScheduler class
// ============================================================================

/**
 * CONTRACT:
 *   State:
 *     - interactiveQueue / backgroundQueue: tasks not yet started, FIFO per class
 *     - running: tasks currently executing in a worker loop
 *     - idleWorkers: worker loops waiting on the submission channel
 *
 *   Invariants:
 *     - Interactive tasks are always taken before background tasks
 *     - At most workerCount tasks run at once
 *     - backgroundQueue.length <= maxBackgroundQueue (oldest queued background task is cancelled on overflow)
 *     - Every handle's result settles exactly once: ok, error or cancelled
 *     - A task cancelled while running still finishes, but its result is reported as cancelled
 *     - A throwing task yields an error result; its worker keeps serving the queue
 *     - submit() never blocks and never throws
 */
export class TaskScheduler {
  private readonly workerCount: number;
  private readonly maxBackgroundQueue: number;
  private interactiveQueue: TaskRecord[] = [];
  private backgroundQueue: TaskRecord[] = [];
  private running = new Set<TaskRecord>();
  private idleWorkers: Array<(record: TaskRecord | null) => void> = [];
  private workers: Promise<void>[];
  private nextId = 1;
  private closed = false;
  private completed = 0;
  private failed = 0;
  private cancelledCount = 0;

  constructor(options: TaskSchedulerOptions = {}) {
    this.workerCount = Math.max(1, Math.floor(options.workerCount ?? defaultWorkerCount()));
    this.maxBackgroundQueue = Math.max(1, Math.floor(options.maxBackgroundQueue ?? DEFAULT_MAX_BACKGROUND_QUEUE));
    this.workers = Array.from({ length: this.workerCount }, () => this.workerLoop());
  }

  /**
   * submit(task)
   *
   * CONTRACT:
   *   Inputs:
   *     - task: identity, kind, priority and async body receiving its cancellation token
   *
   *   Outputs:
   *     - TaskHandle whose result promise settles when the task finishes or is cancelled
   *
   *   Algorithm:
   *     1. After shutdown: return a handle already settled as cancelled
   *     2. If a worker is idle, hand the task to it directly
   *     3. Otherwise append to its priority queue
   *     4. If the background queue overflowed, cancel its oldest entry
   */
  submit<T>(task: TaskSpec<T>): TaskHandle<T> {
    const info: TaskRecord['info'] = {
      id: this.nextId++,
      identity: task.identity,
      kind: task.kind,
      priority: task.priority,
      state: 'queued',
      token: new CancellationToken(),
    };

    let settle: (result: TaskResult<T>) => void = () => {};
    const result = new Promise<TaskResult<T>>((resolve) => {
      settle = resolve;
    });

    const finish = (outcome: TaskResult<T>) => {
      info.state = 'done';
      this.running.delete(record);
      settle(outcome);
    };

    const record: TaskRecord = {
      info,
      execute: async () => {
        if (info.token.cancelled) {
          this.cancelledCount += 1;
          finish({ status: 'cancelled' });
          return;
        }
        try {
          const value = await task.run(info.token);
          if (info.token.cancelled) {
            this.cancelledCount += 1;
            finish({ status: 'cancelled' });
          } else {
            this.completed += 1;
            finish({ status: 'ok', value });
          }
        } catch (error) {
          if (info.token.cancelled) {
            this.cancelledCount += 1;
            finish({ status: 'cancelled' });
            return;
          }
          this.failed += 1;
          log('debug', `[scheduler] ${info.kind} task ${info.id} for ${info.identity} failed: ${describeError(error)}`);
          finish({ status: 'error', error: toEngineError(error, FALLBACK_ERROR_KIND[info.kind], info.identity) });
        }
      },
      settleCancelled: () => {
        info.token.cancel();
        info.state = 'done';
        this.cancelledCount += 1;
        settle({ status: 'cancelled' });
      },
    };

    const handle: TaskHandle<T> = {
      get id() {
        return info.id;
      },
      get identity() {
        return info.identity;
      },
      get kind() {
        return info.kind;
      },
      get priority() {
        return info.priority;
      },
      get state() {
        return info.state;
      },
      get token() {
        return info.token;
      },
      result,
    };

    if (this.closed) {
      record.settleCancelled();
      return handle;
    }

    const idle = this.idleWorkers.shift();
    if (idle) {
      info.state = 'running';
      this.running.add(record);
      idle(record);
      return handle;
    }

    if (info.priority === 'interactive') {
      this.interactiveQueue.push(record);
    } else {
      this.backgroundQueue.push(record);
      if (this.backgroundQueue.length > this.maxBackgroundQueue) {
        const dropped = this.backgroundQueue.shift();
        if (dropped) {
          log('debug', `[scheduler] background queue full, dropping ${dropped.info.kind} task for ${dropped.info.identity}`);
          dropped.settleCancelled();
        }
      }
    }
    return handle;
  }

  /**
   * Cooperative cancel. Returns false when the task had already finished.
   */
  cancel(handle: TaskInfo): boolean {
    if (handle.state === 'done') {
      return false;
    }
    const queued = this.removeQueued((record) => record.info.id === handle.id);
    if (queued.length > 0) {
      queued.forEach((record) => record.settleCancelled());
      return true;
    }
    handle.token.cancel();
    return true;
  }

  cancelAllFor(identity: ImageIdentity, kinds?: TaskKind[]): number {
    return this.cancelWhere((task) => task.identity === identity && (!kinds || kinds.includes(task.kind)));
  }

  /**
   * Cancels every queued or running task matching the predicate. Returns how many were cancelled.
   */
  cancelWhere(predicate: (task: TaskInfo) => boolean): number {
    const queued = this.removeQueued((record) => predicate(record.info));
    queued.forEach((record) => record.settleCancelled());

    let count = queued.length;
    for (const record of this.running) {
      if (!record.info.token.cancelled && predicate(record.info)) {
        record.info.token.cancel();
        count += 1;
      }
    }
    return count;
  }

  /**
   * Moves a queued background task into the interactive class.
   */
  promote(handle: TaskInfo): boolean {
    const index = this.backgroundQueue.findIndex((record) => record.info.id === handle.id);
    if (index === -1) {
      return false;
    }
    const [record] = this.backgroundQueue.splice(index, 1);
    record.info.priority = 'interactive';
    this.interactiveQueue.push(record);
    return true;
  }

  stats(): SchedulerStats {
    return {
      workers: this.workerCount,
      running: this.running.size,
      queuedInteractive: this.interactiveQueue.length,
      queuedBackground: this.backgroundQueue.length,
      completed: this.completed,
      failed: this.failed,
      cancelled: this.cancelledCount,
    };
  }

  /**
   * Cancels everything still queued, lets running tasks finish, and stops the worker loops.
   */
  async shutdown(): Promise<void> {
    if (this.closed) {
      await Promise.all(this.workers);
      return;
    }
    this.closed = true;
    const queued = this.removeQueued(() => true);
    queued.forEach((record) => record.settleCancelled());
    const idle = this.idleWorkers;
    this.idleWorkers = [];
    idle.forEach((wake) => wake(null));
    await Promise.all(this.workers);
  }

  private async workerLoop(): Promise<void> {
    for (;;) {
      const record = await this.take();
      if (!record) {
        return;
      }
      try {
        await record.execute();
      } finally {
        record.info.state = 'done';
        this.running.delete(record);
      }
    }
  }

  private take(): Promise<TaskRecord | null> {
    const next = this.interactiveQueue.shift() ?? this.backgroundQueue.shift();
    if (next) {
      next.info.state = 'running';
      this.running.add(next);
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.idleWorkers.push(resolve);
    });
  }

  private removeQueued(predicate: (record: TaskRecord) => boolean): TaskRecord[] {
    const removed: TaskRecord[] = [];
    const keep = (queue: TaskRecord[]) =>
      queue.filter((record) => {
        if (predicate(record)) {
          removed.push(record);
          return false;
        }
        return true;
      });
    this.interactiveQueue = keep(this.interactiveQueue);
    this.backgroundQueue = keep(this.backgroundQueue);
    return removed;
  }
}

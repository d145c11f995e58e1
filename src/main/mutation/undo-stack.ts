import { UndoRecord } from '../../shared/types';

export const DEFAULT_UNDO_CAPACITY = 256;

/**
 * LIFO of completed mutations with a fixed capacity.
 * Pushing onto a full stack silently drops the oldest record.
 */
export class UndoStack {
  private records: UndoRecord[] = [];

  constructor(private readonly capacity: number = DEFAULT_UNDO_CAPACITY) {
    if (capacity < 1) {
      throw new Error('UndoStack capacity must be at least 1');
    }
  }

  /**
   * Returns the record dropped to make room, if any.
   */
  push(record: UndoRecord): UndoRecord | undefined {
    this.records.push(record);
    if (this.records.length > this.capacity) {
      return this.records.shift();
    }
    return undefined;
  }

  pop(): UndoRecord | undefined {
    return this.records.pop();
  }

  peek(): UndoRecord | undefined {
    return this.records[this.records.length - 1];
  }

  get size(): number {
    return this.records.length;
  }

  clear(): void {
    this.records = [];
  }
}

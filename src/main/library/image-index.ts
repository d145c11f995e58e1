/**
 * Image Index
 *
 * Ordered sequence of image identities with a cursor. Order is the display and
 * navigation order (natural sort of the path unless a comparator is given).
 * All methods are synchronous; callers never observe a half-applied mutation.
 */

import { Direction, ImageIdentity } from '../../shared/types';
import { compareNatural } from './natural-sort';

export interface ImageIndexOptions {
  compare?: (a: ImageIdentity, b: ImageIdentity) => number;
  random?: () => number;
}

// ============================================================================
// CONTRACT: ImageIndex class
// ============================================================================

/**
 * CONTRACT:
 *   State:
 *     - items: identities in navigation order, no duplicates
 *     - cursor: index into items, -1 exactly when items is empty
 *     - shuffleBag: remaining identities of the current random permutation
 *
 *   Invariants:
 *     - items.length === 0 ⇔ cursor === -1
 *     - items.length > 0 ⇒ 0 ≤ cursor < items.length
 *     - remove/insert preserve the relative order of untouched identities
 *     - advance('random') never lands on the current identity when size > 1
 *     - neighborhood(r) is the contiguous window [cursor-r, cursor+r] clipped to bounds
 */
export class ImageIndex {
  private items: ImageIdentity[];
  private cursor: number;
  private positions = new Map<ImageIdentity, number>();
  private positionsDirty = true;
  private shuffleBag: ImageIdentity[] = [];
  private readonly compare: (a: ImageIdentity, b: ImageIdentity) => number;
  private readonly random: () => number;

  constructor(identities: Iterable<ImageIdentity> = [], options: ImageIndexOptions = {}) {
    this.compare = options.compare ?? compareNatural;
    this.random = options.random ?? Math.random;
    this.items = Array.from(new Set(identities)).sort(this.compare);
    this.cursor = this.items.length > 0 ? 0 : -1;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Cursor position, or -1 when the index is empty.
   */
  get position(): number {
    return this.cursor;
  }

  current(): ImageIdentity | undefined {
    return this.cursor === -1 ? undefined : this.items[this.cursor];
  }

  toArray(): ImageIdentity[] {
    return [...this.items];
  }

  has(identity: ImageIdentity): boolean {
    return this.positionOf(identity) !== -1;
  }

  positionOf(identity: ImageIdentity): number {
    if (this.positionsDirty) {
      this.positions = new Map(this.items.map((item, index) => [item, index]));
      this.positionsDirty = false;
    }
    return this.positions.get(identity) ?? -1;
  }

  /**
   * advance(direction)
   *
   * CONTRACT:
   *   Inputs:
   *     - direction: next | previous | first | last | random
   *
   *   Outputs:
   *     - the new current identity, or undefined when the index is empty
   *
   *   Invariants:
   *     - next/previous wrap around at the ends
   *     - random draws from a shuffled permutation, skipping the current identity
   *       and identities removed since the permutation was made; a fresh
   *       permutation is drawn when the bag runs out
   */
  advance(direction: Direction): ImageIdentity | undefined {
    const count = this.items.length;
    if (count === 0) {
      return undefined;
    }

    switch (direction) {
      case 'next':
        this.cursor = (this.cursor + 1) % count;
        break;
      case 'previous':
        this.cursor = (this.cursor - 1 + count) % count;
        break;
      case 'first':
        this.cursor = 0;
        break;
      case 'last':
        this.cursor = count - 1;
        break;
      case 'random':
        this.cursor = this.randomPosition();
        break;
    }
    return this.items[this.cursor];
  }

  setCurrent(identity: ImageIdentity): boolean {
    const position = this.positionOf(identity);
    if (position === -1) {
      return false;
    }
    this.cursor = position;
    return true;
  }

  /**
   * remove(identity)
   *
   * CONTRACT:
   *   Outputs:
   *     - position the identity occupied, or -1 if it was not present
   *
   *   Invariants:
   *     - Removing an entry before the cursor shifts the cursor down by one
   *     - Removing the current entry leaves the cursor on the next remaining entry,
   *       or on the new last entry when the removed one was last
   *     - Removing the only entry empties the index (cursor -1)
   */
  remove(identity: ImageIdentity): number {
    const position = this.positionOf(identity);
    if (position === -1) {
      return -1;
    }
    this.items.splice(position, 1);
    this.positionsDirty = true;

    if (this.items.length === 0) {
      this.cursor = -1;
    } else if (position < this.cursor) {
      this.cursor -= 1;
    } else if (this.cursor >= this.items.length) {
      this.cursor = this.items.length - 1;
    }
    return position;
  }

  /**
   * insert(identity, position)
   *
   * CONTRACT:
   *   Outputs:
   *     - false when the identity is already present (nothing changes)
   *
   *   Invariants:
   *     - position is clamped to [0, size]
   *     - Insertion at or before the cursor shifts it up by one, so it keeps
   *       pointing at the same identity
   *     - Inserting into an empty index makes the new identity current
   */
  insert(identity: ImageIdentity, position: number): boolean {
    if (this.has(identity)) {
      return false;
    }
    const at = Math.min(Math.max(0, Math.floor(position)), this.items.length);
    this.items.splice(at, 0, identity);
    this.positionsDirty = true;

    if (this.cursor === -1) {
      this.cursor = at;
    } else if (at <= this.cursor) {
      this.cursor += 1;
    }
    return true;
  }

  /**
   * Inserts at the position the comparator assigns. Returns the identity's position.
   */
  insertSorted(identity: ImageIdentity): number {
    const existing = this.positionOf(identity);
    if (existing !== -1) {
      return existing;
    }
    let low = 0;
    let high = this.items.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.compare(this.items[mid], identity) < 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    this.insert(identity, low);
    return low;
  }

  /**
   * Merges a batch of identities (e.g. files the library watcher found) keeping the
   * cursor on the same identity. Returns how many were new.
   */
  add(identities: Iterable<ImageIdentity>): number {
    const fresh = Array.from(new Set(identities)).filter((identity) => !this.has(identity));
    if (fresh.length === 0) {
      return 0;
    }
    const current = this.current();
    this.items = this.items.concat(fresh).sort(this.compare);
    this.positionsDirty = true;
    this.cursor = current === undefined ? 0 : this.positionOf(current);
    return fresh.length;
  }

  neighborhood(radius: number): ImageIdentity[] {
    if (this.cursor === -1) {
      return [];
    }
    const r = Math.max(0, Math.floor(radius));
    return this.items.slice(Math.max(0, this.cursor - r), Math.min(this.items.length, this.cursor + r + 1));
  }

  /**
   * |position - cursor|, or undefined when either is missing.
   */
  distanceFromCursor(identity: ImageIdentity): number | undefined {
    const position = this.positionOf(identity);
    if (position === -1 || this.cursor === -1) {
      return undefined;
    }
    return Math.abs(position - this.cursor);
  }

  private randomPosition(): number {
    if (this.items.length === 1) {
      return 0;
    }
    const current = this.current();
    for (;;) {
      if (this.shuffleBag.length === 0) {
        this.shuffleBag = this.shuffle(this.items);
      }
      const candidate = this.shuffleBag.pop();
      if (candidate === undefined || candidate === current) {
        continue;
      }
      const position = this.positionOf(candidate);
      if (position !== -1) {
        return position;
      }
    }
  }

  private shuffle(source: ImageIdentity[]): ImageIdentity[] {
    const bag = [...source];
    for (let i = bag.length - 1; i > 0; i -= 1) {
      const j = Math.floor(this.random() * (i + 1));
      [bag[i], bag[j]] = [bag[j], bag[i]];
    }
    return bag;
  }
}

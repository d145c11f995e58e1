/**
 * Static key table, resolved once at startup from the configured categories.
 * Key names follow KeyboardEvent.key.
 */

import { Direction } from '../shared/types';

export type Command =
  | { type: 'navigate'; direction: Direction }
  | { type: 'move'; category: string }
  | { type: 'delete' }
  | { type: 'undo' }
  | { type: 'toggle-slideshow' };

const MAX_CATEGORY_KEYS = 9;

const FIXED_BINDINGS: ReadonlyArray<[string, Command]> = [
  ['ArrowRight', { type: 'navigate', direction: 'next' }],
  ['ArrowLeft', { type: 'navigate', direction: 'previous' }],
  ['Home', { type: 'navigate', direction: 'first' }],
  ['End', { type: 'navigate', direction: 'last' }],
  ['r', { type: 'navigate', direction: 'random' }],
  ['Delete', { type: 'delete' }],
  ['u', { type: 'undo' }],
  [' ', { type: 'toggle-slideshow' }],
];

/**
 * buildKeyBindings(categories)
 *
 * CONTRACT:
 *   Outputs:
 *     - key -> command map: navigation, delete, undo, slideshow toggle, and
 *       digits 1..9 moving to the matching category (in configured order)
 *
 *   Invariants:
 *     - Categories beyond the ninth get no key
 *     - Letter keys match regardless of case ('R' and 'r' both bind random)
 */
export function buildKeyBindings(categories: string[]): ReadonlyMap<string, Command> {
  const bindings = new Map<string, Command>(FIXED_BINDINGS);
  bindings.set('R', { type: 'navigate', direction: 'random' });
  bindings.set('U', { type: 'undo' });
  bindings.set('Space', { type: 'toggle-slideshow' });
  categories.slice(0, MAX_CATEGORY_KEYS).forEach((category, i) => {
    bindings.set(String(i + 1), { type: 'move', category });
  });
  return bindings;
}

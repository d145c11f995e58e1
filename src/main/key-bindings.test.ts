import { describe, it, expect } from '@jest/globals';
import { buildKeyBindings } from './key-bindings';

describe('buildKeyBindings', () => {
  it('binds navigation, mutation and slideshow keys', () => {
    const bindings = buildKeyBindings([]);
    expect(bindings.get('ArrowRight')).toEqual({ type: 'navigate', direction: 'next' });
    expect(bindings.get('ArrowLeft')).toEqual({ type: 'navigate', direction: 'previous' });
    expect(bindings.get('Home')).toEqual({ type: 'navigate', direction: 'first' });
    expect(bindings.get('End')).toEqual({ type: 'navigate', direction: 'last' });
    expect(bindings.get('r')).toEqual({ type: 'navigate', direction: 'random' });
    expect(bindings.get('R')).toEqual({ type: 'navigate', direction: 'random' });
    expect(bindings.get('Delete')).toEqual({ type: 'delete' });
    expect(bindings.get('u')).toEqual({ type: 'undo' });
    expect(bindings.get(' ')).toEqual({ type: 'toggle-slideshow' });
    expect(bindings.get('Space')).toEqual({ type: 'toggle-slideshow' });
  });

  it('maps digits to categories in configured order', () => {
    const bindings = buildKeyBindings(['keep', 'maybe']);
    expect(bindings.get('1')).toEqual({ type: 'move', category: 'keep' });
    expect(bindings.get('2')).toEqual({ type: 'move', category: 'maybe' });
    expect(bindings.get('3')).toBeUndefined();
  });

  it('gives no key to categories past the ninth', () => {
    const categories = Array.from({ length: 11 }, (_, n) => `c${n + 1}`);
    const bindings = buildKeyBindings(categories);
    expect(bindings.get('9')).toEqual({ type: 'move', category: 'c9' });
    expect(Array.from(bindings.values()).filter((command) => command.type === 'move')).toHaveLength(9);
  });
});

/**
 * Engine Events
 *
 * Structured side channel for navigation, cache and mutation activity.
 * Listeners observe; nothing in the engine depends on anyone listening.
 */

import { Direction, EngineError, ImageIdentity, MutationAction } from '../shared/types';
import { describeError, log } from './logging';

export type EngineEvent =
  | { type: 'navigation'; direction: Direction | 'show'; identity: ImageIdentity | null; position: number; total: number }
  | { type: 'cache-hit'; identity: ImageIdentity }
  | { type: 'cache-miss'; identity: ImageIdentity }
  | { type: 'eviction'; identity: ImageIdentity; cost: number }
  | { type: 'load-error'; identity: ImageIdentity; error: EngineError }
  | { type: 'mutation'; action: MutationAction; identity: ImageIdentity; ok: boolean; error?: EngineError }
  | { type: 'undo'; identity: ImageIdentity | null; ok: boolean; error?: EngineError }
  | { type: 'library'; change: LibraryChange; identity: ImageIdentity };

/**
 * How an outside change to an image file was applied to the index.
 */
export type LibraryChange = 'added' | 'removed' | 'modified';

export type EngineEventListener = (event: EngineEvent) => void;

export class EventHub {
  private listeners: EngineEventListener[] = [];

  /**
   * Registers a listener. Returns the matching unsubscribe function.
   */
  on(listener: EngineEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((existing) => existing !== listener);
    };
  }

  emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        log('warn', `Engine event listener failed on ${event.type}: ${describeError(error)}`);
      }
    }
  }

  get listenerCount(): number {
    return this.listeners.length;
  }
}

/**
 * Bridges engine events into the application log.
 * Chatty events go to debug, failures to warn.
 */
export function attachEventLogger(hub: EventHub): () => void {
  return hub.on((event) => {
    switch (event.type) {
      case 'navigation':
        log('debug', `[navigation] ${event.direction} -> ${event.identity ?? '(empty)'} (${event.position + 1}/${event.total})`);
        return;
      case 'cache-hit':
        log('debug', `[cache] hit ${event.identity}`);
        return;
      case 'cache-miss':
        log('debug', `[cache] miss ${event.identity}`);
        return;
      case 'eviction':
        log('debug', `[cache] evicted ${event.identity} (${event.cost} bytes)`);
        return;
      case 'load-error':
        log('warn', `[loader] ${event.error.kind} for ${event.identity}: ${event.error.message}`);
        return;
      case 'mutation':
        if (event.ok) {
          log('info', `[mutation] ${event.action} ${event.identity}`);
        } else {
          log('warn', `[mutation] ${event.action} failed for ${event.identity}: ${event.error?.message ?? 'unknown error'}`);
        }
        return;
      case 'undo':
        if (event.ok) {
          log('info', `[undo] restored ${event.identity}`);
        } else if (event.error?.kind === 'empty-undo') {
          log('info', '[undo] nothing to undo');
        } else {
          log('warn', `[undo] failed: ${event.error?.message ?? 'unknown error'}`);
        }
        return;
      case 'library':
        log('info', `[library] ${event.change} ${event.identity}`);
        return;
    }
  });
}

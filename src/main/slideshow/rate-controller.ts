/**
 * Slideshow rate negotiation.
 *
 * Pure state machine: callers pass the current time, nothing here reads a clock
 * or owns a timer.
 */

import { CycleDirection, SlideshowConfig } from '../../shared/types';

export type SlideshowState =
  | { status: 'idle' }
  | { status: 'running'; intervalMs: number }
  | { status: 'awaiting-second-press'; direction: CycleDirection; firstPressAt: number; intervalMs: number };

/**
 * Two presses closer together than this would turn the slideshow into a busy loop.
 */
export const MIN_INTERVAL_MS = 50;

export const DEFAULT_SLIDESHOW_CONFIG: SlideshowConfig = {
  defaultIntervalMs: 3000,
  secondPressTimeoutMs: 60000,
};

// ============================================================================
// CONTRACT: RateController class
// ============================================================================

/**
 * CONTRACT:
 *   State:
 *     - idle
 *     - running(intervalMs)
 *     - awaiting-second-press(direction, firstPressAt, intervalMs)
 *
 *   Transitions:
 *     - toggle: idle -> running(defaultIntervalMs); running | awaiting -> idle
 *     - press(d) in running(i): -> awaiting(d, now, i)
 *     - press(d) in awaiting(d, t, i) with now - t < timeout: -> running(max(MIN_INTERVAL_MS, now - t))
 *     - press(d') in awaiting(d, t, i) with d' !== d, or after the timeout: -> awaiting(d', now, i)
 *     - expire(now) in awaiting(d, t, i) with now - t >= timeout: -> running(i)
 *     - press in idle: no change
 *
 *   Invariants:
 *     - Entering running from idle always uses the default interval
 *     - The interval only changes on a completed second press
 */
export class RateController {
  private state: SlideshowState = { status: 'idle' };

  constructor(private readonly config: SlideshowConfig = DEFAULT_SLIDESHOW_CONFIG) {}

  get current(): SlideshowState {
    return this.state;
  }

  get isActive(): boolean {
    return this.state.status !== 'idle';
  }

  get intervalMs(): number | undefined {
    return this.state.status === 'idle' ? undefined : this.state.intervalMs;
  }

  /**
   * When the pending second-press window closes, if one is open.
   */
  get deadline(): number | undefined {
    return this.state.status === 'awaiting-second-press'
      ? this.state.firstPressAt + this.config.secondPressTimeoutMs
      : undefined;
  }

  toggle(): SlideshowState {
    this.state =
      this.state.status === 'idle' ? { status: 'running', intervalMs: this.config.defaultIntervalMs } : { status: 'idle' };
    return this.state;
  }

  press(direction: CycleDirection, now: number): SlideshowState {
    const state = this.state;
    switch (state.status) {
      case 'idle':
        return state;
      case 'running':
        this.state = { status: 'awaiting-second-press', direction, firstPressAt: now, intervalMs: state.intervalMs };
        return this.state;
      case 'awaiting-second-press': {
        const elapsed = now - state.firstPressAt;
        if (direction === state.direction && elapsed < this.config.secondPressTimeoutMs) {
          this.state = { status: 'running', intervalMs: Math.max(MIN_INTERVAL_MS, elapsed) };
        } else {
          this.state = { status: 'awaiting-second-press', direction, firstPressAt: now, intervalMs: state.intervalMs };
        }
        return this.state;
      }
    }
  }

  expire(now: number): SlideshowState {
    const state = this.state;
    if (state.status === 'awaiting-second-press' && now - state.firstPressAt >= this.config.secondPressTimeoutMs) {
      this.state = { status: 'running', intervalMs: state.intervalMs };
    }
    return this.state;
  }
}

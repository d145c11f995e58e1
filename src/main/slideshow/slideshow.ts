/**
 * Slideshow timer driver.
 *
 * Advances every `intervalMs` while the rate controller is active and closes the
 * second-press window when it times out.
 */

import { CycleDirection, SlideshowConfig } from '../../shared/types';
import { log } from '../logging';
import { DEFAULT_SLIDESHOW_CONFIG, RateController, SlideshowState } from './rate-controller';

export interface SlideshowOptions {
  config?: SlideshowConfig;
  advance: (direction: CycleDirection) => void;
  clock?: () => number;
}

export class Slideshow {
  private readonly controller: RateController;
  private readonly advance: (direction: CycleDirection) => void;
  private readonly clock: () => number;
  private direction: CycleDirection = 'next';
  private tickTimer: ReturnType<typeof setTimeout> | null = null;
  private expiryTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: SlideshowOptions) {
    this.controller = new RateController(options.config ?? DEFAULT_SLIDESHOW_CONFIG);
    this.advance = options.advance;
    this.clock = options.clock ?? Date.now;
  }

  get state(): SlideshowState {
    return this.controller.current;
  }

  /**
   * Direction the slideshow advances in: the last cycle key pressed.
   */
  get cycleDirection(): CycleDirection {
    return this.direction;
  }

  toggle(): SlideshowState {
    const state = this.controller.toggle();
    if (state.status === 'idle') {
      this.clearTimers();
      log('info', '[slideshow] stopped');
    } else {
      this.scheduleTick();
      log('info', `[slideshow] started, advancing every ${state.intervalMs} ms`);
    }
    return state;
  }

  /**
   * Feeds a cycle key press into the rate negotiation. Has no effect while stopped.
   */
  press(direction: CycleDirection): SlideshowState {
    if (!this.controller.isActive) {
      return this.controller.current;
    }
    const before = this.controller.intervalMs;
    const state = this.controller.press(direction, this.clock());
    this.direction = direction;

    if (state.status === 'awaiting-second-press') {
      this.scheduleExpiry();
    } else {
      this.clearExpiry();
    }
    if (state.status === 'running' && state.intervalMs !== before) {
      log('info', `[slideshow] interval set to ${state.intervalMs} ms`);
      this.scheduleTick();
    }
    return state;
  }

  stop(): void {
    if (this.controller.isActive) {
      this.toggle();
    }
  }

  private scheduleTick(): void {
    if (this.tickTimer) {
      clearTimeout(this.tickTimer);
    }
    const interval = this.controller.intervalMs;
    if (interval === undefined) {
      this.tickTimer = null;
      return;
    }
    this.tickTimer = setTimeout(() => {
      this.tickTimer = null;
      this.advance(this.direction);
      this.scheduleTick();
    }, interval);
  }

  private scheduleExpiry(): void {
    this.clearExpiry();
    const deadline = this.controller.deadline;
    if (deadline === undefined) {
      return;
    }
    this.expiryTimer = setTimeout(() => {
      this.expiryTimer = null;
      this.controller.expire(this.clock());
    }, Math.max(0, deadline - this.clock()));
  }

  private clearExpiry(): void {
    if (this.expiryTimer) {
      clearTimeout(this.expiryTimer);
      this.expiryTimer = null;
    }
  }

  private clearTimers(): void {
    this.clearExpiry();
    if (this.tickTimer) {
      clearTimeout(this.tickTimer);
      this.tickTimer = null;
    }
  }
}

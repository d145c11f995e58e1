import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { CycleDirection } from '../../shared/types';
import { Slideshow } from './slideshow';

describe('Slideshow', () => {
  let advanced: CycleDirection[];
  let slideshow: Slideshow;

  beforeEach(() => {
    jest.useFakeTimers();
    advanced = [];
    slideshow = new Slideshow({
      config: { defaultIntervalMs: 3000, secondPressTimeoutMs: 60000 },
      advance: (direction) => advanced.push(direction),
    });
  });

  afterEach(() => {
    slideshow.stop();
    jest.useRealTimers();
  });

  it('advances every default interval once started', () => {
    slideshow.toggle();
    jest.advanceTimersByTime(2999);
    expect(advanced).toEqual([]);
    jest.advanceTimersByTime(1);
    expect(advanced).toEqual(['next']);
    jest.advanceTimersByTime(6000);
    expect(advanced).toEqual(['next', 'next', 'next']);
  });

  it('stops advancing when toggled off', () => {
    slideshow.toggle();
    slideshow.toggle();
    jest.advanceTimersByTime(10000);
    expect(advanced).toEqual([]);
    expect(slideshow.state).toEqual({ status: 'idle' });
  });

  it('retimes to the gap between two presses and survives the second-press timeout', () => {
    slideshow.toggle();

    slideshow.press('next');
    jest.advanceTimersByTime(1200);
    expect(slideshow.press('next')).toEqual({ status: 'running', intervalMs: 1200 });
    expect(advanced).toEqual([]);

    jest.advanceTimersByTime(1200);
    expect(advanced).toEqual(['next']);

    // 7600 ms more: t = 10000, six more ticks at the new interval
    jest.advanceTimersByTime(7600);
    expect(advanced).toHaveLength(7);
    slideshow.press('next');
    expect(slideshow.state.status).toBe('awaiting-second-press');

    jest.advanceTimersByTime(60000);
    expect(slideshow.state).toEqual({ status: 'running', intervalMs: 1200 });
  });

  it('advances in the direction of the last cycle key', () => {
    slideshow.toggle();
    slideshow.press('previous');
    jest.advanceTimersByTime(3000);
    expect(advanced).toEqual(['previous']);
    expect(slideshow.cycleDirection).toBe('previous');
  });

  it('ignores presses while stopped', () => {
    expect(slideshow.press('next')).toEqual({ status: 'idle' });
    expect(slideshow.cycleDirection).toBe('next');
  });
});

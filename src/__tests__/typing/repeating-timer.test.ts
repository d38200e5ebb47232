import { createRepeatingTimer, defaultScheduler } from '@/lib/typing';

import { ManualScheduler } from '../helpers/typing-fixtures';

describe('createRepeatingTimer', () => {
  it('schedules once even when started repeatedly', () => {
    const scheduler = new ManualScheduler();
    const callback = jest.fn();
    const timer = createRepeatingTimer(callback, 1000, scheduler);

    timer.start();
    timer.start();

    expect(scheduler.activeCount).toBe(1);
    expect(scheduler.intervals).toEqual([1000]);
    expect(timer.isActive()).toBe(true);
  });

  it('stops delivering ticks after cancel', () => {
    const scheduler = new ManualScheduler();
    const callback = jest.fn();
    const timer = createRepeatingTimer(callback, 1000, scheduler);

    timer.start();
    scheduler.fire();
    timer.cancel();
    scheduler.fire();

    expect(callback).toHaveBeenCalledTimes(1);
    expect(timer.isActive()).toBe(false);
  });

  it('allows cancel when never started', () => {
    const timer = createRepeatingTimer(jest.fn(), 1000, new ManualScheduler());

    expect(() => timer.cancel()).not.toThrow();
  });

  it('can be restarted after cancel', () => {
    const scheduler = new ManualScheduler();
    const timer = createRepeatingTimer(jest.fn(), 250, scheduler);

    timer.start();
    timer.cancel();
    timer.start();

    expect(scheduler.activeCount).toBe(1);
    expect(scheduler.intervals).toEqual([250, 250]);
  });
});

describe('defaultScheduler', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('repeats on the host interval until cancelled', () => {
    const callback = jest.fn();
    const cancel = defaultScheduler.every(callback, 1000);

    jest.advanceTimersByTime(3000);
    cancel();
    jest.advanceTimersByTime(3000);

    expect(callback).toHaveBeenCalledTimes(3);
  });
});

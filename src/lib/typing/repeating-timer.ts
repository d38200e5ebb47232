/** Stops a schedule created by {@link TimerScheduler.every}. */
export type CancelTimer = () => void;

/** Host timer, injectable so tests can deliver ticks by hand. */
export interface TimerScheduler {
  every(callback: () => void, intervalMs: number): CancelTimer;
}

export interface RepeatingTimer {
  /** Starts ticking. Calling it while already active does nothing. */
  start(): void;
  /** Stops ticking. Safe to call when not active. */
  cancel(): void;
  isActive(): boolean;
}

export const defaultScheduler: TimerScheduler = {
  every: (callback, intervalMs) => {
    const handle = setInterval(callback, intervalMs);
    return () => clearInterval(handle);
  },
};

export function createRepeatingTimer(
  callback: () => void,
  intervalMs: number,
  scheduler: TimerScheduler = defaultScheduler,
): RepeatingTimer {
  let cancelActive: CancelTimer | null = null;

  return {
    start() {
      if (cancelActive !== null) return;
      cancelActive = scheduler.every(callback, intervalMs);
    },
    cancel() {
      if (cancelActive === null) return;
      cancelActive();
      cancelActive = null;
    },
    isActive() {
      return cancelActive !== null;
    },
  };
}

/**
 * Clock — injectable time source and timer scheduler.
 *
 * Every timer in the simulator goes through a Clock so tests can drive
 * generators and flush cycles deterministically.
 */

/** Cancels a scheduled callback; safe to call more than once */
export type Cancel = () => void;

export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  /** Run fn once after delayMs */
  schedule(delayMs: number, fn: () => void): Cancel;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  schedule(delayMs, fn) {
    const handle = setTimeout(fn, Math.max(0, delayMs));
    return () => clearTimeout(handle);
  },
};

/**
 * Resolve after delayMs on the given clock, or early when the signal aborts.
 */
export function sleep(clock: Clock, delayMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      cancel();
      resolve();
    };
    const cancel = clock.schedule(delayMs, () => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    });
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

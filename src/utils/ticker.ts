import type { Cancel, Clock } from './clock.js';

/**
 * IntervalTicker — fixed-cadence repeating timer on an injectable Clock.
 *
 * The first tick fires one interval after start(). A late tick fires as soon
 * as it can; when the following slot has also passed, that one fires
 * immediately and the cadence restarts from the current time, so a stalled
 * ticker catches up with at most one extra tick.
 */
export class IntervalTicker {
  private cancel: Cancel | null = null;
  private nextDue = 0;
  private ticks = 0;

  constructor(
    private readonly clock: Clock,
    private readonly intervalMs: number,
    private readonly onTick: () => void,
  ) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`Ticker interval must be a positive number, got ${intervalMs}`);
    }
  }

  start(): void {
    if (this.cancel) return;
    this.nextDue = this.clock.now() + this.intervalMs;
    this.arm();
  }

  stop(): void {
    if (this.cancel) {
      this.cancel();
      this.cancel = null;
    }
  }

  get running(): boolean {
    return this.cancel !== null;
  }

  get tickCount(): number {
    return this.ticks;
  }

  private arm(): void {
    this.cancel = this.clock.schedule(this.nextDue - this.clock.now(), () => this.fire());
  }

  private fire(): void {
    if (!this.cancel) return;
    this.ticks++;

    const now = this.clock.now();
    this.nextDue += this.intervalMs;
    if (this.nextDue < now) {
      this.nextDue = now;
    }

    // Re-arm before running the callback so onTick may call stop()
    this.arm();
    this.onTick();
  }
}

import { describe, it, expect, vi } from 'vitest';
import { sleep } from '../../../src/utils/clock.js';
import { IntervalTicker } from '../../../src/utils/ticker.js';
import { ManualClock } from '../../helpers/manual-clock.js';

describe('IntervalTicker', () => {
  it('should fire first one interval after start', () => {
    const clock = new ManualClock();
    const onTick = vi.fn();
    const ticker = new IntervalTicker(clock, 100, onTick);

    ticker.start();
    clock.advance(99);
    expect(onTick).not.toHaveBeenCalled();

    clock.advance(1);
    expect(onTick).toHaveBeenCalledTimes(1);
  });

  it('should keep a fixed cadence', () => {
    const clock = new ManualClock();
    const ticker = new IntervalTicker(clock, 100, () => undefined);

    ticker.start();
    clock.advance(350);

    expect(ticker.tickCount).toBe(3);
    expect(ticker.running).toBe(true);
  });

  it('should catch up with at most one extra tick after a stall', () => {
    const clock = new ManualClock();
    const ticker = new IntervalTicker(clock, 100, () => undefined);

    ticker.start();
    clock.jump(350);
    clock.advance(0);
    expect(ticker.tickCount).toBe(2);

    clock.advance(99);
    expect(ticker.tickCount).toBe(2);
    clock.advance(1);
    expect(ticker.tickCount).toBe(3);
  });

  it('should stop ticking after stop()', () => {
    const clock = new ManualClock();
    const ticker = new IntervalTicker(clock, 100, () => undefined);

    ticker.start();
    clock.advance(100);
    ticker.stop();
    clock.advance(500);

    expect(ticker.tickCount).toBe(1);
    expect(ticker.running).toBe(false);
    expect(clock.pendingTimers).toBe(0);
  });

  it('should allow stopping from inside the callback', () => {
    const clock = new ManualClock();
    const ticker: IntervalTicker = new IntervalTicker(clock, 100, () => ticker.stop());

    ticker.start();
    clock.advance(1000);

    expect(ticker.tickCount).toBe(1);
  });

  it('should ignore a second start()', () => {
    const clock = new ManualClock();
    const ticker = new IntervalTicker(clock, 100, () => undefined);

    ticker.start();
    ticker.start();
    expect(clock.pendingTimers).toBe(1);
  });

  it('should reject a non-positive interval', () => {
    const clock = new ManualClock();
    expect(() => new IntervalTicker(clock, 0, () => undefined)).toThrow(RangeError);
    expect(() => new IntervalTicker(clock, Number.POSITIVE_INFINITY, () => undefined)).toThrow(
      'Ticker interval must be a positive number, got Infinity',
    );
  });
});

describe('sleep', () => {
  it('should resolve after the delay', async () => {
    const clock = new ManualClock();
    let resolved = false;
    const pending = sleep(clock, 50).then(() => {
      resolved = true;
    });

    clock.advance(49);
    await Promise.resolve();
    expect(resolved).toBe(false);

    clock.advance(1);
    await pending;
    expect(resolved).toBe(true);
  });

  it('should resolve early when aborted', async () => {
    const clock = new ManualClock();
    const abort = new AbortController();
    const pending = sleep(clock, 10_000, abort.signal);

    abort.abort();
    await pending;
    expect(clock.pendingTimers).toBe(0);
  });

  it('should resolve immediately on an already-aborted signal', async () => {
    const clock = new ManualClock();
    await sleep(clock, 10_000, AbortSignal.abort());
    expect(clock.pendingTimers).toBe(0);
  });
});

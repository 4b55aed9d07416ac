import { describe, it, expect, vi } from 'vitest';
import { GenerationError } from '../../../src/core/errors.js';
import { MessageGenerator } from '../../../src/fleet/generator.js';
import type { Message } from '../../../src/fleet/types.js';
import { ManualClock } from '../../helpers/manual-clock.js';
import { TEST_DEVICE } from '../../helpers/messages.js';

function createLogGenerator(clock: ManualClock, source = () => ({ severity: 'info' as const, text: 'tick' })) {
  return new MessageGenerator({ kind: 'log', intervalMs: 100, identity: TEST_DEVICE, clock, source });
}

describe('MessageGenerator', () => {
  it('should yield messages stamped with the clock time', () => {
    const clock = new ManualClock();
    const generator = createLogGenerator(clock);
    const iterator = generator.messages();

    const first = iterator.next().value;
    clock.jump(250);
    const second = iterator.next().value;

    expect(first.timestamp).toBe('2024-01-01T00:00:00.000Z');
    expect(second.timestamp).toBe('2024-01-01T00:00:00.250Z');
    expect(second.payload).toEqual({ severity: 'info', text: 'tick' });
    expect(generator.count).toBe(2);
  });

  it('should push one message per interval once started', () => {
    const clock = new ManualClock();
    const generator = createLogGenerator(clock);
    const received: Message[] = [];

    generator.start((m) => received.push(m), () => undefined);
    clock.advance(99);
    expect(received).toHaveLength(0);

    clock.advance(301);
    expect(received.map((m) => m.timestamp)).toEqual([
      '2024-01-01T00:00:00.100Z',
      '2024-01-01T00:00:00.200Z',
      '2024-01-01T00:00:00.300Z',
      '2024-01-01T00:00:00.400Z',
    ]);
    expect(generator.running).toBe(true);
  });

  it('should stop producing after stop()', () => {
    const clock = new ManualClock();
    const generator = createLogGenerator(clock);
    const sink = vi.fn();

    generator.start(sink, () => undefined);
    clock.advance(100);
    generator.stop();
    clock.advance(1000);

    expect(sink).toHaveBeenCalledTimes(1);
    expect(generator.running).toBe(false);
    expect(clock.pendingTimers).toBe(0);
  });

  it('should report a failing source as a GenerationError and stop', () => {
    const clock = new ManualClock();
    const generator = createLogGenerator(clock, () => {
      throw new Error('flash read failed');
    });
    const faults: GenerationError[] = [];

    generator.start(() => undefined, (err) => faults.push(err));
    clock.advance(500);

    expect(faults).toHaveLength(1);
    expect(faults[0]).toBeInstanceOf(GenerationError);
    expect(faults[0]?.message).toBe('Payload source failed for log on dev-1: flash read failed');
    expect(faults[0]?.deviceId).toBe('dev-1');
    expect(generator.running).toBe(false);
    expect(generator.count).toBe(0);
  });

  it('should report a malformed message', () => {
    const clock = new ManualClock();
    const generator = new MessageGenerator({
      kind: 'sensorData',
      intervalMs: 100,
      identity: TEST_DEVICE,
      clock,
      source: () => ({ readings: [] }),
    });
    const faults: GenerationError[] = [];

    generator.start(() => undefined, (err) => faults.push(err));
    clock.advance(100);

    expect(faults).toHaveLength(1);
    expect(faults[0]?.kind).toBe('sensorData');
    expect(faults[0]?.message).toMatch(/^Malformed sensorData message from dev-1: sensor_data: /);
  });
});

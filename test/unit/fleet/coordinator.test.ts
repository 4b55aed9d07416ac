import { describe, it, expect } from 'vitest';
import { FleetConfigSchema } from '../../../src/core/types.js';
import type { FleetEvents } from '../../../src/core/types.js';
import { FleetCoordinator, type FleetCoordinatorOptions, type FleetSettings } from '../../../src/fleet/coordinator.js';
import { ManualClock, flushMicrotasks } from '../../helpers/manual-clock.js';
import { RecordingTransport } from '../../helpers/mock-transport.js';

function settings(overrides: { deviceCount?: number; spawnStaggerMs?: number; bufferCapacity?: number } = {}): FleetSettings {
  return FleetConfigSchema.parse({
    fleet: { deviceCount: overrides.deviceCount ?? 3, spawnStaggerMs: overrides.spawnStaggerMs ?? 0 },
    device: {
      logIntervalMs: 100,
      sensorIntervalMs: 100,
      writeIntervalMs: 100,
      bufferCapacity: overrides.bufferCapacity ?? 3,
    },
  });
}

function sequentialIds(): () => string {
  let next = 0;
  return () => `dev-${next++}`;
}

function createFleet(options: Partial<FleetCoordinatorOptions> = {}) {
  const clock = new ManualClock();
  const transports = new Map<string, RecordingTransport>();
  const fleet = new FleetCoordinator({
    settings: settings(),
    clock,
    createDeviceId: sequentialIds(),
    createTransport: (deviceId) => {
      const transport = new RecordingTransport();
      transports.set(deviceId, transport);
      return transport;
    },
    sources: {
      log: () => ({ severity: 'info', text: 'status ok' }),
      sensorData: () => ({ readings: [{ name: 'Temp1', value: 20 }] }),
    },
    ...options,
  });
  return { fleet, clock, transports };
}

describe('FleetCoordinator', () => {
  it('should create one worker per device with distinct ids', () => {
    const { fleet } = createFleet();
    expect(fleet.size).toBe(3);
    expect(fleet.getWorkers().map((w) => w.deviceId)).toEqual(['dev-0', 'dev-1', 'dev-2']);
    expect(fleet.getWorker('dev-1')?.firmwareVersion).toBe('1.0-sim');
    expect(fleet.getWorker('dev-9')).toBeUndefined();
  });

  it('should generate nanoid device ids by default', () => {
    const fleet = new FleetCoordinator({
      settings: settings({ deviceCount: 2 }),
      clock: new ManualClock(),
      createTransport: () => new RecordingTransport(),
    });
    const ids = fleet.getWorkers().map((w) => w.deviceId);
    expect(ids[0]).toMatch(/^[A-Za-z0-9_-]{21}$/);
    expect(ids[0]).not.toBe(ids[1]);
  });

  it('should reject duplicate device ids', () => {
    expect(() => createFleet({ createDeviceId: () => 'same' })).toThrow('Duplicate device id "same"');
  });

  it('should stagger worker starts', async () => {
    const { fleet, clock } = createFleet({ settings: settings({ spawnStaggerMs: 20 }) });
    const started: FleetEvents['worker:started'][] = [];
    fleet.events.on('worker:started', (e) => started.push(e));

    const starting = fleet.start();
    expect(fleet.getWorkers().map((w) => w.getState())).toEqual(['running', 'idle', 'idle']);

    clock.advance(20);
    await flushMicrotasks();
    clock.advance(20);
    await starting;

    const t0 = Date.UTC(2024, 0, 1);
    expect(started).toEqual([
      { deviceId: 'dev-0', timestamp: t0 },
      { deviceId: 'dev-1', timestamp: t0 + 20 },
      { deviceId: 'dev-2', timestamp: t0 + 40 },
    ]);
  });

  it('should stop spawning when stopped mid-stagger', async () => {
    const { fleet } = createFleet({ settings: settings({ spawnStaggerMs: 1000 }) });

    const starting = fleet.start();
    await fleet.stop();
    await starting;

    expect(fleet.getWorkers().map((w) => w.getState())).toEqual(['stopped', 'stopped', 'stopped']);
    expect(fleet.getStats().totals.generated).toBe(0);
  });

  it('should keep each device on its own transport', async () => {
    const { fleet, clock, transports } = createFleet();

    await fleet.start();
    await clock.advanceAsync(300, 100);
    await fleet.stop();

    for (const [deviceId, transport] of transports) {
      expect(transport.sent).toHaveLength(6);
      expect(transport.sent.every((m) => m.deviceId === deviceId)).toBe(true);
    }
  });

  it('should isolate a faulting device from the rest of the fleet', async () => {
    let calls = 0;
    const { fleet, clock } = createFleet({
      sources: {
        log: () => ({ severity: 'info', text: 'status ok' }),
        sensorData: () => {
          if (calls++ === 0) throw new Error('sensor offline');
          return { readings: [{ name: 'Temp1', value: 20 }] };
        },
      },
    });

    await fleet.start();
    clock.advance(100);
    await flushMicrotasks();

    expect(fleet.getWorkers().map((w) => w.getState())).toEqual(['stopped', 'running', 'running']);
    clock.advance(200);
    expect(fleet.getStats().totals).toMatchObject({ running: 2, stopped: 1, flushes: 6 });

    await fleet.stop();
    const exits = await fleet.done();
    expect(exits.map((e) => e.reason)).toEqual(['fault', 'shutdown', 'shutdown']);
  });

  it('should aggregate stats across devices', async () => {
    const { fleet, clock } = createFleet({ settings: settings({ bufferCapacity: 1 }) });

    await fleet.start();
    await clock.advanceAsync(200, 100);
    await fleet.stop();

    const stats = fleet.getStats();
    expect(stats.devices).toHaveLength(3);
    expect(stats.totals).toEqual({
      generated: 12,
      flushes: 6,
      sent: 6,
      sendFailed: 0,
      dropped: 6,
      running: 0,
      stopped: 3,
    });
  });

  it('should make stop() idempotent', async () => {
    const { fleet } = createFleet();

    await fleet.start();
    const first = fleet.stop();
    expect(fleet.stop()).toBe(first);
    await first;
  });
});

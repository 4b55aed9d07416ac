/**
 * FleetCoordinator — spawns N independent DeviceWorkers from one
 * configuration template and shuts them down together.
 *
 * Workers share only read-only settings and the observability bus; each
 * owns its own buffer, generators and timers, so one device's fault never
 * reaches another.
 */

import { nanoid } from 'nanoid';
import { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import type { FleetConfig } from '../core/types.js';
import type { Transport } from '../transport/types.js';
import { sleep, systemClock, type Clock } from '../utils/clock.js';
import type { PayloadSources, RandomSource } from './payloads.js';
import type { FleetStats, WorkerStats } from './types.js';
import { DeviceWorker, type WorkerExit } from './worker.js';

export type FleetSettings = Pick<FleetConfig, 'fleet' | 'device' | 'priority'>;

export interface FleetCoordinatorOptions {
  settings: FleetSettings;
  /** Called once per device; may return a shared stateless transport */
  createTransport: (deviceId: string) => Transport;
  clock?: Clock;
  events?: EventBus;
  createDeviceId?: () => string;
  sources?: Partial<PayloadSources>;
  random?: RandomSource;
}

export class FleetCoordinator {
  readonly events: EventBus;
  private readonly workers: DeviceWorker[];
  private readonly clock: Clock;
  private readonly staggerMs: number;
  private readonly spawnAbort = new AbortController();
  private starting: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: FleetCoordinatorOptions) {
    const { settings } = options;
    const createDeviceId = options.createDeviceId ?? (() => nanoid());

    this.events = options.events ?? new EventBus();
    this.clock = options.clock ?? systemClock;
    this.staggerMs = settings.fleet.spawnStaggerMs;

    this.workers = [];
    const seen = new Set<string>();
    for (let i = 0; i < settings.fleet.deviceCount; i++) {
      const deviceId = createDeviceId();
      if (seen.has(deviceId)) {
        throw new RangeError(`Duplicate device id "${deviceId}"`);
      }
      seen.add(deviceId);

      this.workers.push(
        new DeviceWorker({
          identity: { deviceId, firmwareVersion: settings.fleet.firmwareVersion },
          settings: settings.device,
          priority: settings.priority,
          transport: options.createTransport(deviceId),
          clock: this.clock,
          events: this.events,
          sources: options.sources,
          random: options.random,
        }),
      );
    }

    this.events.on('worker:stopped', ({ deviceId, reason, error }) => {
      if (reason === 'fault') {
        getLogger().error({ deviceId, err: error }, 'Device terminated by fault; fleet continues');
      }
    });
  }

  /**
   * Start every worker, pausing spawnStaggerMs between consecutive starts.
   * Resolves once all workers are running, or early if stop() is called.
   */
  start(): Promise<void> {
    this.starting ??= this.spawnAll();
    return this.starting;
  }

  /**
   * Signal every worker to stop and wait for all of them to quiesce.
   */
  stop(): Promise<void> {
    this.stopping ??= this.stopAll();
    return this.stopping;
  }

  /**
   * Resolves when every worker has stopped, by shutdown or by fault.
   */
  async done(): Promise<WorkerExit[]> {
    return Promise.all(this.workers.map((worker) => worker.done));
  }

  getWorkers(): readonly DeviceWorker[] {
    return this.workers;
  }

  getWorker(deviceId: string): DeviceWorker | undefined {
    return this.workers.find((worker) => worker.deviceId === deviceId);
  }

  get size(): number {
    return this.workers.length;
  }

  getStats(): FleetStats {
    const devices: WorkerStats[] = this.workers.map((worker) => worker.getStats());
    const totals = {
      generated: 0,
      flushes: 0,
      sent: 0,
      sendFailed: 0,
      dropped: 0,
      running: 0,
      stopped: 0,
    };
    for (const stats of devices) {
      totals.generated += stats.generated;
      totals.flushes += stats.flushes;
      totals.sent += stats.sent;
      totals.sendFailed += stats.sendFailed;
      totals.dropped += stats.dropped;
      if (stats.state === 'running') totals.running++;
      if (stats.state === 'stopped') totals.stopped++;
    }
    return { devices, totals };
  }

  private async spawnAll(): Promise<void> {
    const log = getLogger();
    log.info({ devices: this.workers.length }, 'Starting fleet');

    for (const [index, worker] of this.workers.entries()) {
      if (this.spawnAbort.signal.aborted) return;
      if (index > 0 && this.staggerMs > 0) {
        await sleep(this.clock, this.staggerMs, this.spawnAbort.signal);
        if (this.spawnAbort.signal.aborted) return;
      }
      log.info({ deviceId: worker.deviceId }, 'Creating device');
      worker.start();
    }
  }

  private async stopAll(): Promise<void> {
    this.spawnAbort.abort();
    await Promise.all(this.workers.map((worker) => worker.stop()));
    getLogger().info({ totals: this.getStats().totals }, 'Fleet stopped');
  }
}

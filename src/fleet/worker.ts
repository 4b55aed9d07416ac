/**
 * DeviceWorker — one simulated device.
 *
 * Lifecycle:
 * 1. start() — starts one generator per message kind, then the flush ticker
 * 2. Generators push into the PriorityBuffer at their own cadence
 * 3. Each flush tick abandons sends the previous cycle never started,
 *    drains the buffer, dispatches retained messages in priority order and
 *    reports every dropped message
 * 4. stop() — cancels all timers and queued sends, waits for sends already
 *    on the wire, discards whatever is still pending
 *
 * States: idle → running → stopped. A stopped worker cannot be restarted.
 */

import type pino from 'pino';
import { EventBus } from '../core/events.js';
import { TransportError, toError, type GenerationError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { Transport } from '../transport/types.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { IntervalTicker } from '../utils/ticker.js';
import { PriorityBuffer } from './buffer.js';
import { MessageGenerator } from './generator.js';
import { defaultPayloadSources, type PayloadSources, type RandomSource } from './payloads.js';
import { SendLimiter } from './send-limiter.js';
import type {
  DeviceIdentity,
  DeviceSettings,
  DropReason,
  FlushResult,
  Message,
  MessageKind,
  PriorityPolicy,
  StopReason,
  WorkerState,
  WorkerStats,
} from './types.js';

export interface DeviceWorkerOptions {
  identity: DeviceIdentity;
  settings: DeviceSettings;
  priority: PriorityPolicy;
  transport: Transport;
  clock?: Clock;
  /** Observability sink; a private bus is created when omitted */
  events?: EventBus;
  /** Override the random payload factories */
  sources?: Partial<PayloadSources>;
  random?: RandomSource;
}

export interface WorkerExit {
  deviceId: string;
  reason: StopReason;
  error?: Error;
}

export class DeviceWorker {
  readonly deviceId: string;
  readonly firmwareVersion: string;
  readonly done: Promise<WorkerExit>;

  private state: WorkerState = 'idle';
  private readonly settings: DeviceSettings;
  private readonly clock: Clock;
  private readonly transport: Transport;
  private readonly events: EventBus;
  private readonly log: pino.Logger;
  private readonly buffer: PriorityBuffer;
  private readonly generators: Array<MessageGenerator<'log'> | MessageGenerator<'sensorData'>>;
  private readonly flushTicker: IntervalTicker;
  private readonly sendLimiter: SendLimiter<Message>;
  private readonly inFlight = new Set<Promise<void>>();
  private stopping: Promise<void> | null = null;
  private resolveDone: (exit: WorkerExit) => void = () => undefined;

  private flushes = 0;
  private sent = 0;
  private sendFailed = 0;
  private dropped = 0;

  constructor(options: DeviceWorkerOptions) {
    const { identity, settings } = options;
    const clock = options.clock ?? systemClock;
    this.clock = clock;

    this.deviceId = identity.deviceId;
    this.firmwareVersion = identity.firmwareVersion;
    this.settings = settings;
    this.transport = options.transport;
    this.events = options.events ?? new EventBus();
    this.log = getLogger().child({ deviceId: this.deviceId });
    this.buffer = new PriorityBuffer(options.priority);
    this.sendLimiter = new SendLimiter<Message>(settings.maxConcurrentSends);

    const sources = { ...defaultPayloadSources(options.random), ...options.sources };
    this.generators = [
      new MessageGenerator({ kind: 'log', intervalMs: settings.logIntervalMs, identity, clock, source: sources.log }),
      new MessageGenerator({
        kind: 'sensorData',
        intervalMs: settings.sensorIntervalMs,
        identity,
        clock,
        source: sources.sensorData,
      }),
    ];
    this.flushTicker = new IntervalTicker(clock, settings.writeIntervalMs, () => {
      this.flush();
    });

    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
  }

  // ─────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────

  start(): void {
    if (this.state !== 'idle') return;
    this.state = 'running';

    const sink = (message: Message): void => this.buffer.accumulate(message);
    const onFault = (error: GenerationError): void => this.fail(error);
    for (const generator of this.generators) {
      generator.start(sink, onFault);
    }
    this.flushTicker.start();

    this.log.debug({ settings: this.settings }, 'Device started');
    this.events.emit('worker:started', { deviceId: this.deviceId, timestamp: this.clock.now() });
  }

  /**
   * Signal shutdown and wait for sends already on the wire to settle. Idempotent.
   */
  stop(): Promise<void> {
    this.stopping ??= this.halt('shutdown');
    return this.stopping;
  }

  // ─────────────────────────────────────────────────────────
  // FLUSH
  // ─────────────────────────────────────────────────────────

  /**
   * Drain the buffer, dispatch the retained messages and report the dropped ones.
   * Retained messages of the previous cycle that never reached the transport
   * are dropped as `send_backlog`, so at most one cycle's budget waits for a slot.
   * Runs on every flush tick; callable directly while the worker is not stopped.
   */
  flush(): FlushResult {
    if (this.state === 'stopped') {
      return { retained: [], dropped: [] };
    }

    this.reportDrops(this.sendLimiter.abandonQueued(), 'send_backlog');

    const result = this.buffer.flush(this.settings.bufferCapacity);
    this.flushes++;

    for (const message of result.retained) {
      this.dispatch(message);
    }
    this.reportDrops(result.dropped, 'buffer_overflow');

    this.events.emit('flush:completed', {
      deviceId: this.deviceId,
      retained: result.retained.length,
      dropped: result.dropped.length,
      timestamp: this.clock.now(),
    });

    return result;
  }

  /**
   * Wait for every send dispatched so far, including queued ones.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  // ─────────────────────────────────────────────────────────
  // INSPECTION
  // ─────────────────────────────────────────────────────────

  getState(): WorkerState {
    return this.state;
  }

  getStats(): WorkerStats {
    return {
      deviceId: this.deviceId,
      state: this.state,
      generated: this.generators.reduce((sum, g) => sum + g.count, 0),
      flushes: this.flushes,
      sent: this.sent,
      sendFailed: this.sendFailed,
      dropped: this.dropped,
      pending: this.buffer.size,
    };
  }

  get pendingCount(): number {
    return this.buffer.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  // ─────────────────────────────────────────────────────────
  // INTERNALS
  // ─────────────────────────────────────────────────────────

  private dispatch(message: Message): void {
    const task: Promise<void> = this.sendLimiter
      .run(message, () => this.transport.send(message))
      .then(
        (run) => {
          // Abandoned sends are reported by whoever abandoned them
          if (run.status === 'abandoned') return;
          const result = run.value;
          if (result.ok) {
            this.sent++;
            this.log.debug({ kind: message.kind }, 'Message sent successfully');
            this.events.emit('message:sent', { deviceId: this.deviceId, kind: message.kind });
          } else {
            this.reportSendFailure(message, result.error);
          }
        },
        (err: unknown) => {
          const cause = toError(err);
          this.reportSendFailure(message, new TransportError(`Transport threw: ${cause.message}`, undefined, cause));
        },
      )
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private reportSendFailure(message: Message, error: TransportError): void {
    this.sendFailed++;
    this.log.warn({ kind: message.kind, status: error.status, err: error.message }, 'Message send failed');
    this.events.emit('message:sendFailed', { deviceId: this.deviceId, kind: message.kind, cause: error.message });
  }

  /**
   * One summary line per batch (warn, or info on shutdown) plus one event per message.
   */
  private reportDrops(messages: readonly Message[], reason: DropReason): void {
    if (messages.length === 0) return;

    const level = reason === 'shutdown' ? 'info' : 'warn';
    this.log[level](
      { reason, dropped: messages.length, kinds: countByKind(messages) },
      `Dropping ${messages.length} messages (${reason})`,
    );
    for (const message of messages) {
      this.dropped++;
      this.log.debug({ kind: message.kind, reason, timestamp: message.timestamp }, 'Message dropped');
      this.events.emit('message:dropped', { deviceId: this.deviceId, kind: message.kind, reason });
    }
  }

  private fail(error: GenerationError): void {
    this.log.error({ err: error, kind: error.kind }, 'Generation fault; stopping device');
    this.stopping ??= this.halt('fault', error);
    this.stopping.catch((err: unknown) => {
      this.log.error({ err }, 'Device shutdown failed');
    });
  }

  private async halt(reason: StopReason, error?: Error): Promise<void> {
    this.state = 'stopped';
    for (const generator of this.generators) {
      generator.stop();
    }
    this.flushTicker.stop();

    const unsent = this.sendLimiter.abandonQueued();
    await this.drain();
    unsent.push(...this.buffer.clear());
    this.reportDrops(unsent, 'shutdown');

    this.log.debug({ reason, stats: this.getStats() }, 'Device stopped');
    this.events.emit('worker:stopped', { deviceId: this.deviceId, reason, error, timestamp: this.clock.now() });
    this.resolveDone({ deviceId: this.deviceId, reason, error });
  }
}

function countByKind(messages: readonly Message[]): Partial<Record<MessageKind, number>> {
  const counts: Partial<Record<MessageKind, number>> = {};
  for (const message of messages) {
    counts[message.kind] = (counts[message.kind] ?? 0) + 1;
  }
  return counts;
}

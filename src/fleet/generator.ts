/**
 * MessageGenerator — lazy, unending source of messages of one kind.
 *
 * `messages()` is a plain iterator; `start()` attaches it to an interval
 * ticker and pushes one message per tick into a sink. The sink is called
 * synchronously and the generator never waits on it, so generation rate is
 * independent of how fast the consumer flushes or transmits.
 */

import { GenerationError, toError } from '../core/errors.js';
import type { Clock } from '../utils/clock.js';
import { IntervalTicker } from '../utils/ticker.js';
import { createMessage, validateMessage } from './message.js';
import type { DeviceIdentity, Message, MessageKind, MessageOf, PayloadSource } from './types.js';

export interface GeneratorOptions<K extends MessageKind> {
  kind: K;
  intervalMs: number;
  identity: DeviceIdentity;
  clock: Clock;
  source: PayloadSource<K>;
}

export type MessageSink = (message: Message) => void;
export type FaultHandler = (error: GenerationError) => void;

export class MessageGenerator<K extends MessageKind> {
  readonly kind: K;
  readonly intervalMs: number;
  private readonly identity: DeviceIdentity;
  private readonly clock: Clock;
  private readonly source: PayloadSource<K>;
  private ticker: IntervalTicker | null = null;
  private produced = 0;

  constructor(options: GeneratorOptions<K>) {
    this.kind = options.kind;
    this.intervalMs = options.intervalMs;
    this.identity = options.identity;
    this.clock = options.clock;
    this.source = options.source;
  }

  /**
   * Infinite iterator of messages, each stamped with the current clock time.
   * Throws GenerationError when the payload source fails or yields a malformed message.
   */
  *messages(): Generator<MessageOf<K>, never, undefined> {
    while (true) {
      yield this.next();
    }
  }

  /**
   * Begin ticking. Each tick pulls one message and hands it to the sink.
   * On a generation fault the generator stops itself and reports through onFault.
   */
  start(sink: MessageSink, onFault: FaultHandler): void {
    if (this.ticker) return;

    const iterator = this.messages();
    this.ticker = new IntervalTicker(this.clock, this.intervalMs, () => {
      let message: MessageOf<K>;
      try {
        message = iterator.next().value;
      } catch (err) {
        this.stop();
        onFault(err instanceof GenerationError ? err : this.fault('Generator failed', err));
        return;
      }
      sink(message);
    });
    this.ticker.start();
  }

  stop(): void {
    this.ticker?.stop();
    this.ticker = null;
  }

  get running(): boolean {
    return this.ticker?.running ?? false;
  }

  /** Messages produced so far */
  get count(): number {
    return this.produced;
  }

  private next(): MessageOf<K> {
    let message: MessageOf<K>;
    try {
      const timestamp = new Date(this.clock.now()).toISOString();
      message = createMessage(this.kind, this.identity, timestamp, this.source());
    } catch (err) {
      throw this.fault('Payload source failed', err);
    }

    const issues = validateMessage(message);
    if (issues) {
      throw new GenerationError(
        `Malformed ${this.kind} message from ${this.identity.deviceId}: ${issues.join('; ')}`,
        this.identity.deviceId,
        this.kind,
      );
    }

    this.produced++;
    return message;
  }

  private fault(prefix: string, err: unknown): GenerationError {
    const cause = toError(err);
    return new GenerationError(`${prefix} for ${this.kind} on ${this.identity.deviceId}: ${cause.message}`, this.identity.deviceId, this.kind, cause);
  }
}

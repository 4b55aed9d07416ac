/**
 * Mock Transports for Testing
 */

import { TransportError } from '../../src/core/errors.js';
import type { Message } from '../../src/fleet/types.js';
import type { SendResult, Transport } from '../../src/transport/types.js';

/** Records every message; fails the ones matched by failWhen */
export class RecordingTransport implements Transport {
  readonly sent: Message[] = [];
  failWhen: ((message: Message) => boolean) | null = null;

  async send(message: Message): Promise<SendResult> {
    this.sent.push(message);
    if (this.failWhen?.(message)) {
      return { ok: false, error: new TransportError('Failed to send message. Code: 503, Status: Service Unavailable', 503) };
    }
    return { ok: true };
  }
}

/** Holds every send open until the test settles it */
export class DeferredTransport implements Transport {
  readonly calls: Array<{ message: Message; settle: (result: SendResult) => void }> = [];

  send(message: Message): Promise<SendResult> {
    return new Promise((resolve) => {
      this.calls.push({ message, settle: resolve });
    });
  }
}

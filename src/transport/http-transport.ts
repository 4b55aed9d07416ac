/**
 * HttpTransport — POSTs each message as a JSON body to the collector.
 */

import { TransportError, toError } from '../core/errors.js';
import { toWire } from '../fleet/message.js';
import type { Message } from '../fleet/types.js';
import type { HttpTransportConfig, SendResult, Transport } from './types.js';

export type FetchFn = typeof fetch;

export class HttpTransport implements Transport {
  readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(config: HttpTransportConfig, fetchFn: FetchFn = fetch) {
    const endpoint = config.endpoint ?? '/';
    this.url = `http://${config.host}:${config.port}${endpoint.startsWith('/') ? endpoint : `/${endpoint}`}`;
    this.timeoutMs = config.timeoutMs ?? 5000;
    this.fetchFn = fetchFn;
  }

  async send(message: Message): Promise<SendResult> {
    let res: Response;
    try {
      res = await this.fetchFn(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(toWire(message)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      // Drain the body so the connection can be reused
      await res.arrayBuffer();
    } catch (err) {
      const cause = toError(err);
      const reason = cause.name === 'TimeoutError' ? `timed out after ${this.timeoutMs}ms` : cause.message;
      return {
        ok: false,
        error: new TransportError(`Failed to send message without getting a response: ${reason}`, undefined, cause),
      };
    }

    if (!res.ok) {
      return {
        ok: false,
        error: new TransportError(`Failed to send message. Code: ${res.status}, Status: ${res.statusText}`, res.status),
      };
    }
    return { ok: true };
  }
}

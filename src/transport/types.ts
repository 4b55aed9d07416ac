import type { TransportError } from '../core/errors.js';
import type { Message } from '../fleet/types.js';

export type SendResult = { ok: true } | { ok: false; error: TransportError };

/**
 * Delivers one message. Implementations resolve with a failed result
 * instead of rejecting; callers never retry.
 */
export interface Transport {
  send(message: Message): Promise<SendResult>;
}

export interface HttpTransportConfig {
  host: string;
  port: number;
  /** Request path, e.g. "/" or "/ingest" */
  endpoint?: string;
  timeoutMs?: number;
}

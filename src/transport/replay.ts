/**
 * File replay — sends pre-recorded NDJSON messages through a Transport at a
 * fixed interval instead of generating them.
 */

import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { FleetError, ReplayError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { fromWire, WireMessageSchema } from '../fleet/message.js';
import type { Message } from '../fleet/types.js';
import { sleep, systemClock, type Clock } from '../utils/clock.js';
import type { Transport } from './types.js';

export interface ReplayOptions {
  transport: Transport;
  /** Pause after each non-blank line */
  intervalMs: number;
  clock?: Clock;
  signal?: AbortSignal;
}

export interface ReplaySummary {
  lines: number;
  sent: number;
  failed: number;
  invalid: number;
}

export type ParsedLine = { ok: true; message: Message } | { ok: false; reason: string };

/**
 * Parse one NDJSON line into a message.
 */
export function parseLine(line: string): ParsedLine {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (err) {
    return { ok: false, reason: `Invalid JSON: ${toError(err).message}` };
  }

  const result = WireMessageSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return { ok: false, reason: `Invalid message: ${issues.join('; ')}` };
  }
  return { ok: true, message: fromWire(result.data) };
}

/**
 * Replay every line of an NDJSON file. Malformed lines are logged and
 * skipped; failed sends are logged and not retried.
 */
export async function replayFile(path: string, options: ReplayOptions): Promise<ReplaySummary> {
  const log = getLogger().child({ file: path });
  const clock = options.clock ?? systemClock;

  let isFile: boolean;
  try {
    isFile = (await stat(path)).isFile();
  } catch (err) {
    throw new ReplayError(`Cannot read replay file ${path}`, toError(err));
  }
  if (!isFile) {
    throw new ReplayError(`Cannot read replay file ${path}: not a regular file`);
  }

  const summary: ReplaySummary = { lines: 0, sent: 0, failed: 0, invalid: 0 };
  const lines = createInterface({ input: createReadStream(path, 'utf-8'), crlfDelay: Infinity });

  try {
    for await (const line of lines) {
      if (options.signal?.aborted) break;
      if (line.trim() === '') continue;
      summary.lines++;

      const parsed = parseLine(line);
      if (parsed.ok) {
        const result = await options.transport.send(parsed.message);
        if (result.ok) {
          summary.sent++;
          log.info({ line: summary.lines, kind: parsed.message.kind }, 'Message sent successfully');
        } else {
          summary.failed++;
          log.warn({ line: summary.lines, err: result.error.message }, 'Message send failed');
        }
      } else {
        summary.invalid++;
        log.warn({ line: summary.lines, reason: parsed.reason }, 'Error parsing line');
      }

      await sleep(clock, options.intervalMs, options.signal);
    }
  } catch (err) {
    if (err instanceof FleetError) throw err;
    const cause = toError(err);
    throw new ReplayError(`Replay of ${path} failed: ${cause.message}`, cause);
  } finally {
    lines.close();
  }

  log.info(summary, 'Replay finished');
  return summary;
}

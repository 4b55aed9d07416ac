/**
 * `fleetsim replay <file>` — Send pre-recorded NDJSON messages at a fixed interval.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import { createLogger, setLogger } from '../../core/logger.js';
import { HttpTransport } from '../../transport/http-transport.js';
import { replayFile } from '../../transport/replay.js';
import { stopwatch } from '../../utils/timer.js';
import { NAME } from '../../version.js';
import { parseNonNegativeNumber, parsePositiveInt } from '../options.js';

interface ReplayOptions {
  interval?: number;
  port?: number;
  host?: string;
  endpoint?: string;
  config?: string;
}

export function createReplayCommand(): Command {
  const cmd = new Command('replay');

  cmd
    .description('Send messages from an NDJSON file')
    .argument('<file>', 'Path to the NDJSON file')
    .option('-i, --interval <seconds>', 'Timing interval between messages in seconds (default: 1)', parseNonNegativeNumber)
    .option('-p, --port <port>', 'The port to try to hit at http://<host>:<PORT> (default: 8080)', parsePositiveInt)
    .option('--host <host>', 'Collector host (default: localhost)')
    .option('--endpoint <path>', 'Collector request path (default: /)')
    .option('-c, --config <path>', 'Path to a fleetsim.yaml config file')
    .action(async (file: string, options: ReplayOptions) => {
      await executeReplay(file, options);
    });

  return cmd;
}

async function executeReplay(file: string, options: ReplayOptions): Promise<void> {
  const config = new ConfigManager().load(
    {
      transport: { host: options.host, port: options.port, endpoint: options.endpoint },
      replay: { intervalSeconds: options.interval },
    },
    options.config,
  );
  setLogger(createLogger(NAME, config.logging));

  const abort = new AbortController();
  const onSignal = (): void => abort.abort();
  process.once('SIGINT', onSignal);

  const timer = stopwatch();
  try {
    const summary = await replayFile(resolve(file), {
      transport: new HttpTransport(config.transport),
      intervalMs: config.replay.intervalSeconds * 1000,
      signal: abort.signal,
    });
    console.log();
    console.log(`✅ Replayed ${summary.lines} line(s) in ${timer.formatted()}`);
    console.log(`   sent: ${summary.sent}, failed: ${summary.failed}, invalid: ${summary.invalid}`);
    console.log();
  } finally {
    process.off('SIGINT', onSignal);
  }
}

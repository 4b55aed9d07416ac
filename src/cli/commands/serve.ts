/**
 * `fleetsim serve` — Run the collector that receives device messages.
 */

import { Command } from 'commander';
import { CollectorServer } from '../../collector/server.js';
import { ConfigManager } from '../../core/config.js';
import { createLogger, setLogger } from '../../core/logger.js';
import { NAME } from '../../version.js';
import { parsePositiveInt } from '../options.js';

interface ServeOptions {
  port?: number;
  host?: string;
  config?: string;
}

export function createServeCommand(): Command {
  const cmd = new Command('serve');

  cmd
    .description('Receive device messages over HTTP and print them as JSON lines')
    .option('-p, --port <port>', 'Port to listen on (default: 8080)', parsePositiveInt)
    .option('--host <host>', 'Interface to bind (default: all)')
    .option('-c, --config <path>', 'Path to a fleetsim.yaml config file')
    .action(async (options: ServeOptions) => {
      await executeServe(options);
    });

  return cmd;
}

async function executeServe(options: ServeOptions): Promise<void> {
  const config = new ConfigManager().load({ transport: { port: options.port } }, options.config);
  // Accepted messages own stdout; logs go to stderr
  setLogger(createLogger(`${NAME}-collector`, { ...config.logging, destination: 2 }));

  const server = new CollectorServer({ port: config.transport.port, host: options.host });
  await server.start();

  await new Promise<void>((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });

  await server.stop();
  const stats = server.getStats();
  console.error(`\n⏹  Collector stopped (accepted: ${stats.accepted}, rejected: ${stats.rejected})`);
}

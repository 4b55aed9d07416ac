/**
 * `fleetsim simulate` — Run a fleet of simulated devices against a collector.
 */

import { Command } from 'commander';
import { ConfigManager } from '../../core/config.js';
import { createLogger, setLogger } from '../../core/logger.js';
import type { FleetConfig } from '../../core/types.js';
import { FleetCoordinator } from '../../fleet/coordinator.js';
import type { FleetStats, MessageKind, Severity } from '../../fleet/types.js';
import { HttpTransport } from '../../transport/http-transport.js';
import { stopwatch } from '../../utils/timer.js';
import { NAME } from '../../version.js';
import { parseKindList, parsePositiveInt, parseSeverityList } from '../options.js';

export interface SimulateOptions {
  number?: number;
  logInterval?: number;
  sensorInterval?: number;
  writeInterval?: number;
  bufferSize?: number;
  port?: number;
  host?: string;
  endpoint?: string;
  priority?: MessageKind[];
  escalate?: Severity[];
  duration?: number;
  config?: string;
  verbose?: boolean;
}

export function createSimulateCommand(): Command {
  const cmd = new Command('simulate');

  cmd
    .description('Simulate message generation and sending for a fleet of devices')
    .option('-n, --number <count>', 'Number of devices to simulate (default: 3)', parsePositiveInt)
    .option('--log-interval <ms>', 'Time between log messages for a single device in ms (default: 500)', parsePositiveInt)
    .option('--sensor-interval <ms>', 'Time between sensor messages for a single device in ms (default: 500)', parsePositiveInt)
    .option('--write-interval <ms>', 'Time between sending messages for a single device in ms (default: 500)', parsePositiveInt)
    .option('--buffer-size <count>', 'Number of messages a device can send per write (default: 3)', parsePositiveInt)
    .option('-p, --port <port>', 'The port to try to hit at http://<host>:<PORT> (default: 8080)', parsePositiveInt)
    .option('--host <host>', 'Collector host (default: localhost)')
    .option('--endpoint <path>', 'Collector request path (default: /)')
    .option('--priority <kinds>', 'Comma-separated kinds, highest priority first (default: log,sensorData)', parseKindList)
    .option('--escalate <severities>', 'Log severities that outrank every kind, e.g. error', parseSeverityList)
    .option('--duration <ms>', 'Stop after this many milliseconds instead of waiting for Ctrl+C', parsePositiveInt)
    .option('-c, --config <path>', 'Path to a fleetsim.yaml config file')
    .option('-v, --verbose', 'Log every sent and dropped message')
    .action(async (options: SimulateOptions) => {
      await executeSimulate(options);
    });

  return cmd;
}

export function resolveSimulateConfig(options: SimulateOptions, configManager = new ConfigManager()): FleetConfig {
  return configManager.load(
    {
      fleet: { deviceCount: options.number },
      device: {
        logIntervalMs: options.logInterval,
        sensorIntervalMs: options.sensorInterval,
        writeIntervalMs: options.writeInterval,
        bufferCapacity: options.bufferSize,
      },
      priority: { order: options.priority, escalateSeverities: options.escalate },
      transport: { host: options.host, port: options.port, endpoint: options.endpoint },
      logging: options.verbose ? { level: 'debug', pretty: true } : undefined,
    },
    options.config,
  );
}

async function executeSimulate(options: SimulateOptions): Promise<void> {
  const config = resolveSimulateConfig(options);
  setLogger(createLogger(NAME, config.logging));

  const transport = new HttpTransport(config.transport);
  const fleet = new FleetCoordinator({ settings: config, createTransport: () => transport });
  const timer = stopwatch();

  console.log();
  console.log(`📡 Simulating ${fleet.size} device(s) → ${transport.url}`);
  console.log(
    `   log every ${config.device.logIntervalMs}ms, sensor every ${config.device.sensorIntervalMs}ms, ` +
      `write every ${config.device.writeIntervalMs}ms, buffer ${config.device.bufferCapacity}`,
  );
  console.log(`   priority: ${formatPriority(config)}`);
  console.log();

  await fleet.start();
  await waitForShutdown(options.duration);

  console.log('\n⏹  Stopping fleet...');
  await fleet.stop();
  printSummary(fleet.getStats(), timer.formatted());
}

function formatPriority(config: FleetConfig): string {
  const escalated = config.priority.escalateSeverities.map((s) => `log[${s}]`);
  return [...escalated, ...config.priority.order].join(' > ');
}

/**
 * Resolve on SIGINT/SIGTERM, or after durationMs when given.
 */
function waitForShutdown(durationMs?: number): Promise<void> {
  return new Promise((resolve) => {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const finish = (): void => {
      if (timer) clearTimeout(timer);
      process.off('SIGINT', finish);
      process.off('SIGTERM', finish);
      resolve();
    };
    process.once('SIGINT', finish);
    process.once('SIGTERM', finish);
    if (durationMs !== undefined) {
      timer = setTimeout(finish, durationMs);
    }
  });
}

function printSummary(stats: FleetStats, elapsed: string): void {
  const { totals } = stats;
  console.log();
  console.log(`✅ Ran ${stats.devices.length} device(s) for ${elapsed}`);
  console.log(`   generated: ${totals.generated}`);
  console.log(`   flushes:   ${totals.flushes}`);
  console.log(`   sent:      ${totals.sent}`);
  console.log(`   failed:    ${totals.sendFailed}`);
  console.log(`   dropped:   ${totals.dropped}`);
  console.log();
}

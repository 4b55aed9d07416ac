/**
 * fleetsim — telemetry device fleet simulator
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, FleetCoordinator, HttpTransport } from 'fleetsim';
 *
 * const config = new ConfigManager().load({ fleet: { deviceCount: 10 } });
 * const transport = new HttpTransport(config.transport);
 * const fleet = new FleetCoordinator({ settings: config, createTransport: () => transport });
 * await fleet.start();
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager, CONFIG_FILE_NAME } from './core/config.js';
export { createLogger, getLogger, setLogger, type LoggerOptions } from './core/logger.js';
export {
  FleetError,
  ConfigError,
  GenerationError,
  TransportError,
  ReplayError,
} from './core/errors.js';
export {
  FleetConfigSchema,
  PriorityConfigSchema,
  type FleetConfig,
  type FleetConfigInput,
  type FleetEvents,
} from './core/types.js';

// Fleet
export * from './fleet/index.js';

// Transport
export * from './transport/index.js';

// Collector
export * from './collector/index.js';

// Utils
export { systemClock, sleep, type Clock, type Cancel } from './utils/clock.js';
export { IntervalTicker } from './utils/ticker.js';
export { formatDuration, stopwatch, type Stopwatch } from './utils/timer.js';

// CLI
export { createCLI, main } from './cli/index.js';

export { VERSION, NAME } from './version.js';

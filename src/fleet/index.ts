/**
 * Fleet simulation — devices that generate log and sensor messages,
 * buffer them between transmissions and resolve overflow by priority.
 *
 * @example
 * ```typescript
 * import { FleetCoordinator, HttpTransport } from 'fleetsim';
 *
 * const transport = new HttpTransport({ host: 'localhost', port: 8080 });
 * const fleet = new FleetCoordinator({
 *   settings: config,
 *   createTransport: () => transport,
 * });
 *
 * await fleet.start();
 * // ...
 * await fleet.stop();
 * ```
 */

export { PriorityBuffer } from './buffer.js';
export { SendLimiter } from './send-limiter.js';
export type { LimitedRun } from './send-limiter.js';
export { MessageGenerator } from './generator.js';
export type { GeneratorOptions, MessageSink, FaultHandler } from './generator.js';
export { DeviceWorker } from './worker.js';
export type { DeviceWorkerOptions, WorkerExit } from './worker.js';
export { FleetCoordinator } from './coordinator.js';
export type { FleetCoordinatorOptions, FleetSettings } from './coordinator.js';
export {
  createMessage,
  createLogMessage,
  createSensorMessage,
  toWire,
  fromWire,
  validateMessage,
  WireMessageSchema,
} from './message.js';
export type { WireMessage } from './message.js';
export { createRanker, parsePriorityOrder, DEFAULT_PRIORITY_POLICY } from './priority.js';
export { defaultPayloadSources, randomLogSource, randomSensorSource } from './payloads.js';
export type { PayloadSources, RandomSource } from './payloads.js';
export { MESSAGE_KINDS, SEVERITIES } from './types.js';
export type {
  Message,
  MessageKind,
  MessageOf,
  LogMessage,
  SensorDataMessage,
  Severity,
  SensorReading,
  DeviceIdentity,
  PriorityPolicy,
  FlushResult,
  DropReason,
  WorkerState,
  StopReason,
  DeviceSettings,
  WorkerStats,
  FleetStats,
} from './types.js';

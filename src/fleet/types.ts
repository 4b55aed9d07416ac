/**
 * Fleet Types
 *
 * Messages, priority policy and worker-level types shared by the
 * generator, buffer, worker and coordinator.
 */

// ═══════════════════════════════════════════════════════════════
// MESSAGES
// ═══════════════════════════════════════════════════════════════

export const MESSAGE_KINDS = ['log', 'sensorData'] as const;
export type MessageKind = (typeof MESSAGE_KINDS)[number];

export const SEVERITIES = ['debug', 'info', 'warning', 'error'] as const;
export type Severity = (typeof SEVERITIES)[number];

export interface SensorReading {
  readonly name: string;
  readonly value: number;
}

export interface LogPayload {
  readonly severity: Severity;
  readonly text: string;
}

export interface SensorPayload {
  readonly readings: readonly SensorReading[];
}

export interface PayloadByKind {
  log: LogPayload;
  sensorData: SensorPayload;
}

export interface DeviceIdentity {
  readonly deviceId: string;
  readonly firmwareVersion: string;
}

interface MessageOfKind<K extends MessageKind> extends DeviceIdentity {
  readonly kind: K;
  /** ISO-8601 UTC capture time */
  readonly timestamp: string;
  readonly payload: PayloadByKind[K];
}

export type LogMessage = MessageOfKind<'log'>;
export type SensorDataMessage = MessageOfKind<'sensorData'>;
export type Message = LogMessage | SensorDataMessage;
export type MessageOf<K extends MessageKind> = Extract<Message, { kind: K }>;

/** Produces one payload per call; may throw to signal a generation fault */
export type PayloadSource<K extends MessageKind> = () => PayloadByKind[K];

// ═══════════════════════════════════════════════════════════════
// PRIORITY
// ═══════════════════════════════════════════════════════════════

export interface PriorityPolicy {
  /** Every kind exactly once, highest priority first */
  order: readonly MessageKind[];
  /** Log severities that outrank every kind */
  escalateSeverities: readonly Severity[];
}

// ═══════════════════════════════════════════════════════════════
// BUFFER & WORKER
// ═══════════════════════════════════════════════════════════════

export interface FlushResult {
  retained: Message[];
  dropped: Message[];
}

/**
 * buffer_overflow: over capacity at flush. send_backlog: retained but still
 * waiting for a send slot at the next flush. shutdown: unsent when the device stopped.
 */
export type DropReason = 'buffer_overflow' | 'send_backlog' | 'shutdown';

export type WorkerState = 'idle' | 'running' | 'stopped';

export type StopReason = 'shutdown' | 'fault';

export interface DeviceSettings {
  logIntervalMs: number;
  sensorIntervalMs: number;
  writeIntervalMs: number;
  /** Maximum number of messages leaving the buffer per flush */
  bufferCapacity: number;
  /** In-flight sends allowed per device */
  maxConcurrentSends: number;
}

export interface WorkerStats {
  deviceId: string;
  state: WorkerState;
  generated: number;
  flushes: number;
  sent: number;
  sendFailed: number;
  dropped: number;
  pending: number;
}

export interface FleetStats {
  devices: WorkerStats[];
  totals: Omit<WorkerStats, 'deviceId' | 'state' | 'pending'> & { running: number; stopped: number };
}

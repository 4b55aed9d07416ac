/**
 * Message construction and the JSON wire format.
 *
 * Messages are frozen on construction. The wire shape uses snake_case keys
 * and carries the kind-specific body under `log_message` or `sensor_data`.
 */

import { z } from 'zod';
import { SEVERITIES } from './types.js';
import type {
  DeviceIdentity,
  LogMessage,
  LogPayload,
  Message,
  MessageKind,
  MessageOf,
  PayloadByKind,
  SensorDataMessage,
  SensorPayload,
} from './types.js';

// ═══════════════════════════════════════════════════════════════
// WIRE SCHEMA
// ═══════════════════════════════════════════════════════════════

const wireBase = {
  device_id: z.string().min(1),
  firmware_version: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
};

export const WireLogMessageSchema = z.object({
  ...wireBase,
  kind: z.literal('log'),
  log_message: z.object({
    severity: z.enum(SEVERITIES),
    message: z.string(),
  }),
});

export const WireSensorMessageSchema = z.object({
  ...wireBase,
  kind: z.literal('sensorData'),
  sensor_data: z.array(z.object({
    name: z.string().min(1),
    value: z.number().finite(),
  })).min(1),
});

export const WireMessageSchema = z.discriminatedUnion('kind', [
  WireLogMessageSchema,
  WireSensorMessageSchema,
]);

export type WireMessage = z.infer<typeof WireMessageSchema>;

// ═══════════════════════════════════════════════════════════════
// CONSTRUCTION
// ═══════════════════════════════════════════════════════════════

export function createLogMessage(identity: DeviceIdentity, timestamp: string, payload: LogPayload): LogMessage {
  const message: LogMessage = {
    deviceId: identity.deviceId,
    firmwareVersion: identity.firmwareVersion,
    kind: 'log',
    timestamp,
    payload: Object.freeze({ severity: payload.severity, text: payload.text }),
  };
  return Object.freeze(message);
}

export function createSensorMessage(
  identity: DeviceIdentity,
  timestamp: string,
  payload: SensorPayload,
): SensorDataMessage {
  const message: SensorDataMessage = {
    deviceId: identity.deviceId,
    firmwareVersion: identity.firmwareVersion,
    kind: 'sensorData',
    timestamp,
    payload: Object.freeze({
      readings: Object.freeze(payload.readings.map((r) => Object.freeze({ name: r.name, value: r.value }))),
    }),
  };
  return Object.freeze(message);
}

const builders: { [K in MessageKind]: (identity: DeviceIdentity, timestamp: string, payload: PayloadByKind[K]) => MessageOf<K> } = {
  log: createLogMessage,
  sensorData: createSensorMessage,
};

/**
 * Build a frozen message of the given kind.
 */
export function createMessage<K extends MessageKind>(
  kind: K,
  identity: DeviceIdentity,
  timestamp: string,
  payload: PayloadByKind[K],
): MessageOf<K> {
  return builders[kind](identity, timestamp, payload);
}

// ═══════════════════════════════════════════════════════════════
// WIRE CODEC
// ═══════════════════════════════════════════════════════════════

export function toWire(message: Message): WireMessage {
  const base = {
    device_id: message.deviceId,
    firmware_version: message.firmwareVersion,
    timestamp: message.timestamp,
  };

  switch (message.kind) {
    case 'log':
      return {
        ...base,
        kind: 'log',
        log_message: { severity: message.payload.severity, message: message.payload.text },
      };
    case 'sensorData':
      return {
        ...base,
        kind: 'sensorData',
        sensor_data: message.payload.readings.map((r) => ({ name: r.name, value: r.value })),
      };
  }
}

export function fromWire(wire: WireMessage): Message {
  const identity: DeviceIdentity = { deviceId: wire.device_id, firmwareVersion: wire.firmware_version };

  switch (wire.kind) {
    case 'log':
      return createLogMessage(identity, wire.timestamp, {
        severity: wire.log_message.severity,
        text: wire.log_message.message,
      });
    case 'sensorData':
      return createSensorMessage(identity, wire.timestamp, { readings: wire.sensor_data });
  }
}

/**
 * Check a message against the wire schema; returns the issues, or null when well-formed.
 */
export function validateMessage(message: Message): string[] | null {
  const result = WireMessageSchema.safeParse(toWire(message));
  if (result.success) return null;
  return result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

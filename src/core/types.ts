import { z } from 'zod';
import { MESSAGE_KINDS, SEVERITIES } from '../fleet/types.js';
import type { DropReason, MessageKind, StopReason } from '../fleet/types.js';

// ===== Configuration =====

const positiveInt = z.number().int().min(1);

export const PriorityConfigSchema = z.object({
  order: z.array(z.enum(MESSAGE_KINDS)).default(['log', 'sensorData'])
    .refine(
      (order) => order.length === MESSAGE_KINDS.length && new Set(order).size === order.length,
      { message: `priority.order must list each of ${MESSAGE_KINDS.join(', ')} exactly once` },
    ),
  escalateSeverities: z.array(z.enum(SEVERITIES)).default([]),
}).default({});

export const FleetConfigSchema = z.object({
  fleet: z.object({
    deviceCount: positiveInt.default(3),
    firmwareVersion: z.string().min(1).default('1.0-sim'),
    /** Delay between consecutive worker starts */
    spawnStaggerMs: z.number().int().min(0).default(20),
  }).default({}),
  device: z.object({
    logIntervalMs: positiveInt.default(500),
    sensorIntervalMs: positiveInt.default(500),
    writeIntervalMs: positiveInt.default(500),
    bufferCapacity: z.number().int().min(0).default(3),
    maxConcurrentSends: positiveInt.default(1),
  }).default({}),
  priority: PriorityConfigSchema,
  transport: z.object({
    host: z.string().min(1).default('localhost'),
    port: z.number().int().min(1).max(65535).default(8080),
    endpoint: z.string().startsWith('/').default('/'),
    timeoutMs: positiveInt.default(5000),
  }).default({}),
  replay: z.object({
    intervalSeconds: z.number().min(0).default(1),
  }).default({}),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    pretty: z.boolean().default(false),
    file: z.string().optional(),
  }).default({}),
});

export type FleetConfig = z.infer<typeof FleetConfigSchema>;
export type FleetConfigInput = z.input<typeof FleetConfigSchema>;

// ===== Events =====

export interface FleetEvents {
  'worker:started': { deviceId: string; timestamp: number };
  'worker:stopped': { deviceId: string; reason: StopReason; error?: Error; timestamp: number };
  'flush:completed': { deviceId: string; retained: number; dropped: number; timestamp: number };
  'message:sent': { deviceId: string; kind: MessageKind };
  'message:dropped': { deviceId: string; kind: MessageKind; reason: DropReason };
  'message:sendFailed': { deviceId: string; kind: MessageKind; cause: string };
}

import type { LogPayload, MessageKind, PayloadSource, SensorPayload, Severity } from './types.js';

/** Uniform random number in [0, 1) */
export type RandomSource = () => number;

const LOG_TEXTS = [
  'This is a simulated message.',
  'Heartbeat acknowledged by gateway.',
  'Configuration reloaded.',
  'Watchdog timer reset.',
  'Sensor bus re-initialized.',
];

export const SENSOR_NAME = 'Temp1';
export const SENSOR_MIN = 1;
export const SENSOR_MAX = 100;

/**
 * Log payloads: `error` half the time, `info` otherwise.
 */
export function randomLogSource(random: RandomSource = Math.random): PayloadSource<'log'> {
  return (): LogPayload => {
    const severity: Severity = random() < 0.5 ? 'error' : 'info';
    const text = LOG_TEXTS[Math.floor(random() * LOG_TEXTS.length)] ?? LOG_TEXTS[0];
    return { severity, text };
  };
}

/**
 * Sensor payloads: one `Temp1` reading in [1, 100), two decimals.
 */
export function randomSensorSource(random: RandomSource = Math.random): PayloadSource<'sensorData'> {
  return (): SensorPayload => {
    const raw = SENSOR_MIN + random() * (SENSOR_MAX - SENSOR_MIN);
    const value = Math.min(Math.round(raw * 100) / 100, SENSOR_MAX - 0.01);
    return { readings: [{ name: SENSOR_NAME, value }] };
  };
}

export type PayloadSources = { [K in MessageKind]: PayloadSource<K> };

export function defaultPayloadSources(random: RandomSource = Math.random): PayloadSources {
  return {
    log: randomLogSource(random),
    sensorData: randomSensorSource(random),
  };
}

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_PRIORITY_POLICY,
  ESCALATED_RANK,
  createRanker,
  parsePriorityOrder,
} from '../../../src/fleet/priority.js';
import { logAt, sensorAt } from '../../helpers/messages.js';

describe('createRanker', () => {
  it('should rank log above sensor data by default', () => {
    const rank = createRanker(DEFAULT_PRIORITY_POLICY);
    expect(rank(logAt(1))).toBe(0);
    expect(rank(sensorAt(1))).toBe(1);
  });

  it('should follow a custom order', () => {
    const rank = createRanker({ order: ['sensorData', 'log'], escalateSeverities: [] });
    expect(rank(sensorAt(1))).toBe(0);
    expect(rank(logAt(1))).toBe(1);
  });

  it('should escalate only the listed severities', () => {
    const rank = createRanker({ order: ['sensorData', 'log'], escalateSeverities: ['error'] });
    expect(rank(logAt(1, 'error'))).toBe(ESCALATED_RANK);
    expect(rank(logAt(1, 'warning'))).toBe(1);
  });

  it('should reject a kind listed twice', () => {
    expect(() => createRanker({ order: ['log', 'log'], escalateSeverities: [] })).toThrow(
      'Priority order lists "log" more than once',
    );
  });

  it('should reject an order missing a kind', () => {
    expect(() => createRanker({ order: ['log'], escalateSeverities: [] })).toThrow(
      'Priority order is missing "sensorData"',
    );
  });
});

describe('parsePriorityOrder', () => {
  it('should parse a comma-separated list case-insensitively', () => {
    expect(parsePriorityOrder('SensorData, log')).toEqual(['sensorData', 'log']);
  });

  it('should ignore empty entries', () => {
    expect(parsePriorityOrder('log,,sensordata,')).toEqual(['log', 'sensorData']);
  });

  it('should reject an unknown kind', () => {
    expect(() => parsePriorityOrder('log,metrics')).toThrow(
      'Unknown message kind "metrics" (expected one of: log, sensorData)',
    );
  });
});

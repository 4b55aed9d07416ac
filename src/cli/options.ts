import { InvalidArgumentError } from 'commander';
import { parsePriorityOrder } from '../fleet/priority.js';
import { SEVERITIES, type MessageKind, type Severity } from '../fleet/types.js';

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('The value must be an integer.');
  }
  const parsed = Number(value);
  if (parsed <= 0) {
    throw new InvalidArgumentError('The value must be greater than 0.');
  }
  return parsed;
}

export function parseNonNegativeNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('The value must be a number >= 0.');
  }
  return parsed;
}

export function parseKindList(value: string): MessageKind[] {
  try {
    return parsePriorityOrder(value);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

export function parseSeverityList(value: string): Severity[] {
  const severities: Severity[] = [];
  for (const part of value.split(',').map((s) => s.trim().toLowerCase()).filter(Boolean)) {
    const severity = SEVERITIES.find((s) => s === part);
    if (!severity) {
      throw new InvalidArgumentError(`Unknown severity "${part}" (expected one of: ${SEVERITIES.join(', ')})`);
    }
    severities.push(severity);
  }
  return severities;
}

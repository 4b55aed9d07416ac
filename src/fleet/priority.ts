import type { Message, MessageKind, PriorityPolicy, Severity } from './types.js';
import { MESSAGE_KINDS } from './types.js';

export const DEFAULT_PRIORITY_POLICY: PriorityPolicy = {
  order: ['log', 'sensorData'],
  escalateSeverities: [],
};

/** Rank reserved for escalated log messages; beats every kind's index */
export const ESCALATED_RANK = -1;

/**
 * Validate a policy and return a ranking function over messages.
 * Lower rank means higher priority.
 */
export function createRanker(policy: PriorityPolicy): (message: Message) => number {
  const ranks = new Map<MessageKind, number>();
  policy.order.forEach((kind, index) => {
    if (ranks.has(kind)) {
      throw new RangeError(`Priority order lists "${kind}" more than once`);
    }
    ranks.set(kind, index);
  });
  for (const kind of MESSAGE_KINDS) {
    if (!ranks.has(kind)) {
      throw new RangeError(`Priority order is missing "${kind}"`);
    }
  }
  const escalated = new Set<Severity>(policy.escalateSeverities);

  return (message) => {
    if (message.kind === 'log' && escalated.has(message.payload.severity)) {
      return ESCALATED_RANK;
    }
    return ranks.get(message.kind) ?? MESSAGE_KINDS.length;
  };
}

/**
 * Parse a comma-separated kind list such as "log,sensorData".
 */
export function parsePriorityOrder(value: string): MessageKind[] {
  const kinds: MessageKind[] = [];
  for (const part of value.split(',').map((s) => s.trim()).filter(Boolean)) {
    const kind = MESSAGE_KINDS.find((k) => k.toLowerCase() === part.toLowerCase());
    if (!kind) {
      throw new RangeError(`Unknown message kind "${part}" (expected one of: ${MESSAGE_KINDS.join(', ')})`);
    }
    kinds.push(kind);
  }
  return kinds;
}

import { systemClock, type Clock } from './clock.js';

/**
 * Human-readable duration: "850ms", "12.4s", "3m 05s", "1h 02m".
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;

  const totalSeconds = Math.round(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const pad = (n: number): string => String(n).padStart(2, '0');

  return hours > 0 ? `${hours}h ${pad(minutes)}m` : `${minutes}m ${pad(seconds)}s`;
}

export interface Stopwatch {
  elapsed(): number;
  formatted(): string;
}

export function stopwatch(clock: Clock = systemClock): Stopwatch {
  const start = clock.now();
  return {
    elapsed: () => clock.now() - start,
    formatted: () => formatDuration(clock.now() - start),
  };
}

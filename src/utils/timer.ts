/**
 * Format a duration in milliseconds to a human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

export interface Stopwatch {
  elapsed: () => number;
  formatted: () => string;
}

/**
 * Create a simple stopwatch. `now` is injectable for tests.
 */
export function stopwatch(now: () => number = () => performance.now()): Stopwatch {
  const start = now();
  return {
    elapsed: () => now() - start,
    formatted: () => formatDuration(now() - start),
  };
}

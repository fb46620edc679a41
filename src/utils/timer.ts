/**
 * Timing Utilities
 * Wall-clock measurement for processing paths and pipeline rounds
 */

const NANOS_PER_MILLI = 1_000_000;

/**
 * Format milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Convert nanoseconds to fractional milliseconds
 */
export function nanosToMillis(nanos: number): number {
  return nanos / NANOS_PER_MILLI;
}

/**
 * Start a monotonic timer. The returned function reports nanoseconds elapsed since the call.
 */
export function startNanoTimer(): () => number {
  const start = process.hrtime.bigint();
  return () => Number(process.hrtime.bigint() - start);
}

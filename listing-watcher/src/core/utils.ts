/**
 * Utility functions for the listing watcher
 */

export type DelayRange = [number, number]; // [minMs, maxMs]

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60000).toFixed(1)}m`;
}

/**
 * Uniform pick from [min, max]; random is injectable for tests
 */
export function jitter(range: DelayRange, random: () => number = Math.random): number {
  const [min, max] = range;
  return Math.round(min + (max - min) * random());
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

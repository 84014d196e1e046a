/**
 * Waits used between tickers and inside retry backoff.
 */

export type SleepFn = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Uniform integer in [minMs, maxMs]. `random` must return values in [0, 1).
 */
export function randomDelayMs(
  minMs: number,
  maxMs: number,
  random: () => number = Math.random
): number {
  if (maxMs <= minMs) return minMs;
  return minMs + Math.floor(random() * (maxMs - minMs + 1));
}

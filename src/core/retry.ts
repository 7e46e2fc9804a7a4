export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random
): number {
  const delay = Math.min(options.baseDelayMs * Math.pow(2, attempt - 1), options.maxDelayMs);
  return delay + random() * options.jitterMs;
}

export function randomBetween(min: number, max: number, random: () => number = Math.random): number {
  if (max <= min) return min;
  return min + random() * (max - min);
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

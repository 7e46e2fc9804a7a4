import { randomBetween, sleep, type Sleep } from "./retry";

export interface DelayRange {
  min: number;
  max: number;
}

/** Waits a random duration inside the range, so request spacing never looks periodic. */
export async function jitteredDelay(range: DelayRange, wait: Sleep = sleep): Promise<number> {
  const delay = randomBetween(range.min, range.max);
  await wait(delay);
  return delay;
}

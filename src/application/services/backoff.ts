/**
 * Exponential backoff with seeded jitter.
 *
 * delay(n) = min(base * multiplier^(n-1) + jitter, maxDelay), where jitter is
 * a seeded fraction (up to `jitterRatio`) of the un-jittered delay. Delays
 * never decrease within one schedule. The same seed yields the same sequence.
 */
export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  jitterRatio: number;
  /** Fixed seed for jitter; omitted means a time-based seed per schedule. */
  seed?: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

const LCG_MODULUS = 233280;

/** Linear congruential generator in [0, 1). */
export function createSeededRandom(seed: number): () => number {
  let state = Math.abs(Math.floor(seed)) % LCG_MODULUS;
  return () => {
    state = (state * 9301 + 49297) % LCG_MODULUS;
    return state / LCG_MODULUS;
  };
}

/** Returns a function yielding the delay before retry 1, 2, 3, ... */
export function createBackoffSchedule(policy: RetryPolicy): () => number {
  const random = createSeededRandom(policy.seed ?? Date.now());
  let retry = 0;
  let previous = 0;

  return () => {
    retry += 1;
    const exponential = Math.min(
      policy.baseDelayMs * Math.pow(policy.multiplier, retry - 1),
      policy.maxDelayMs,
    );
    const jitter = exponential * policy.jitterRatio * random();
    const delay = Math.max(previous, Math.min(Math.round(exponential + jitter), policy.maxDelayMs));
    previous = delay;
    return delay;
  };
}

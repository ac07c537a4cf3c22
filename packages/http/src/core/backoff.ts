import type { BackoffPolicy } from './types.js';

export const BASE_BACKOFF_MS = 300;
export const DETERMINISTIC_JITTER_MAX_MS = 5;
export const DETERMINISTIC_SEED = 0xc0ffee;
/** setTimeout fires at once for anything longer (signed 32-bit milliseconds) */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Apply the optional ceilings, max-retry-after first, then backoff limit, then the timer limit.
 */
const applyCeilings = (ms: number, policy: BackoffPolicy): number => {
  let capped = Math.min(ms, MAX_TIMER_DELAY_MS);
  if (policy.maxRetryAfter !== undefined) {
    capped = Math.min(capped, policy.maxRetryAfter);
  }
  if (policy.backoffLimit !== undefined) {
    capped = Math.min(capped, policy.backoffLimit);
  }
  return capped;
};

/**
 * Exponential delay for a 1-based attempt number, without jitter.
 */
export const calculateExponentialBackoff = (attempt: number, policy: BackoffPolicy): number => {
  const delay = BASE_BACKOFF_MS * Math.pow(2, Math.max(attempt, 1) - 1);
  return policy.backoffLimit !== undefined ? Math.min(delay, policy.backoffLimit) : delay;
};

/**
 * Upper bound (inclusive, whole milliseconds) of the jitter added to a base delay.
 */
export const jitterCeiling = (baseMs: number, policy: BackoffPolicy): number => {
  if (policy.jitterDisabled) {
    return 0;
  }
  const ceiling = Math.max(1, Math.floor(baseMs / 10));
  return policy.deterministicMode ? Math.min(DETERMINISTIC_JITTER_MAX_MS, ceiling) : ceiling;
};

/**
 * Backoff for a 1-based attempt: base + jitter, then capped by maxRetryAfter and backoffLimit.
 *
 * `random` must return values in [0, 1); the executor passes a seeded generator in
 * deterministic mode.
 */
export const computeBackoff = (attempt: number, policy: BackoffPolicy, random: () => number): number => {
  const base = calculateExponentialBackoff(attempt, policy);
  const ceiling = jitterCeiling(base, policy);
  const jitter = ceiling > 0 ? Math.floor(random() * (ceiling + 1)) : 0;
  return applyCeilings(base + jitter, policy);
};

/**
 * Ceilings for a server-supplied Retry-After wait.
 */
export const capServerWait = (retryAfterMs: number, policy: BackoffPolicy): number => applyCeilings(retryAfterMs, policy);

/**
 * Small seeded generator (mulberry32) so deterministic-mode jitter repeats across runs.
 */
export const createSeededRandom = (seed: number = DETERMINISTIC_SEED): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

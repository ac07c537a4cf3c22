// Pure types for functional core
// No classes, only data structures

import type { HttpMethod, RetryPredicate } from '../types.js';

/**
 * Subset of ClientConfig the wait computations read.
 */
export interface BackoffPolicy {
  backoffLimit?: number | undefined;
  deterministicMode: boolean;
  jitterDisabled: boolean;
  maxRetryAfter?: number | undefined;
}

/**
 * Subset of ClientConfig the classifier reads.
 */
export interface ClassificationPolicy extends BackoffPolicy {
  retryableStatuses: ReadonlySet<number>;
  retryAfterStatuses: ReadonlySet<number>;
  retryMethods: ReadonlySet<HttpMethod>;
  retryOnTimeout: boolean;
  retryPredicate?: RetryPredicate | undefined;
}

export interface ClassificationContext {
  attempt: number;
  /** Server-directed final attempt still available for this logical request */
  extensionAvailable: boolean;
  maxAttempts: number;
  method: HttpMethod;
  now: number;
  random: () => number;
}

/**
 * What to do after a completed (non-2xx) attempt
 */
export type ResponseDecision =
  | { kind: 'retry_after'; delayMs: number; extendsBudget: boolean }
  | { kind: 'backoff'; delayMs: number }
  | { kind: 'fail' };

/**
 * What to do after a network-level failure
 */
export type FailureDecision =
  | { kind: 'backoff'; delayMs: number }
  | { kind: 'fatal' }
  | { kind: 'exhausted' };

/**
 * Side effects interface for dependency injection
 */
export interface HttpEffects {
  delay: (ms: number) => Promise<void>;
  fetch: typeof fetch;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
  random: () => number;
}

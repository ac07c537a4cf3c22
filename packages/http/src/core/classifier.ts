// Attempt classification
// Decides how the retry loop proceeds after each attempt; never sleeps or performs I/O

import type { AttemptResult } from '../types.js';

import { capServerWait, computeBackoff } from './backoff.js';
import { parseRetryAfter } from './retry-after.js';
import type {
  ClassificationContext,
  ClassificationPolicy,
  FailureDecision,
  ResponseDecision,
} from './types.js';

export const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

/**
 * Classify a completed non-2xx attempt.
 *
 * A Retry-After directive on a retry-after status wins over computed backoff and is honored
 * even on the last configured attempt: the decision then extends the budget by exactly one
 * final attempt, once per logical request.
 */
export const classifyResponse = (
  result: AttemptResult,
  policy: ClassificationPolicy,
  context: ClassificationContext
): ResponseDecision => {
  const attemptsRemain = context.attempt < context.maxAttempts;

  if (policy.retryAfterStatuses.has(result.status)) {
    const retryAfterMs = parseRetryAfter(result.headers, context.now);
    if (retryAfterMs !== undefined && (attemptsRemain || context.extensionAvailable)) {
      return {
        delayMs: capServerWait(retryAfterMs, policy),
        extendsBudget: !attemptsRemain,
        kind: 'retry_after',
      };
    }
  }

  if (attemptsRemain && policy.retryableStatuses.has(result.status) && policy.retryMethods.has(context.method)) {
    return { delayMs: computeBackoff(context.attempt, policy, context.random), kind: 'backoff' };
  }

  return { kind: 'fail' };
};

/**
 * Classify a network-level failure (connection refused, DNS, timeout, broken body read).
 *
 * A timeout with retryOnTimeout disabled is fatal without consulting the predicate.
 * Without a predicate every other failure is retried while attempts remain.
 */
export const classifyFailure = (
  failure: { error: Error; timedOut: boolean },
  policy: ClassificationPolicy,
  context: ClassificationContext
): FailureDecision => {
  if (failure.timedOut && !policy.retryOnTimeout) {
    return { kind: 'fatal' };
  }

  const shouldRetry = policy.retryPredicate
    ? policy.retryPredicate.shouldRetry({ attempt: context.attempt, error: failure.error })
    : true;

  if (shouldRetry && context.attempt < context.maxAttempts) {
    return { delayMs: computeBackoff(context.attempt, policy, context.random), kind: 'backoff' };
  }

  return { kind: 'exhausted' };
};

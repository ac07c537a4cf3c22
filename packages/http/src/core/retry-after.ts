// Retry-After parsing
// All functions are pure - the current time is passed in

import type { HttpHeaders } from '../types.js';

export const MIN_RETRY_AFTER_MS = 1000;

const DAY = '(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun)';
const MONTH = '(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)';

const DELAY_SECONDS = /^\d+$/;
const IMF_FIXDATE = new RegExp(`^${DAY}, \\d{2} ${MONTH} \\d{4} \\d{2}:\\d{2}:\\d{2} GMT$`);
const RFC_2822 = new RegExp(
  `^(?:${DAY},\\s*)?\\d{1,2}\\s+${MONTH}\\s+\\d{2,4}\\s+\\d{2}:\\d{2}(?::\\d{2})?\\s+(?:[+-]\\d{4}|UT|GMT|[ECMP][SD]T)$`
);
const RFC_3339 = /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:[Zz]|[+-]\d{2}:\d{2})$/;

/**
 * Case-insensitive header lookup
 */
export const getHeader = (headers: HttpHeaders, name: string): string | undefined => {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) {
      return value;
    }
  }
  return undefined;
};

/**
 * Wait until an absolute instant. An instant already past still yields the minimal wait:
 * the server asked for a delay, clock skew should not turn that into an immediate retry.
 */
const untilInstant = (instantMs: number, currentTime: number): number => {
  const diffSeconds = Math.floor((instantMs - currentTime) / 1000);
  return Math.max(1, diffSeconds) * 1000;
};

const parseDate = (value: string): number | undefined => {
  if (IMF_FIXDATE.test(value) || RFC_2822.test(value)) {
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? undefined : ms;
  }
  if (RFC_3339.test(value)) {
    const normalized = value.replace(/^(\d{4}-\d{2}-\d{2})[Tt ]/, '$1T').replace(/z$/, 'Z');
    const ms = Date.parse(normalized);
    return Number.isNaN(ms) ? undefined : ms;
  }
  return undefined;
};

/**
 * Parse a Retry-After value into milliseconds.
 *
 * Accepts, in order: delay-seconds (0 becomes 1s), IMF-fixdate, RFC 2822, RFC 3339.
 */
export const parseRetryAfterValue = (value: string, currentTime: number): number | undefined => {
  const trimmed = value.trim();
  if (!trimmed) {
    return undefined;
  }

  if (DELAY_SECONDS.test(trimmed)) {
    const seconds = Number(trimmed);
    if (!Number.isSafeInteger(seconds)) {
      return undefined;
    }
    return seconds === 0 ? MIN_RETRY_AFTER_MS : seconds * 1000;
  }

  const instant = parseDate(trimmed);
  return instant === undefined ? undefined : untilInstant(instant, currentTime);
};

/**
 * Retry-After from response headers, or undefined when absent or unparseable
 */
export const parseRetryAfter = (headers: HttpHeaders, currentTime: number): number | undefined => {
  const value = getHeader(headers, 'retry-after');
  return value === undefined ? undefined : parseRetryAfterValue(value, currentTime);
};

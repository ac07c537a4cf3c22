import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import type { ConcurrencyGate } from './concurrency-gate.js';
import { mergeHeaders } from './core/http-utils.js';
import type { ClassificationPolicy } from './core/types.js';
import {
  ConfigError,
  HTTP_METHODS,
  type HttpClientHooks,
  type HttpHeaders,
  type HttpMethod,
  type RetryPredicate,
} from './types.js';

export const CLIENT_VERSION = '0.1.0';

export const DEFAULT_RETRYABLE_STATUSES = [408, 413, 429, 500, 502, 503, 504] as const;
export const DEFAULT_RETRY_AFTER_STATUSES = [413, 429, 503] as const;

/**
 * Resolved, frozen configuration of one client instance. Durations are milliseconds.
 */
export interface ClientConfig extends ClassificationPolicy {
  readonly allowedMethods: ReadonlySet<HttpMethod>;
  readonly concurrencyLimit: number;
  readonly defaultHeaders: Readonly<HttpHeaders>;
  readonly hooks?: HttpClientHooks | undefined;
  /** Logger category suffix */
  readonly name: string;
  readonly permitReacquireTimeout: number;
  /** Waits at or above this release the permit before sleeping */
  readonly permitReleaseThreshold: number;
  readonly retryCount: number;
  /** Used for admission instead of a pool sized by concurrencyLimit */
  readonly sharedGate?: ConcurrencyGate | undefined;
  /** Bound on one attempt, send through full body read. Undefined means unbounded. */
  readonly timeout: number | undefined;
}

/**
 * Partial configuration applied on top of a base config. `null` clears an optional bound.
 */
export interface ClientConfigOverrides {
  allowedMethods?: Iterable<HttpMethod> | undefined;
  backoffLimit?: number | null | undefined;
  concurrencyLimit?: number | undefined;
  defaultHeaders?: HttpHeaders | undefined;
  deterministicMode?: boolean | undefined;
  hooks?: HttpClientHooks | undefined;
  jitterDisabled?: boolean | undefined;
  maxRetryAfter?: number | null | undefined;
  name?: string | undefined;
  permitReacquireTimeout?: number | undefined;
  permitReleaseThreshold?: number | undefined;
  retryableStatuses?: Iterable<number> | undefined;
  retryAfterStatuses?: Iterable<number> | undefined;
  retryCount?: number | undefined;
  retryMethods?: Iterable<HttpMethod> | undefined;
  retryOnTimeout?: boolean | undefined;
  retryPredicate?: RetryPredicate | null | undefined;
  sharedGate?: ConcurrencyGate | undefined;
  timeout?: number | null | undefined;
}

/**
 * Fresh default configuration. Nothing here is shared between calls.
 */
export function createDefaultClientConfig(): ClientConfig {
  return {
    allowedMethods: new Set<HttpMethod>(HTTP_METHODS),
    backoffLimit: undefined,
    concurrencyLimit: 2,
    defaultHeaders: {
      Accept: 'application/json',
      'User-Agent': `retryline/${CLIENT_VERSION}`,
    },
    deterministicMode: false,
    hooks: undefined,
    jitterDisabled: false,
    maxRetryAfter: undefined,
    name: 'http',
    permitReacquireTimeout: 200,
    permitReleaseThreshold: 2000,
    retryableStatuses: new Set<number>(DEFAULT_RETRYABLE_STATUSES),
    retryAfterStatuses: new Set<number>(DEFAULT_RETRY_AFTER_STATUSES),
    retryCount: 2,
    retryMethods: new Set<HttpMethod>(HTTP_METHODS),
    retryOnTimeout: false,
    retryPredicate: undefined,
    sharedGate: undefined,
    timeout: 15000,
  };
}

const durationMs = z.number().int().nonnegative();
const statusCode = z.number().int().min(100).max(599);

const scalarOverridesSchema = z.object({
  allowedMethods: z.array(z.enum(HTTP_METHODS)).optional(),
  backoffLimit: durationMs.nullable().optional(),
  concurrencyLimit: z.number().int().min(1).optional(),
  maxRetryAfter: durationMs.nullable().optional(),
  name: z.string().trim().min(1).optional(),
  permitReacquireTimeout: durationMs.optional(),
  permitReleaseThreshold: durationMs.optional(),
  retryableStatuses: z.array(statusCode).optional(),
  retryAfterStatuses: z.array(statusCode).optional(),
  retryCount: z.number().int().nonnegative().optional(),
  retryMethods: z.array(z.enum(HTTP_METHODS)).optional(),
  timeout: z.number().int().positive().nullable().optional(),
});

const toArray = <T>(values: Iterable<T> | undefined): T[] | undefined => (values ? [...values] : undefined);

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

const pick = <T>(override: T | null | undefined, fallback: T | undefined): T | undefined => {
  if (override === null) return undefined;
  return override === undefined ? fallback : override;
};

/**
 * Validate overrides against a base config and freeze the result.
 */
export function resolveClientConfig(
  overrides: ClientConfigOverrides = {},
  base: ClientConfig = createDefaultClientConfig()
): Result<ClientConfig, ConfigError> {
  const parsed = scalarOverridesSchema.safeParse({
    allowedMethods: toArray(overrides.allowedMethods),
    backoffLimit: overrides.backoffLimit,
    concurrencyLimit: overrides.concurrencyLimit,
    maxRetryAfter: overrides.maxRetryAfter,
    name: overrides.name,
    permitReacquireTimeout: overrides.permitReacquireTimeout,
    permitReleaseThreshold: overrides.permitReleaseThreshold,
    retryableStatuses: toArray(overrides.retryableStatuses),
    retryAfterStatuses: toArray(overrides.retryAfterStatuses),
    retryCount: overrides.retryCount,
    retryMethods: toArray(overrides.retryMethods),
    timeout: overrides.timeout,
  });

  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    return err(new ConfigError(`Invalid client configuration: ${issues.join('; ')}`, issues));
  }

  const values = parsed.data;
  const config: ClientConfig = {
    allowedMethods: values.allowedMethods ? new Set(values.allowedMethods) : base.allowedMethods,
    backoffLimit: pick(values.backoffLimit, base.backoffLimit),
    concurrencyLimit: values.concurrencyLimit ?? base.concurrencyLimit,
    defaultHeaders: Object.freeze(mergeHeaders(base.defaultHeaders, overrides.defaultHeaders)),
    deterministicMode: overrides.deterministicMode ?? base.deterministicMode,
    hooks: overrides.hooks ?? base.hooks,
    jitterDisabled: overrides.jitterDisabled ?? base.jitterDisabled,
    maxRetryAfter: pick(values.maxRetryAfter, base.maxRetryAfter),
    name: values.name ?? base.name,
    permitReacquireTimeout: values.permitReacquireTimeout ?? base.permitReacquireTimeout,
    permitReleaseThreshold: values.permitReleaseThreshold ?? base.permitReleaseThreshold,
    retryableStatuses: values.retryableStatuses ? new Set(values.retryableStatuses) : base.retryableStatuses,
    retryAfterStatuses: values.retryAfterStatuses ? new Set(values.retryAfterStatuses) : base.retryAfterStatuses,
    retryCount: values.retryCount ?? base.retryCount,
    retryMethods: values.retryMethods ? new Set(values.retryMethods) : base.retryMethods,
    retryOnTimeout: overrides.retryOnTimeout ?? base.retryOnTimeout,
    retryPredicate: pick(overrides.retryPredicate, base.retryPredicate),
    sharedGate: overrides.sharedGate ?? base.sharedGate,
    timeout: pick(values.timeout, base.timeout),
  };

  return ok(Object.freeze(config));
}

export const DEFAULT_ENV_PREFIX = 'RETRYLINE_';

const integerFromEnv = z
  .string()
  .trim()
  .regex(/^\d+$/, { message: 'Expected a non-negative integer' })
  .transform((val: string) => parseInt(val, 10));

const booleanFromEnv = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false']))
  .transform((val) => val === 'true');

const listFromEnv = z.string().transform((val: string) =>
  val
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
);

const statusListFromEnv = listFromEnv.pipe(z.array(z.coerce.number().pipe(statusCode)));

const methodListFromEnv = listFromEnv
  .transform((items) => items.map((item) => item.toUpperCase()))
  .pipe(z.array(z.enum(HTTP_METHODS)));

// Keys are matched after the prefix is stripped
export const clientEnvSchema = z.object({
  ALLOWED_METHODS: methodListFromEnv.optional(),
  BACKOFF_LIMIT_MS: integerFromEnv.optional(),
  CONCURRENCY_LIMIT: integerFromEnv.optional(),
  MAX_RETRY_AFTER_MS: integerFromEnv.optional(),
  PERMIT_RELEASE_THRESHOLD_MS: integerFromEnv.optional(),
  RETRY_AFTER_STATUSES: statusListFromEnv.optional(),
  RETRY_COUNT: integerFromEnv.optional(),
  RETRY_ON_TIMEOUT: booleanFromEnv.optional(),
  RETRYABLE_STATUSES: statusListFromEnv.optional(),
  TIMEOUT_MS: integerFromEnv.optional(),
});

export type ClientEnvConfig = z.infer<typeof clientEnvSchema>;

/**
 * Read client overrides from environment variables such as RETRYLINE_TIMEOUT_MS.
 * Variables that are unset or empty are left to the defaults.
 */
export function loadClientConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  prefix: string = DEFAULT_ENV_PREFIX
): Result<ClientConfigOverrides, ConfigError> {
  const scoped: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(prefix) && value !== undefined && value.trim() !== '') {
      scoped[key.slice(prefix.length)] = value;
    }
  }

  const parsed = clientEnvSchema.safeParse(scoped);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${prefix}${issue.path.join('.')}: ${issue.message}`);
    return err(new ConfigError(`Invalid client environment: ${issues.join('; ')}`, issues));
  }

  const values = parsed.data;
  const overrides: ClientConfigOverrides = {};
  if (values.ALLOWED_METHODS) overrides.allowedMethods = values.ALLOWED_METHODS;
  if (values.BACKOFF_LIMIT_MS !== undefined) overrides.backoffLimit = values.BACKOFF_LIMIT_MS;
  if (values.CONCURRENCY_LIMIT !== undefined) overrides.concurrencyLimit = values.CONCURRENCY_LIMIT;
  if (values.MAX_RETRY_AFTER_MS !== undefined) overrides.maxRetryAfter = values.MAX_RETRY_AFTER_MS;
  if (values.PERMIT_RELEASE_THRESHOLD_MS !== undefined) {
    overrides.permitReleaseThreshold = values.PERMIT_RELEASE_THRESHOLD_MS;
  }
  if (values.RETRY_AFTER_STATUSES) overrides.retryAfterStatuses = values.RETRY_AFTER_STATUSES;
  if (values.RETRY_COUNT !== undefined) overrides.retryCount = values.RETRY_COUNT;
  if (values.RETRY_ON_TIMEOUT !== undefined) overrides.retryOnTimeout = values.RETRY_ON_TIMEOUT;
  if (values.RETRYABLE_STATUSES) overrides.retryableStatuses = values.RETRYABLE_STATUSES;
  if (values.TIMEOUT_MS !== undefined) overrides.timeout = values.TIMEOUT_MS;

  return ok(overrides);
}

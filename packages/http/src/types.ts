import type { ZodType } from 'zod';

export const HTTP_METHODS = ['GET', 'HEAD', 'OPTIONS', 'POST', 'PUT', 'PATCH', 'DELETE', 'TRACE'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type HttpHeaders = Record<string, string>;

/**
 * One completed network round-trip. The body is read exactly once, whatever the status.
 */
export interface AttemptResult {
  body: string;
  headers: HttpHeaders;
  status: number;
  success: boolean;
}

/**
 * Outcome of a logical request that reached the server.
 *
 * `success: false` is not an error: the call completed but the server never answered 2xx
 * within the retry policy. Callers must check both the outer Result and this flag.
 */
export interface ApiResponse<T> {
  data?: T | undefined;
  errorBody?: string | undefined;
  headers: HttpHeaders;
  status: number;
  success: boolean;
}

export interface RequestOptions<T = unknown> {
  body?: unknown;
  headers?: HttpHeaders | undefined;
  /**
   * Validates the decoded 2xx body. Without a schema the parsed JSON is returned as-is.
   */
  schema?: ZodType<T> | undefined;
}

export interface RetryPredicateContext {
  attempt: number;
  error: Error;
  /** Always undefined for network-level failures; present for symmetry with status retries. */
  response?: AttemptResult | undefined;
}

/**
 * Strategy consulted after a network-level failure. Returning false stops the retry loop.
 */
export interface RetryPredicate {
  shouldRetry(context: RetryPredicateContext): boolean;
}

export interface HttpClientHooks {
  /**
   * Called once when a logical request is admitted, before the first attempt.
   * Paired with exactly one terminal event (onRequestSuccess or onRequestFailure).
   */
  onRequestStart?: (event: { method: HttpMethod; timestamp: number; url: string }) => void;

  /**
   * Called once when the server answered 2xx and the body decoded.
   * durationMs spans every attempt and sleep of the logical request.
   */
  onRequestSuccess?: (event: { attempts: number; durationMs: number; method: HttpMethod; status: number }) => void;

  /**
   * Called once when the logical request ends any other way, including a non-2xx
   * ApiResponse returned with success: false.
   */
  onRequestFailure?: (event: {
    attempts: number;
    durationMs: number;
    error: string;
    method: HttpMethod;
    status?: number | undefined;
  }) => void;

  /**
   * Called before every sleep between attempts.
   */
  onBackoff?: (event: { attemptNumber: number; delayMs: number; reason: 'backoff' | 'retry_after' }) => void;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * - `encode`: the request body could not be serialized; nothing was sent
 * - `status`: a non-2xx answer, recorded as the cause of an exhausted request
 */
export type HttpErrorReason = 'network' | 'timeout' | 'encode' | 'decode' | 'status' | 'exhausted';

export class HttpError extends Error {
  constructor(
    message: string,
    public reason: HttpErrorReason,
    public details: {
      attempts?: number | undefined;
      cause?: unknown;
      responseBody?: string | undefined;
      statusCode?: number | undefined;
    } = {}
  ) {
    super(message);
    this.name = 'HttpError';
  }

  get statusCode(): number | undefined {
    return this.details.statusCode;
  }

  get attempts(): number | undefined {
    return this.details.attempts;
  }
}

export type InternalErrorReason = 'method_not_allowed' | 'gate_closed';

export class InternalError extends Error {
  constructor(
    message: string,
    public reason: InternalErrorReason
  ) {
    super(message);
    this.name = 'InternalError';
  }
}

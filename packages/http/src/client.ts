import { getLogger } from '@retryline/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';
import type { ZodType } from 'zod';

import { ConcurrencyGate, PermitHolder } from './concurrency-gate.js';
import { resolveClientConfig, type ClientConfig, type ClientConfigOverrides } from './config.js';
import { createSeededRandom, MAX_TIMER_DELAY_MS } from './core/backoff.js';
import { classifyFailure, classifyResponse, isSuccessStatus } from './core/classifier.js';
import * as HttpUtils from './core/http-utils.js';
import type { ClassificationContext, HttpEffects } from './core/types.js';
import { DiagnosticsAccumulator } from './diagnostics.js';
import type { ApiResponse, AttemptResult, ConfigError, HttpHeaders, HttpMethod, RequestOptions } from './types.js';
import { HttpError, InternalError } from './types.js';

type AttemptFailure = { error: Error; timedOut: boolean };

type BodylessOptions<T> = Omit<RequestOptions<T>, 'body'>;

/**
 * Resources a child client borrows from its parent instead of creating its own
 */
interface InheritedResources {
  agent?: Agent | undefined;
  gate?: ConcurrencyGate | undefined;
}

export class HttpClient {
  readonly config: ClientConfig;
  private readonly logger: ReturnType<typeof getLogger>;
  private readonly effects: HttpEffects;
  private readonly effectOverrides: Partial<HttpEffects>;
  private readonly agent: Agent;
  private readonly ownsAgent: boolean;
  private readonly gate: ConcurrencyGate;

  // Close state (for idempotent cleanup)
  private closePromise?: Promise<void>;
  private isClosed = false;

  /**
   * @param inherited - connection pool and admission pool borrowed from a parent client.
   * An inherited agent is closed by its owner, not here; an inherited gate is ignored when
   * the config names a sharedGate.
   */
  constructor(config: ClientConfig, effects: Partial<HttpEffects> = {}, inherited: InheritedResources = {}) {
    this.config = config;
    this.effectOverrides = effects;
    this.logger = getLogger(`HttpClient:${config.name}`);
    this.gate = config.sharedGate ?? inherited.gate ?? new ConcurrencyGate(config.concurrencyLimit);

    // Initialize undici agent for connection pooling and proper cleanup
    this.ownsAgent = inherited.agent === undefined;
    this.agent =
      inherited.agent ??
      new Agent({
        keepAliveTimeout: 10000, // 10 seconds
        keepAliveMaxTimeout: 60000, // 60 seconds
        pipelining: 1,
      });

    // Initialize effects with production defaults
    this.effects = {
      delay: (ms: number) => new Promise((resolve) => setTimeout(resolve, Math.min(ms, MAX_TIMER_DELAY_MS))),
      fetch: ((url: string | URL, init?: RequestInit) =>
        undiciFetch(url, { ...init, dispatcher: this.agent })) as typeof fetch,
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      now: () => Date.now(),
      random: () => Math.random(),
      ...effects,
    };

    this.logger.debug(
      `HTTP client initialized - Timeout: ${config.timeout ?? 'none'}ms, RetryCount: ${config.retryCount}, ConcurrencyLimit: ${this.gate.limit}${config.sharedGate ? ' (shared)' : ''}`
    );
  }

  /**
   * Validate overrides on top of the defaults and build a client.
   */
  static create(
    overrides: ClientConfigOverrides = {},
    effects: Partial<HttpEffects> = {}
  ): Result<HttpClient, ConfigError> {
    return resolveClientConfig(overrides).map((config) => new HttpClient(config, effects));
  }

  /**
   * Independent client for per-call overrides. The parent is never mutated. The child
   * always uses the parent's connection pool, so it needs no close(); it shares the
   * parent's admission pool unless the overrides name a sharedGate or a concurrencyLimit.
   */
  withOverrides(overrides: ClientConfigOverrides): Result<HttpClient, ConfigError> {
    const ownsPool = overrides.sharedGate !== undefined || overrides.concurrencyLimit !== undefined;
    return resolveClientConfig(overrides, this.config).map((config) => {
      const childConfig = ownsPool && !overrides.sharedGate ? { ...config, sharedGate: undefined } : config;
      return new HttpClient(Object.freeze(childConfig), this.effectOverrides, {
        agent: this.agent,
        gate: ownsPool ? undefined : this.gate,
      });
    });
  }

  /**
   * Admission pool used by this client
   */
  get concurrencyGate(): ConcurrencyGate {
    return this.gate;
  }

  /**
   * undici agent carrying this client's connections
   */
  get dispatcher(): Agent {
    return this.agent;
  }

  async get<T = unknown>(url: string, options?: BodylessOptions<T>): Promise<Result<ApiResponse<T>, Error>> {
    return this.request<T>('GET', url, options);
  }

  async head(url: string, options?: BodylessOptions<undefined>): Promise<Result<ApiResponse<undefined>, Error>> {
    return this.request<undefined>('HEAD', url, options);
  }

  async options<T = unknown>(url: string, options?: BodylessOptions<T>): Promise<Result<ApiResponse<T>, Error>> {
    return this.request<T>('OPTIONS', url, options);
  }

  async trace<T = unknown>(url: string, options?: BodylessOptions<T>): Promise<Result<ApiResponse<T>, Error>> {
    return this.request<T>('TRACE', url, options);
  }

  async delete<T = unknown>(url: string, options?: BodylessOptions<T>): Promise<Result<ApiResponse<T>, Error>> {
    return this.request<T>('DELETE', url, options);
  }

  /**
   * Convenience method for POST requests with schema validation
   */
  async post<T>(
    url: string,
    body: unknown,
    options: BodylessOptions<T> & { schema: ZodType<T> }
  ): Promise<Result<ApiResponse<T>, Error>>;
  /**
   * Convenience method for POST requests without validation
   */
  async post<T = unknown>(url: string, body?: unknown, options?: BodylessOptions<T>): Promise<Result<ApiResponse<T>, Error>>;
  async post<T = unknown>(
    url: string,
    body?: unknown,
    options: BodylessOptions<T> = {}
  ): Promise<Result<ApiResponse<T>, Error>> {
    return this.request<T>('POST', url, { ...options, body });
  }

  async put<T = unknown>(url: string, body?: unknown, options: BodylessOptions<T> = {}): Promise<Result<ApiResponse<T>, Error>> {
    return this.request<T>('PUT', url, { ...options, body });
  }

  async patch<T = unknown>(
    url: string,
    body?: unknown,
    options: BodylessOptions<T> = {}
  ): Promise<Result<ApiResponse<T>, Error>> {
    return this.request<T>('PATCH', url, { ...options, body });
  }

  /**
   * Alias of request()
   */
  async execute<T = unknown>(
    method: HttpMethod,
    url: string,
    options: RequestOptions<T> = {}
  ): Promise<Result<ApiResponse<T>, Error>> {
    return this.request<T>(method, url, options);
  }

  /**
   * Run one logical request: admission, attempts, classification and waits.
   *
   * The outer Result is an error for fatal outcomes (disallowed method, closed gate, decode
   * failure, fatal timeout, exhausted network retries). A non-2xx answer that survives the
   * retry policy is `ok` with `success: false`; callers must check both.
   */
  async request<T = unknown>(
    method: HttpMethod,
    url: string,
    options: RequestOptions<T> = {}
  ): Promise<Result<ApiResponse<T>, Error>> {
    const safeUrl = HttpUtils.sanitizeUrl(url);

    if (!this.config.allowedMethods.has(method)) {
      this.effects.log('error', `Method not allowed - Method: ${method}, URL: ${safeUrl}`, { method });
      return err(new InternalError(`Method ${method} not allowed`, 'method_not_allowed'));
    }

    const body = HttpUtils.serializeJsonBody(options.body);
    if (body.isErr()) {
      this.effects.log('error', `Request body rejected - Method: ${method}, URL: ${safeUrl}, Error: ${body.error.message}`);
      return err(body.error);
    }

    this.effects.log('info', `Request start - Method: ${method}, URL: ${safeUrl}`);

    const admission = await this.gate.acquire();
    if (admission.isErr()) {
      this.effects.log('error', `Request not admitted - URL: ${safeUrl}, Error: ${admission.error.message}`);
      return err(admission.error);
    }

    const holder = new PermitHolder(this.gate, admission.value);
    const diagnostics = new DiagnosticsAccumulator();
    const hooks = this.config.hooks;
    const startTime = this.effects.now();
    hooks?.onRequestStart?.({ method, timestamp: startTime, url: safeUrl });

    let outcome: Result<ApiResponse<T>, Error>;
    try {
      outcome = await this.runAttempts(method, url, body.value, options, holder, diagnostics);
    } finally {
      holder.release();
    }

    const durationMs = this.effects.now() - startTime;
    if (outcome.isOk() && outcome.value.success) {
      hooks?.onRequestSuccess?.({ attempts: diagnostics.attempts, durationMs, method, status: outcome.value.status });
    } else if (outcome.isOk()) {
      hooks?.onRequestFailure?.({
        attempts: diagnostics.attempts,
        durationMs,
        error: `HTTP ${outcome.value.status}`,
        method,
        status: outcome.value.status,
      });
    } else {
      hooks?.onRequestFailure?.({
        attempts: diagnostics.attempts,
        durationMs,
        error: outcome.error.message,
        method,
        status: diagnostics.status,
      });
    }

    return outcome;
  }

  /**
   * Cleanup resources.
   * Closes the undici agent to terminate all keep-alive connections.
   * This allows the process to exit naturally without requiring process.exit().
   *
   * Idempotent: safe to call multiple times. Subsequent calls return the same promise.
   * The admission pool is left open: it may be shared with other clients.
   */
  async close(): Promise<void> {
    // Borrowed pool: the parent closes it
    if (!this.ownsAgent) {
      return;
    }

    // Idempotency: return existing close operation if in progress
    if (this.closePromise) {
      return this.closePromise;
    }

    if (this.isClosed) {
      return;
    }

    this.closePromise = (async () => {
      this.logger.debug('Closing HTTP agent connections');
      try {
        await this.agent.close();
        this.isClosed = true;
        this.logger.debug('HTTP agent closed successfully');
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
        throw new Error(`HTTP agent cleanup failed: ${errorMessage}`);
      }
    })();

    return this.closePromise;
  }

  private async runAttempts<T>(
    method: HttpMethod,
    url: string,
    body: string | undefined,
    options: RequestOptions<T>,
    holder: PermitHolder,
    diagnostics: DiagnosticsAccumulator
  ): Promise<Result<ApiResponse<T>, Error>> {
    const safeUrl = HttpUtils.sanitizeUrl(url);
    const random = this.config.deterministicMode ? createSeededRandom() : this.effects.random;
    let maxAttempts = this.config.retryCount + 1;
    let extensionAvailable = true;

    const contextFor = (attempt: number): ClassificationContext => ({
      attempt,
      extensionAvailable,
      maxAttempts,
      method,
      now: this.effects.now(),
      random,
    });

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      diagnostics.recordAttempt();
      this.effects.log(
        'debug',
        `Making HTTP request - URL: ${safeUrl}, Method: ${method}, Attempt: ${attempt}/${maxAttempts}`
      );

      const attemptResult = await this.performAttempt(method, url, body, options.headers);

      if (attemptResult.isErr()) {
        const { error, timedOut } = attemptResult.error;
        diagnostics.recordError(error);
        this.effects.log(
          'error',
          `Request failed - URL: ${safeUrl}, Attempt: ${attempt}/${maxAttempts}, Error: ${error.message}`,
          { method, timedOut }
        );

        const decision = classifyFailure({ error, timedOut }, this.config, contextFor(attempt));
        if (decision.kind === 'fatal') {
          return err(
            new HttpError(error.message, 'timeout', {
              attempts: diagnostics.attempts,
              cause: error,
              statusCode: diagnostics.status,
            })
          );
        }
        if (decision.kind === 'exhausted') {
          return err(diagnostics.toError());
        }

        this.effects.log('info', `Retrying after delay - Delay: ${decision.delayMs}ms, NextAttempt: ${attempt + 1}`);
        await this.waitBetweenAttempts(decision.delayMs, 'backoff', attempt, holder);
        continue;
      }

      const result = attemptResult.value;

      if (result.success) {
        return this.decodeSuccess(method, result, options.schema);
      }

      diagnostics.recordResponse(result.status, result.body);
      const decision = classifyResponse(result, this.config, contextFor(attempt));

      if (decision.kind === 'retry_after') {
        if (decision.extendsBudget) {
          maxAttempts++;
          extensionAvailable = false;
        }
        this.effects.log(
          'info',
          `Honoring Retry-After - Status: ${result.status}, Delay: ${decision.delayMs}ms, NextAttempt: ${attempt + 1}${decision.extendsBudget ? ' (final)' : ''}`
        );
        await this.waitBetweenAttempts(decision.delayMs, 'retry_after', attempt, holder);
        continue;
      }

      if (decision.kind === 'backoff') {
        this.effects.log(
          'info',
          `Retrying after delay - Status: ${result.status}, Delay: ${decision.delayMs}ms, NextAttempt: ${attempt + 1}`
        );
        await this.waitBetweenAttempts(decision.delayMs, 'backoff', attempt, holder);
        continue;
      }

      this.effects.log('warn', `Request completed without success - URL: ${safeUrl}, Status: ${result.status}`, {
        attempts: diagnostics.attempts,
        method,
      });
      return ok({
        errorBody: result.body.length > 0 ? result.body : undefined,
        headers: result.headers,
        status: result.status,
        success: false,
      });
    }

    return err(diagnostics.toError());
  }

  /**
   * One network round-trip. Status, headers and the full body are read once, inside the
   * timeout. The body arrives already serialized.
   */
  private async performAttempt(
    method: HttpMethod,
    url: string,
    body: string | undefined,
    extraHeaders: HttpHeaders | undefined
  ): Promise<Result<AttemptResult, AttemptFailure>> {
    const headers = HttpUtils.mergeHeaders(
      this.config.defaultHeaders,
      body !== undefined ? { 'Content-Type': 'application/json' } : undefined,
      extraHeaders
    );

    const timeout = this.config.timeout;
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId =
      timeout !== undefined
        ? setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, timeout)
        : undefined;

    try {
      const response = await this.effects.fetch(url, {
        // eslint-disable-next-line unicorn/no-null -- 'fetch' requires null for empty body, not undefined
        body: body ?? null,
        headers,
        method,
        signal: controller.signal,
      });
      const text = await response.text();
      return ok({
        body: text,
        headers: HttpUtils.headersToRecord(response.headers),
        status: response.status,
        success: isSuccessStatus(response.status),
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      if (timedOut) {
        return err({ error: new HttpError(`Request timeout after ${timeout}ms`, 'timeout', { cause }), timedOut });
      }
      return err({ error: new HttpError(cause.message, 'network', { cause }), timedOut });
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    }
  }

  private decodeSuccess<T>(
    method: HttpMethod,
    result: AttemptResult,
    schema: ZodType<T> | undefined
  ): Result<ApiResponse<T>, Error> {
    if (HttpUtils.isBodylessSuccess(method, result.status, result.body)) {
      return ok({ data: undefined, headers: result.headers, status: result.status, success: true });
    }

    const decoded = HttpUtils.decodeBody(result.body, result.status, schema);
    if (decoded.isErr()) {
      this.effects.log('error', `Response decode failed - Status: ${result.status}, Error: ${decoded.error.message}`, {
        method,
        truncatedPayload: decoded.error.details.responseBody,
      });
      return err(decoded.error);
    }

    return ok({ data: decoded.value, headers: result.headers, status: result.status, success: true });
  }

  /**
   * Sleep between attempts. Short waits keep the permit; waits at or above the release
   * threshold hand it back and try to re-acquire afterwards. A failed re-acquisition lets
   * the request continue without a permit, so the pool may be briefly oversubscribed.
   */
  private async waitBetweenAttempts(
    delayMs: number,
    reason: 'backoff' | 'retry_after',
    attempt: number,
    holder: PermitHolder
  ): Promise<void> {
    this.config.hooks?.onBackoff?.({ attemptNumber: attempt, delayMs, reason });

    if (delayMs < this.config.permitReleaseThreshold) {
      await this.effects.delay(delayMs);
      return;
    }

    const permit = holder.take();
    if (permit) {
      this.gate.release(permit);
      this.effects.log('debug', `Released concurrency permit for long wait - Delay: ${delayMs}ms`);
    }

    await this.effects.delay(delayMs);

    const reacquired = await this.gate.tryReacquire(this.config.permitReacquireTimeout);
    holder.replace(reacquired);
    this.effects.log(
      'debug',
      reacquired
        ? 'Re-acquired concurrency permit after long wait'
        : `Could not re-acquire concurrency permit within ${this.config.permitReacquireTimeout}ms, continuing without one`
    );
  }
}

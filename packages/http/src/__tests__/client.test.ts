import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { HttpClient } from '../client.js';
import { ConcurrencyGate, type GatePermit } from '../concurrency-gate.js';
import { MAX_TIMER_DELAY_MS } from '../core/backoff.js';
import { ConfigError, HttpError, InternalError } from '../types.js';

import { buildClient, createEffects, empty, fetchSequence, json, text } from './helpers.js';

const URL_QUOTES = 'https://api.example.com/quotes';

describe('HttpClient - successful requests', () => {
  it('returns the decoded body of a 2xx response', async () => {
    const fixture = { quotes: [{ price: 101.25, symbol: 'ABC' }], source: 'test' };
    const mockFetch = fetchSequence(json(200, fixture));
    const { effects } = createEffects(mockFetch);
    const client = buildClient({}, effects);

    const result = await client.get<typeof fixture>(URL_QUOTES);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.success).toBe(true);
      expect(result.value.status).toBe(200);
      expect(result.value.data).toEqual(fixture);
      expect(result.value.headers['content-type']).toBe('application/json');
    }
    expect(mockFetch).toHaveBeenCalledWith(
      URL_QUOTES,
      expect.objectContaining({
        headers: { Accept: 'application/json', 'User-Agent': 'retryline/0.1.0' },
        method: 'GET',
      })
    );
  });

  it('validates the body with a schema', async () => {
    const schema = z.object({ price: z.number(), symbol: z.string() });
    const { effects } = createEffects(fetchSequence(json(200, { price: 3, symbol: 'XYZ' })));
    const client = buildClient({}, effects);

    const result = await client.get(URL_QUOTES, { schema });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.data).toEqual({ price: 3, symbol: 'XYZ' });
    }
  });

  it('sends a JSON body with its content type', async () => {
    const mockFetch = fetchSequence(json(201, { id: 7 }));
    const { effects } = createEffects(mockFetch);
    const client = buildClient({}, effects);

    const result = await client.post(URL_QUOTES, { symbol: 'ABC' }, { headers: { 'X-Request-Id': 'req-1' } });

    expect(result.isOk()).toBe(true);
    expect(mockFetch).toHaveBeenCalledWith(
      URL_QUOTES,
      expect.objectContaining({
        body: '{"symbol":"ABC"}',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          'User-Agent': 'retryline/0.1.0',
          'X-Request-Id': 'req-1',
        },
        method: 'POST',
      })
    );
  });

  it('accepts an empty body on 204 and HEAD', async () => {
    const { effects } = createEffects(fetchSequence(empty(204), empty(200)));
    const client = buildClient({}, effects);

    const deleted = await client.delete(URL_QUOTES);
    const head = await client.head(URL_QUOTES);

    expect(deleted.isOk()).toBe(true);
    if (deleted.isOk()) {
      expect(deleted.value).toEqual({ data: undefined, headers: {}, status: 204, success: true });
    }
    expect(head.isOk()).toBe(true);
    if (head.isOk()) {
      expect(head.value.success).toBe(true);
      expect(head.value.data).toBeUndefined();
    }
  });

  it('routes every convenience method through the same executor', async () => {
    const mockFetch = fetchSequence(json(200, {}));
    const { effects } = createEffects(mockFetch);
    const client = buildClient({}, effects);

    await client.options(URL_QUOTES);
    await client.trace(URL_QUOTES);
    await client.put(URL_QUOTES, { a: 1 });
    await client.patch(URL_QUOTES, { a: 2 });
    await client.execute('GET', URL_QUOTES);

    const methods = mockFetch.mock.calls.map(([, init]) => init?.method);
    expect(methods).toEqual(['OPTIONS', 'TRACE', 'PUT', 'PATCH', 'GET']);
  });
});

describe('HttpClient - status retries', () => {
  it('issues exactly retryCount + 1 requests against a persistent retryable status', async () => {
    const mockFetch = fetchSequence(text(503, 'unavailable'));
    const { delays, effects } = createEffects(mockFetch);
    const client = buildClient({ retryCount: 3 }, effects);

    const result = await client.get(URL_QUOTES);

    expect(mockFetch).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([300, 600, 1200]);
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.success).toBe(false);
      expect(result.value.status).toBe(503);
      expect(result.value.errorBody).toBe('unavailable');
    }
    expect(effects.log).toHaveBeenCalledWith(
      'warn',
      `Request completed without success - URL: ${URL_QUOTES}, Status: 503`,
      { attempts: 4, method: 'GET' }
    );
  });

  it('returns a non-retryable status at once', async () => {
    const mockFetch = fetchSequence(text(404, 'no such symbol'));
    const { delays, effects } = createEffects(mockFetch);
    const client = buildClient({ retryCount: 3 }, effects);

    const result = await client.get(URL_QUOTES);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({
        errorBody: 'no such symbol',
        headers: { 'content-type': 'text/plain;charset=UTF-8' },
        status: 404,
        success: false,
      });
    }
  });

  it('leaves errorBody undefined for an empty error response', async () => {
    const { effects } = createEffects(fetchSequence(empty(400)));
    const client = buildClient({}, effects);

    const result = await client.get(URL_QUOTES);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.errorBody).toBeUndefined();
    }
  });

  it('only backs off for methods in retryMethods', async () => {
    const mockFetch = fetchSequence(text(502, 'bad gateway'));
    const { effects } = createEffects(mockFetch);
    const client = buildClient({ retryMethods: ['GET', 'HEAD'] }, effects);

    const result = await client.post(URL_QUOTES, { symbol: 'ABC' });

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.status).toBe(502);
    }
  });

  it('honors Retry-After before the last attempt', async () => {
    const mockFetch = fetchSequence(text(503, 'busy', { 'Retry-After': '1' }), json(200, { ok: true }));
    const { delays, effects } = createEffects(mockFetch);
    const client = buildClient({}, effects);

    const result = await client.get(URL_QUOTES);

    expect(delays).toEqual([1000]);
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.data).toEqual({ ok: true });
    }
  });

  it('clamps a Retry-After beyond the timer range instead of retrying at once', async () => {
    const mockFetch = fetchSequence(text(503, 'busy', { 'Retry-After': '3000000' }), json(200, { ok: true }));
    const { delays, effects } = createEffects(mockFetch);
    const client = buildClient({}, effects);

    const result = await client.get(URL_QUOTES);

    expect(delays).toEqual([MAX_TIMER_DELAY_MS]);
    expect(result.isOk()).toBe(true);
  });

  it('honors Retry-After on the final attempt with one extra request that can succeed', async () => {
    const onBackoff = vi.fn();
    const mockFetch = fetchSequence(
      text(429, 'slow down'),
      text(429, 'slow down', { 'Retry-After': '2' }),
      json(200, { ok: true })
    );
    const { delays, effects } = createEffects(mockFetch);
    const client = buildClient({ hooks: { onBackoff }, retryCount: 1 }, effects);

    const result = await client.get(URL_QUOTES);

    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([300, 2000]);
    expect(onBackoff.mock.calls).toEqual([
      [{ attemptNumber: 1, delayMs: 300, reason: 'backoff' }],
      [{ attemptNumber: 2, delayMs: 2000, reason: 'retry_after' }],
    ]);
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.success).toBe(true);
    }
  });

  it('stops after the extra request even if the server asks again', async () => {
    const mockFetch = fetchSequence(text(429, 'slow down', { 'Retry-After': '1' }));
    const { delays, effects } = createEffects(mockFetch);
    const client = buildClient({ retryCount: 1 }, effects);

    const result = await client.get(URL_QUOTES);

    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 1000]);
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.success).toBe(false);
      expect(result.value.status).toBe(429);
    }
  });

  it('caps server waits with maxRetryAfter', async () => {
    const mockFetch = fetchSequence(text(503, 'busy', { 'Retry-After': '120' }), json(200, {}));
    const { delays, effects } = createEffects(mockFetch);
    const client = buildClient({ maxRetryAfter: 1500 }, effects);

    await client.get(URL_QUOTES);

    expect(delays).toEqual([1500]);
  });

  it('repeats the same waits in deterministic mode', async () => {
    const run = async (): Promise<number[]> => {
      const { delays, effects } = createEffects(fetchSequence(text(500, 'boom')), { random: () => 0.999 });
      const client = buildClient({ deterministicMode: true, jitterDisabled: false, retryCount: 4 }, effects);
      await client.get(URL_QUOTES);
      return delays;
    };

    const first = await run();
    const second = await run();

    expect(first).toEqual(second);
    const bases = [300, 600, 1200, 2400];
    first.forEach((delay, index) => {
      const jitter = delay - (bases[index] ?? 0);
      expect(jitter).toBeGreaterThanOrEqual(0);
      expect(jitter).toBeLessThanOrEqual(5);
    });
  });
});

describe('HttpClient - errors', () => {
  it('rejects a disallowed method without touching the network or the gate', async () => {
    const mockFetch = fetchSequence(json(200, {}));
    const { effects } = createEffects(mockFetch);
    const client = buildClient({ allowedMethods: ['GET'] }, effects);

    const result = await client.post(URL_QUOTES, { symbol: 'ABC' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(InternalError);
      expect(result.error.message).toBe('Method POST not allowed');
    }
    expect(mockFetch).not.toHaveBeenCalled();
    expect(client.concurrencyGate.inFlight).toBe(0);
    expect(effects.log).toHaveBeenCalledWith('error', `Method not allowed - Method: POST, URL: ${URL_QUOTES}`, {
      method: 'POST',
    });
  });

  it('returns an encode error for a body JSON cannot represent', async () => {
    const mockFetch = fetchSequence(json(200, {}));
    const onRequestStart = vi.fn();
    const { effects } = createEffects(mockFetch);
    const client = buildClient({ hooks: { onRequestStart } }, effects);

    const result = await client.post(URL_QUOTES, { qty: BigInt(10) });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(HttpError);
      if (result.error instanceof HttpError) {
        expect(result.error.reason).toBe('encode');
      }
    }
    expect(mockFetch).not.toHaveBeenCalled();
    expect(onRequestStart).not.toHaveBeenCalled();
    expect(client.concurrencyGate.inFlight).toBe(0);
  });

  it('does not retry a 2xx body that fails to decode', async () => {
    const mockFetch = fetchSequence(text(200, '<html>maintenance</html>'));
    const { delays, effects } = createEffects(mockFetch);
    const client = buildClient({ retryCount: 5 }, effects);

    const result = await client.get(URL_QUOTES);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(HttpError);
      if (result.error instanceof HttpError) {
        expect(result.error.reason).toBe('decode');
      }
    }
  });

  it('treats a schema mismatch as a decode error', async () => {
    const schema = z.object({ price: z.number() });
    const mockFetch = fetchSequence(json(200, { price: 'n/a' }));
    const { effects } = createEffects(mockFetch);
    const client = buildClient({}, effects);

    const result = await client.get(URL_QUOTES, { schema });

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('JSON decode: price: Expected number, received string');
    }
  });

  it('retries network errors and succeeds', async () => {
    const mockFetch = fetchSequence(new TypeError('fetch failed'), json(200, { ok: true }));
    const { delays, effects } = createEffects(mockFetch);
    const client = buildClient({}, effects);

    const result = await client.get(URL_QUOTES);

    expect(delays).toEqual([300]);
    expect(result.isOk()).toBe(true);
    expect(effects.log).toHaveBeenCalledWith(
      'error',
      `Request failed - URL: ${URL_QUOTES}, Attempt: 1/3, Error: fetch failed`,
      { method: 'GET', timedOut: false }
    );
  });

  it('returns an enriched error once network retries are exhausted', async () => {
    const mockFetch = fetchSequence(text(503, 'busy'), new TypeError('fetch failed'));
    const { effects } = createEffects(mockFetch);
    const client = buildClient({ retryCount: 2 }, effects);

    const result = await client.get(URL_QUOTES);

    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(HttpError);
      expect(result.error.message).toBe('status=503, body="busy", attempts=3, last_err="HttpError: fetch failed"');
      if (result.error instanceof HttpError) {
        expect(result.error.reason).toBe('exhausted');
        expect(result.error.attempts).toBe(3);
        expect(result.error.statusCode).toBe(503);
        expect(result.error.details.cause).toBeInstanceOf(HttpError);
      }
    }
  });

  it('stops retrying when the predicate declines', async () => {
    const shouldRetry = vi.fn().mockReturnValue(false);
    const mockFetch = fetchSequence(new TypeError('fetch failed'));
    const { effects } = createEffects(mockFetch);
    const client = buildClient({ retryPredicate: { shouldRetry } }, effects);

    const result = await client.get(URL_QUOTES);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(shouldRetry).toHaveBeenCalledTimes(1);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('attempts=1, last_err="HttpError: fetch failed"');
    }
  });

  describe('timeouts', () => {
    const hangingFetch = () =>
      vi.fn(
        (_input: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
          })
      );

    it('fails immediately on timeout by default', async () => {
      const mockFetch = hangingFetch();
      const { effects } = createEffects(mockFetch);
      const client = buildClient({ retryCount: 3, timeout: 20 }, effects);

      const result = await client.get(URL_QUOTES);

      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe('Request timeout after 20ms');
        if (result.error instanceof HttpError) {
          expect(result.error.reason).toBe('timeout');
          expect(result.error.attempts).toBe(1);
        }
      }
    });

    it('retries a timeout when retryOnTimeout is set', async () => {
      let calls = 0;
      const hanging = hangingFetch();
      const mockFetch = vi.fn((input: string | URL | Request, init?: RequestInit) => {
        calls++;
        return calls === 1 ? hanging(input, init) : Promise.resolve(json(200, { ok: true })());
      });
      const { effects } = createEffects(mockFetch);
      const client = buildClient({ retryOnTimeout: true, timeout: 20 }, effects);

      const result = await client.get(URL_QUOTES);

      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(result.isOk()).toBe(true);
    });
  });

  it('fails with gate_closed once the gate is closed', async () => {
    const { effects } = createEffects(fetchSequence(json(200, {})));
    const client = buildClient({}, effects);
    client.concurrencyGate.close();

    const result = await client.get(URL_QUOTES);

    expect(result.isErr()).toBe(true);
    if (result.isErr() && result.error instanceof InternalError) {
      expect(result.error.reason).toBe('gate_closed');
    }
  });
});

describe('HttpClient - concurrency', () => {
  const LATENCY_MS = 50;

  const slowFetch = (counters: { active: number; max: number }) =>
    vi.fn(async (): Promise<Response> => {
      counters.active++;
      counters.max = Math.max(counters.max, counters.active);
      await new Promise((resolve) => setTimeout(resolve, LATENCY_MS));
      counters.active--;
      return json(200, {})();
    });

  it('serializes concurrent calls with a limit of one', async () => {
    const counters = { active: 0, max: 0 };
    const { effects } = createEffects(slowFetch(counters));
    const client = buildClient({ concurrencyLimit: 1 }, effects);

    const started = performance.now();
    const results = await Promise.all([client.get(URL_QUOTES), client.get(URL_QUOTES)]);
    const elapsed = performance.now() - started;

    expect(results.every((result) => result.isOk())).toBe(true);
    expect(counters.max).toBe(1);
    // Timers may fire up to a millisecond early
    expect(elapsed).toBeGreaterThanOrEqual(2 * LATENCY_MS - 2);
  });

  it('runs calls side by side up to the limit', async () => {
    const counters = { active: 0, max: 0 };
    const { effects } = createEffects(slowFetch(counters));
    const client = buildClient({ concurrencyLimit: 2 }, effects);

    await Promise.all([client.get(URL_QUOTES), client.get(URL_QUOTES), client.get(URL_QUOTES)]);

    expect(counters.max).toBe(2);
    expect(client.concurrencyGate.inFlight).toBe(0);
  });

  it('shares one pool across clients given the same gate', async () => {
    const counters = { active: 0, max: 0 };
    const gate = new ConcurrencyGate(1);
    const { effects } = createEffects(slowFetch(counters));
    const first = buildClient({ concurrencyLimit: 4, sharedGate: gate }, effects);
    const second = buildClient({ concurrencyLimit: 4, sharedGate: gate }, effects);

    await Promise.all([first.get(URL_QUOTES), second.get(URL_QUOTES)]);

    expect(first.concurrencyGate).toBe(gate);
    expect(counters.max).toBe(1);
    expect(gate.inFlight).toBe(0);
  });

  it('keeps the permit through short waits and releases it for long ones', async () => {
    const mockFetch = fetchSequence(
      text(500, 'boom'),
      text(503, 'busy', { 'Retry-After': '3' }),
      json(200, { ok: true })
    );
    const heldDuringWait: number[] = [];
    const { effects } = createEffects(mockFetch);
    const client = buildClient({ concurrencyLimit: 1 }, effects);
    effects.delay.mockImplementation(() => {
      heldDuringWait.push(client.concurrencyGate.inFlight);
      return Promise.resolve();
    });

    const result = await client.get(URL_QUOTES);

    expect(result.isOk()).toBe(true);
    expect(effects.delay.mock.calls).toEqual([[300], [3000]]);
    expect(heldDuringWait).toEqual([1, 0]);
    expect(client.concurrencyGate.inFlight).toBe(0);
  });

  it('releases the permit for a wait exactly at the threshold', async () => {
    const heldDuringWait: number[] = [];
    const runWith = async (retryAfterSeconds: string, permitReleaseThreshold: number) => {
      const mockFetch = fetchSequence(text(503, 'busy', { 'Retry-After': retryAfterSeconds }), json(200, {}));
      const { effects } = createEffects(mockFetch);
      const client = buildClient({ concurrencyLimit: 1, permitReleaseThreshold }, effects);
      effects.delay.mockImplementation(() => {
        heldDuringWait.push(client.concurrencyGate.inFlight);
        return Promise.resolve();
      });
      await client.get(URL_QUOTES);
    };

    await runWith('2', 2000);
    await runWith('1', 1001);

    expect(heldDuringWait).toEqual([0, 1]);
  });

  it('continues without a permit when re-acquisition times out', async () => {
    const gate = new ConcurrencyGate(1);
    const mockFetch = fetchSequence(text(503, 'busy', { 'Retry-After': '5' }), json(200, { ok: true }));
    const { effects } = createEffects(mockFetch);
    const client = buildClient({ permitReacquireTimeout: 10, sharedGate: gate }, effects);
    const intruders: GatePermit[] = [];
    effects.delay.mockImplementation(async () => {
      const admission = await gate.acquire();
      if (admission.isOk()) {
        intruders.push(admission.value);
      }
    });

    const result = await client.get(URL_QUOTES);

    expect(result.isOk()).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(intruders).toHaveLength(1);
    expect(gate.inFlight).toBe(1);
    intruders.forEach((permit) => gate.release(permit));
    expect(gate.inFlight).toBe(0);
  });
});

describe('HttpClient - hooks and logging', () => {
  it('reports one start and one success per logical request', async () => {
    const hooks = { onRequestFailure: vi.fn(), onRequestStart: vi.fn(), onRequestSuccess: vi.fn() };
    const { effects } = createEffects(fetchSequence(text(500, 'boom'), json(200, {})));
    const client = buildClient({ hooks }, effects);

    await client.get(URL_QUOTES);

    expect(hooks.onRequestStart).toHaveBeenCalledTimes(1);
    expect(hooks.onRequestStart).toHaveBeenCalledWith({ method: 'GET', timestamp: 1704110400000, url: URL_QUOTES });
    expect(hooks.onRequestSuccess).toHaveBeenCalledWith({ attempts: 2, durationMs: 0, method: 'GET', status: 200 });
    expect(hooks.onRequestFailure).not.toHaveBeenCalled();
  });

  it('reports a non-2xx outcome as a failure', async () => {
    const hooks = { onRequestFailure: vi.fn(), onRequestSuccess: vi.fn() };
    const { effects } = createEffects(fetchSequence(text(404, 'missing')));
    const client = buildClient({ hooks }, effects);

    await client.get(URL_QUOTES);

    expect(hooks.onRequestFailure).toHaveBeenCalledWith({
      attempts: 1,
      durationMs: 0,
      error: 'HTTP 404',
      method: 'GET',
      status: 404,
    });
    expect(hooks.onRequestSuccess).not.toHaveBeenCalled();
  });

  it('logs request start with a sanitized URL', async () => {
    const { effects } = createEffects(fetchSequence(json(200, {})));
    const client = buildClient({}, effects);

    await client.get(`${URL_QUOTES}?apikey=test-secret`);

    expect(effects.log).toHaveBeenCalledWith('info', `Request start - Method: GET, URL: ${URL_QUOTES}?apikey=***`);
  });
});

describe('HttpClient - configuration', () => {
  it('rejects invalid configuration', () => {
    const result = HttpClient.create({ retryCount: -1 });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ConfigError);
    }
  });

  it('builds independent clients for per-call overrides that share the pool', async () => {
    const mockFetch = fetchSequence(text(503, 'busy'));
    const { effects } = createEffects(mockFetch);
    const parent = buildClient({ retryCount: 2 }, effects);

    const child = parent.withOverrides({ retryCount: 0 });
    if (child.isErr()) throw child.error;
    await child.value.get(URL_QUOTES);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(parent.config.retryCount).toBe(2);
    expect(child.value.config.retryCount).toBe(0);
    expect(child.value.concurrencyGate).toBe(parent.concurrencyGate);
  });

  it('lends its connection pool to override clients and keeps ownership of it', async () => {
    const { effects } = createEffects(fetchSequence(json(200, {})));
    const parent = buildClient({}, effects);

    const child = parent.withOverrides({ concurrencyLimit: 3, retryCount: 0 });
    if (child.isErr()) throw child.error;

    expect(child.value.dispatcher).toBe(parent.dispatcher);

    await child.value.close();
    expect(parent.dispatcher.closed).toBe(false);

    await parent.close();
    expect(parent.dispatcher.closed).toBe(true);
  });

  it('gives an override with its own limit a separate pool', () => {
    const { effects } = createEffects(fetchSequence(json(200, {})));
    const parent = buildClient({}, effects);

    const child = parent.withOverrides({ concurrencyLimit: 5 });

    expect(child.isOk()).toBe(true);
    if (child.isOk()) {
      expect(child.value.concurrencyGate).not.toBe(parent.concurrencyGate);
      expect(child.value.concurrencyGate.limit).toBe(5);
    }
  });

  it('reports invalid overrides', () => {
    const { effects } = createEffects(fetchSequence(json(200, {})));
    const parent = buildClient({}, effects);

    expect(parent.withOverrides({ concurrencyLimit: 0 }).isErr()).toBe(true);
  });

  it('closes idempotently', async () => {
    const { effects } = createEffects(fetchSequence(json(200, {})));
    const client = buildClient({}, effects);

    await expect(Promise.all([client.close(), client.close()])).resolves.toEqual([undefined, undefined]);
    await expect(client.close()).resolves.toBeUndefined();
  });
});

import { vi } from 'vitest';

import { HttpClient } from '../client.js';
import type { ClientConfigOverrides } from '../config.js';
import type { HttpEffects } from '../core/types.js';

export const NOW = Date.UTC(2024, 0, 1, 12, 0, 0);

export type FetchStep = (() => Response) | Error;

export const json = (status: number, body: unknown, headers: Record<string, string> = {}) => (): Response =>
  new Response(JSON.stringify(body), { headers: { 'content-type': 'application/json', ...headers }, status });

export const text = (status: number, body: string, headers: Record<string, string> = {}) => (): Response =>
  new Response(body, { headers, status });

export const empty = (status: number) => (): Response => new Response(null, { status });

/**
 * Mock fetch answering with each step in turn; the last step repeats. A Response body can
 * only be read once, so every call builds a fresh one.
 */
export const fetchSequence = (...steps: FetchStep[]) => {
  let call = 0;
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const step = steps[Math.min(call, steps.length - 1)];
    call++;
    if (step === undefined) {
      throw new Error('fetchSequence needs at least one step');
    }
    if (step instanceof Error) {
      throw step;
    }
    return step();
  });
};

export const createEffects = (
  fetchMock: HttpEffects['fetch'],
  overrides: Partial<Pick<HttpEffects, 'now' | 'random'>> = {}
) => {
  const delays: number[] = [];
  const effects = {
    delay: vi.fn((ms: number) => {
      delays.push(ms);
      return Promise.resolve();
    }),
    fetch: fetchMock,
    log: vi.fn(),
    now: overrides.now ?? (() => NOW),
    random: overrides.random ?? (() => 0),
  };
  return { delays, effects };
};

export const buildClient = (overrides: ClientConfigOverrides, effects: Partial<HttpEffects>): HttpClient => {
  const result = HttpClient.create({ jitterDisabled: true, ...overrides }, effects);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
};

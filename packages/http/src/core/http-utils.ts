// Pure HTTP utility functions
// All functions are pure - no side effects

import { err, ok, type Result } from 'neverthrow';
import type { ZodType } from 'zod';

import { HttpError, type HttpHeaders, type HttpMethod } from '../types.js';

export const BODY_SNIPPET_LIMIT = 1024;

/**
 * Sanitize URL for logging (remove sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);

    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'secret', 'password'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};

/**
 * Merge header records; later sources win, keys compared case-insensitively
 */
export const mergeHeaders = (...sources: (HttpHeaders | undefined)[]): HttpHeaders => {
  const merged: HttpHeaders = {};
  const keysByLowerName = new Map<string, string>();

  for (const source of sources) {
    if (!source) continue;
    for (const [key, value] of Object.entries(source)) {
      const previousKey = keysByLowerName.get(key.toLowerCase());
      if (previousKey !== undefined) {
        delete merged[previousKey];
      }
      merged[key] = value;
      keysByLowerName.set(key.toLowerCase(), key);
    }
  }

  return merged;
};

/**
 * Flatten fetch Headers into a plain record with lower-cased names
 */
export const headersToRecord = (headers: Headers): HttpHeaders => {
  const record: HttpHeaders = {};
  headers.forEach((value, key) => {
    record[key.toLowerCase()] = value;
  });
  return record;
};

/**
 * Bound a response body for diagnostics
 */
export const truncateBody = (body: string, limit: number = BODY_SNIPPET_LIMIT): string =>
  body.length > limit ? `${body.slice(0, limit)}...[truncated]` : body;

/**
 * Serialize a request body as JSON. Returns undefined when there is no body.
 */
export const serializeJsonBody = (body: unknown): Result<string | undefined, HttpError> => {
  if (body === undefined) {
    return ok(undefined);
  }
  try {
    return ok(JSON.stringify(body));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new HttpError(`JSON encode: ${reason}`, 'encode', { cause: error }));
  }
};

/**
 * Responses that legitimately carry no body on success
 */
export const isBodylessSuccess = (method: HttpMethod, status: number, body: string): boolean =>
  body.length === 0 && (method === 'HEAD' || status === 204);

/**
 * Decode a 2xx body into the caller's type. A body that is not JSON, or that fails the
 * schema, is a decode error.
 */
export const decodeBody = <T>(body: string, status: number, schema?: ZodType<T>): Result<T, HttpError> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(
      new HttpError(`JSON decode: ${reason}`, 'decode', {
        cause: error,
        responseBody: truncateBody(body),
        statusCode: status,
      })
    );
  }

  if (!schema) {
    return ok(parsed as T);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return err(
      new HttpError(`JSON decode: ${issues}`, 'decode', {
        cause: result.error,
        responseBody: truncateBody(body),
        statusCode: status,
      })
    );
  }

  return ok(result.data);
};

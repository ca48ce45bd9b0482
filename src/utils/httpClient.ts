/**
 * Single-attempt HTTP executor.
 * Performs exactly one request and classifies it into an AttemptOutcome;
 * it never retries and never throws for HTTP-level problems.
 */

import { logger } from './logger';
import { failure, success, throttled, type AttemptOutcome } from '../types/outcome';
import { HttpStatusError, ScanCancelledError, TransientNetworkError, errorMessage } from '../resilience/errors';

export type QueryValue = string | number | boolean | Array<string | number>;

export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  query?: Record<string, QueryValue | undefined>;
  body?: unknown;
  headers?: Record<string, string>;
}

export type HttpExecutor = (request: HttpRequest, signal?: AbortSignal) => Promise<AttemptOutcome<unknown>>;

export interface HttpExecutorOptions {
  userAgent: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export function buildUrl(url: string, query?: HttpRequest['query']): string {
  if (!query) return url;
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      value.forEach((entry) => target.searchParams.append(key, String(entry)));
    } else {
      target.searchParams.append(key, String(value));
    }
  }
  return target.toString();
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds.
 * Returns null when the header is absent or unparseable.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (value === null) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;

  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

export function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 408;
}

async function discardBody(response: Response): Promise<void> {
  try {
    await response.arrayBuffer();
  } catch (error) {
    logger.debug('Could not drain response body', { error: errorMessage(error) });
  }
}

export function createHttpExecutor(options: HttpExecutorOptions): HttpExecutor {
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (request, signal) => {
    const url = buildUrl(request.url, request.query);
    const timeoutSignal = AbortSignal.timeout(options.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

    const headers: Record<string, string> = {
      'User-Agent': options.userAgent,
      Accept: 'application/json',
      ...request.headers
    };
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: request.method,
        headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: combined
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new ScanCancelledError();
      }
      if (timeoutSignal.aborted) {
        return failure(new TransientNetworkError(`Request timed out after ${options.timeoutMs}ms`, undefined, { cause: error }), true);
      }
      return failure(new TransientNetworkError(`Network error: ${errorMessage(error)}`, undefined, { cause: error }), true);
    }

    if (response.status === 429) {
      await discardBody(response);
      return throttled(parseRetryAfter(response.headers.get('retry-after')));
    }

    if (!response.ok) {
      await discardBody(response);
      const error = new HttpStatusError(response.status, url);
      return isRetryableStatus(response.status)
        ? failure(new TransientNetworkError(error.message, response.status, { cause: error }), true, response.status)
        : failure(error, false, response.status);
    }

    try {
      const payload: unknown = await response.json();
      return success(payload, response.status);
    } catch (error) {
      if (signal?.aborted) {
        throw new ScanCancelledError();
      }
      if (timeoutSignal.aborted) {
        return failure(new TransientNetworkError(`Response body timed out after ${options.timeoutMs}ms`, undefined, { cause: error }), true);
      }
      return failure(new Error(`Malformed JSON from ${url}: ${errorMessage(error)}`), false, response.status);
    }
  };
}

/**
 * JSON-over-HTTP helper shared by the API policy loader and version checker.
 */

import { SourceUnavailableError, errorMessage } from '@policy-sync/core';

export type FetchFn = typeof fetch;

/** Default HTTP configuration values */
export const HTTP_DEFAULTS = {
  /** Connect + read budget per request */
  TIMEOUT_MS: 5000,
} as const;

export type HttpJsonResult =
  | { kind: 'json'; status: number; body: unknown }
  | { kind: 'empty'; status: number }
  | { kind: 'malformed'; status: number; error: string }
  | { kind: 'http_error'; status: number; statusText: string };

export interface GetJsonOptions {
  fetchFn?: FetchFn;
  timeoutMs?: number;
  /** Aborts the request early (used for forced cancellation) */
  signal?: AbortSignal;
}

/**
 * GET a JSON document.
 *
 * Network failures, timeouts and aborts reject with `SourceUnavailableError`.
 * Non-2xx statuses, empty bodies and unparsable bodies resolve to a result
 * describing what came back.
 */
export async function getJson(url: string, options: GetJsonOptions = {}): Promise<HttpJsonResult> {
  const fetchFn = options.fetchFn ?? fetch;
  const timeoutMs = options.timeoutMs ?? HTTP_DEFAULTS.TIMEOUT_MS;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onExternalAbort = () => controller.abort();

  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });
  }

  try {
    const response = await fetchFn(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: controller.signal,
    });

    if (!response.ok) {
      return { kind: 'http_error', status: response.status, statusText: response.statusText };
    }

    const text = await response.text();
    if (!text.trim()) {
      return { kind: 'empty', status: response.status };
    }

    try {
      return { kind: 'json', status: response.status, body: JSON.parse(text) };
    } catch (error) {
      return { kind: 'malformed', status: response.status, error: errorMessage(error) };
    }
  } catch (error) {
    const reason = controller.signal.aborted
      ? options.signal?.aborted
        ? 'request cancelled'
        : `request timed out after ${timeoutMs}ms`
      : errorMessage(error);
    throw new SourceUnavailableError(`GET ${url} failed: ${reason}`, url, error);
  } finally {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener('abort', onExternalAbort);
  }
}

/**
 * Fetch utilities - node-fetch wrapper that reports failures as data
 * instead of throwing, so callers decide what a failure means.
 */

import fetch from 'node-fetch';
import type { RequestInit } from 'node-fetch';
import { toErrorMessage } from './errors';

/**
 * Fetch response with parsed data
 */
export interface FetchResult<T = unknown> {
  ok: boolean;
  /** HTTP status, 0 when the request never got an answer */
  status: number;
  statusText: string;
  url: string;
  data?: T;
  error?: string;
  /** Wall time from request to fully read body */
  elapsedMs: number;
}

/**
 * Options for fetch wrapper
 */
export interface FetchOptions extends RequestInit {
  /** Whether to parse response as JSON (default: true) */
  parseJson?: boolean;
}

const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Fetch with detailed result (includes status info even on failure)
 *
 * Never rejects: network errors, timeouts and unparsable bodies come back
 * with `ok: false` and an `error` message.
 */
export async function fetchWithResult(
  url: string,
  options: FetchOptions = {}
): Promise<FetchResult> {
  const { parseJson = true, ...init } = options;
  const start = Date.now();

  try {
    const response = await fetch(url, {
      ...init,
      timeout: init.timeout ?? DEFAULT_TIMEOUT_MS,
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => response.statusText);
      return {
        ok: false,
        status: response.status,
        statusText: response.statusText,
        url,
        error: errorText,
        elapsedMs: Date.now() - start,
      };
    }

    const text = await response.text();
    let data: unknown = text;
    if (parseJson) {
      try {
        data = JSON.parse(text);
      } catch (error) {
        return {
          ok: false,
          status: response.status,
          statusText: response.statusText,
          url,
          error: `Invalid JSON body: ${toErrorMessage(error)}`,
          elapsedMs: Date.now() - start,
        };
      }
    }

    return {
      ok: true,
      status: response.status,
      statusText: response.statusText,
      url,
      data,
      elapsedMs: Date.now() - start,
    };
  } catch (error) {
    return {
      ok: false,
      status: 0,
      statusText: 'Network Error',
      url,
      error: toErrorMessage(error),
      elapsedMs: Date.now() - start,
    };
  }
}

/**
 * Build `base + path?query`, percent-encoding every query value.
 * A trailing slash on the base is dropped.
 */
export function buildUrl(base: string, path: string, query: Record<string, string> = {}): string {
  const trimmed = base.replace(/\/+$/, '');
  const pairs = Object.entries(query).map(
    ([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`
  );
  return pairs.length > 0 ? `${trimmed}${path}?${pairs.join('&')}` : `${trimmed}${path}`;
}

// ABOUTME: Fetch utilities with timeout support for external API calls.
// ABOUTME: Aborts requests that hang so a caller's await always settles.

import { AppError } from './errors';

/**
 * Default timeouts for different service types (in milliseconds)
 */
export const DEFAULT_TIMEOUTS = {
  /** Catalog lookups and token exchange (10 seconds) */
  fast: 10_000,
  /** Large payloads such as audio analysis (30 seconds) */
  slow: 30_000,
} as const;

export type TimeoutPreset = keyof typeof DEFAULT_TIMEOUTS;

export interface FetchWithTimeoutOptions extends RequestInit {
  /** Timeout in milliseconds, or a preset name */
  timeout?: number | TimeoutPreset;
}

/**
 * Error thrown when a fetch request times out
 */
export class TimeoutError extends AppError {
  constructor(
    public url: string,
    public timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`, 'TIMEOUT', 504, { url, timeoutMs });
    this.name = 'TimeoutError';
  }
}

export function resolveTimeout(timeout: number | TimeoutPreset | undefined): number {
  if (timeout === undefined) {
    return DEFAULT_TIMEOUTS.fast;
  }
  if (typeof timeout === 'number') {
    return timeout;
  }
  return DEFAULT_TIMEOUTS[timeout];
}

/**
 * Fetch with automatic timeout support.
 *
 * Uses AbortController to cancel requests that take too long.
 *
 * @example
 * // Using default timeout (10s)
 * const response = await fetchWithTimeout('https://api.spotify.com/v1/tracks/abc');
 *
 * @example
 * // Using a preset
 * const response = await fetchWithTimeout(url, { timeout: 'slow' });
 */
export async function fetchWithTimeout(
  url: string | URL,
  options: FetchWithTimeoutOptions = {}
): Promise<Response> {
  const { timeout, ...fetchOptions } = options;
  const timeoutMs = resolveTimeout(timeout);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url.toString(), {
      ...fetchOptions,
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new TimeoutError(url.toString(), timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

// Query-string helpers for GET requests

import type { QueryParams } from '../types';

/**
 * Build URLSearchParams from a params record.
 *
 * Absent values (`undefined`, `null`) are omitted rather than sent empty.
 * Arrays are joined into a single comma-delimited value; an empty array is
 * treated as absent.
 */
export function toSearchParams(params: QueryParams = {}): URLSearchParams {
  const search = new URLSearchParams();

  Object.entries(params).forEach(([key, value]) => {
    if (value === undefined || value === null) return;

    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      search.set(key, String(value));
      return;
    }

    if (value.length > 0) {
      search.set(key, value.join(','));
    }
  });

  return search;
}

/**
 * Append params to a URL, leaving it untouched when nothing survives filtering.
 */
export function withQuery(url: string, params?: QueryParams): string {
  const query = toSearchParams(params).toString();
  return query ? `${url}?${query}` : url;
}

import { ok, type Result } from 'neverthrow';
import { convertUtcTimestamp } from './timestamps';
import type { WatchlistParseError } from './types';

/**
 * Build the `dateTime` query string. The API expects literal colons, so the
 * encoded `%3A` is reverted.
 */
export function buildDateQuery(isoTimestamp: string): string {
  return new URLSearchParams({ dateTime: isoTimestamp }).toString().replace(/%3A/g, ':');
}

export function joinBaseUrlAndQuery(baseUrl: string, query: string): string {
  if (baseUrl.endsWith('/')) {
    return `${baseUrl.slice(0, -1)}?${query}`;
  }
  return `${baseUrl}?${query}`;
}

/**
 * URL of the configuration active at `at`, or of the currently active one
 * when `at` is omitted. `at` may be in any grammar the timestamp parser
 * accepts; it is sent as ISO 8601 UTC.
 */
export function buildRetrievalUrl(
  endpoint: string,
  at?: string,
): Result<string, WatchlistParseError> {
  if (at === undefined) {
    return ok(endpoint);
  }
  return convertUtcTimestamp(at).map((iso) => joinBaseUrlAndQuery(endpoint, buildDateQuery(iso)));
}

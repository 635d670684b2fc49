import { DateTime } from 'luxon';
import { err, ok, type Result } from 'neverthrow';
import { WatchlistParseError } from './types';

/** `2020-11-18T15:23:52Z` */
export const ISO_UTC_FORMAT = "yyyy-MM-dd'T'HH:mm:ss'Z'";

/** `20201118T152352Z`, used in file names. */
export const COMPACT_UTC_FORMAT = "yyyyMMdd'T'HHmmss'Z'";

// Written dates with a short or full month name and a trailing UTC/GMT,
// e.g. `Fri, 20 November 2020 18:00:00 UTC`.
const WRITTEN_FORMATS = ['EEE, ', ''].flatMap((weekday) =>
  ['MMM', 'MMMM'].flatMap((month) =>
    ["'UTC'", "'GMT'"].map((zone) => `${weekday}d ${month} yyyy HH:mm:ss ${zone}`),
  ),
);

const PARSERS: ReadonlyArray<(raw: string) => DateTime> = [
  (raw) => DateTime.fromHTTP(raw, { setZone: true }),
  (raw) => DateTime.fromRFC2822(raw, { setZone: true }),
  (raw) => DateTime.fromISO(raw, { setZone: true }),
  (raw) => DateTime.fromSQL(raw, { setZone: true }),
  ...WRITTEN_FORMATS.map(
    (format) => (raw: string) => DateTime.fromFormat(raw, format, { zone: 'utc', locale: 'en-US' }),
  ),
];

/**
 * Parse an HTTP-date, RFC 2822, ISO 8601 or SQL-style timestamp, or a written
 * date such as `Fri, 20 November 2020 18:00:00 UTC`.
 *
 * The wall-clock fields are kept and the result is tagged UTC, whatever offset
 * the input carried.
 */
export function parseUtcTimestamp(raw: string): Result<DateTime, WatchlistParseError> {
  const trimmed = raw.trim();
  for (const parse of PARSERS) {
    const parsed = parse(trimmed);
    if (parsed.isValid) {
      return ok(parsed.setZone('utc', { keepLocalTime: true }));
    }
  }
  return err(new WatchlistParseError(`Unrecognised timestamp: "${raw}"`));
}

export function formatUtcTimestamp(instant: DateTime, pattern: string = ISO_UTC_FORMAT): string {
  return instant.toUTC().toFormat(pattern, { locale: 'en-US' });
}

export function convertUtcTimestamp(
  raw: string,
  pattern: string = ISO_UTC_FORMAT,
): Result<string, WatchlistParseError> {
  return parseUtcTimestamp(raw).map((instant) => formatUtcTimestamp(instant, pattern));
}

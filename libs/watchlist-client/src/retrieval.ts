import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { err, Result, ResultAsync } from 'neverthrow';
import { COMPACT_UTC_FORMAT, convertUtcTimestamp } from './timestamps';
import { WatchlistIoError, WatchlistParseError, type RetrievedConfig } from './types';

/**
 * Infer the timestamp of a retrieved configuration.
 *
 * Without a query string the request asked for the configuration active now,
 * so the response `Date` header is used. With one, the request asked for the
 * configuration active at the `dateTime` value, and that value is used
 * instead; the server's `Date` only says when it answered.
 */
export function inferRetrievedTimestamp(
  requestUrl: string,
  headers: Headers,
): Result<string, WatchlistParseError> {
  const parsedUrl = parseUrl(requestUrl);
  if (parsedUrl.isErr()) {
    return err(parsedUrl.error);
  }
  const query = parsedUrl.value.search.replace(/^\?/, '');

  if (query === '') {
    const date = headers.get('date');
    if (date === null) {
      return err(new WatchlistParseError('Response is missing a Date header'));
    }
    return convertUtcTimestamp(date, COMPACT_UTC_FORMAT);
  }

  const value = query.split('=')[1];
  if (value === undefined || value === '') {
    return err(new WatchlistParseError(`Query string carries no timestamp: "${query}"`));
  }
  return convertUtcTimestamp(decodeQueryValue(value), COMPACT_UTC_FORMAT);
}

export function packageRetrievedConfig(
  requestUrl: string,
  response: Response,
): ResultAsync<RetrievedConfig, WatchlistParseError> {
  return ResultAsync.fromPromise(
    response.arrayBuffer(),
    (error) => new WatchlistParseError(`Unable to read response body: ${errorMessage(error)}`),
  ).andThen((buffer) =>
    inferRetrievedTimestamp(requestUrl, response.headers).map(
      (timestamp): RetrievedConfig => ({ timestamp, body: new Uint8Array(buffer) }),
    ),
  );
}

/**
 * Write the configuration, unmodified, to
 * `<directory>/watchlist_config@<timestamp>.csv`. Returns the file path.
 */
export function writeRetrievedConfig(
  config: RetrievedConfig,
  directory: string,
): ResultAsync<string, WatchlistIoError> {
  const filePath = path.join(directory, `watchlist_config@${config.timestamp}.csv`);
  return ResultAsync.fromPromise(
    mkdir(directory, { recursive: true }).then(() => writeFile(filePath, config.body)),
    (error) => new WatchlistIoError(`Unable to write ${filePath}: ${errorMessage(error)}`, filePath),
  ).map(() => filePath);
}

const parseUrl = Result.fromThrowable(
  (url: string) => new URL(url),
  () => new WatchlistParseError('Request URL is not a valid URL'),
);

function decodeQueryValue(value: string): string {
  try {
    return decodeURIComponent(value.replace(/\+/g, ' '));
  } catch {
    return value;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * @libs/watchlist-client
 *
 * Watchlist API Client Library
 *
 * Manages the source subscription configuration held by the Watchlist API:
 * - Retrieval of the active configuration, or of the one active at a past time
 * - Validation and submission of new configuration files
 * - Timestamp normalisation and result writers (CSV, JSON)
 *
 * Every operation returns a neverthrow `Result` or `ResultAsync` whose error
 * side is a `WatchlistError`, discriminated by `kind`.
 *
 * ## Usage
 *
 * ```typescript
 * import { createWatchlistClient, writeRetrievedConfig } from '@libs/watchlist-client';
 *
 * const client = createWatchlistClient({ username: 'user', password: 'secret' });
 *
 * const written = await client
 *   .retrieveConfig('2020-11-18T12:30:52Z')
 *   .andThen((config) => writeRetrievedConfig(config, './out'));
 *
 * if (written.isErr()) {
 *   console.error(written.error.message);
 * }
 * ```
 *
 * ## Environment Variables
 *
 * Optional:
 * - `WATCHLIST_API_ENDPOINT` - API endpoint
 * - `WATCHLIST_TIMEOUT_MS` - Per-request timeout (default: 30000)
 */

// ============================================================================
// Primary API - Client and Factory
// ============================================================================

export { WatchlistClient, createWatchlistClient, DEFAULT_ENDPOINT } from './watchlistClient';

// ============================================================================
// Validation, Mapping and Writers
// ============================================================================

export { validateCredentials } from './credentials';
export {
  validateHeader,
  validateRow,
  validateConfigContent,
  validateConfigFile,
} from './configValidator';
export {
  inferRetrievedTimestamp,
  packageRetrievedConfig,
  writeRetrievedConfig,
} from './retrieval';
export {
  WatchlistActionSummarySchema,
  parseActionSummary,
  mapSubmissionResponse,
  stringifyRequestSummary,
  writeRequestSummaryJson,
} from './submission';
export type { RequestSummary, WatchlistActionSummary } from './submission';

// ============================================================================
// Helpers
// ============================================================================

export {
  ISO_UTC_FORMAT,
  COMPACT_UTC_FORMAT,
  parseUtcTimestamp,
  formatUtcTimestamp,
  convertUtcTimestamp,
} from './timestamps';
export { buildDateQuery, joinBaseUrlAndQuery, buildRetrievalUrl } from './query';

// ============================================================================
// Types and Errors
// ============================================================================

export type {
  WatchlistClientConfig,
  Credentials,
  Logger,
  HttpTransport,
  RetrievedConfig,
  WatchlistError,
  CredentialErrorReason,
} from './types';

export {
  ApiRequestError,
  WatchlistRequestError,
  ImproperFileFormatError,
  CredentialError,
  WatchlistParseError,
  WatchlistIoError,
} from './types';

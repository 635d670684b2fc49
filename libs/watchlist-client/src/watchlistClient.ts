import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import { buildRetrievalUrl } from './query';
import { packageRetrievedConfig } from './retrieval';
import { mapSubmissionResponse, type RequestSummary } from './submission';
import type {
  Credentials,
  HttpTransport,
  Logger,
  RetrievedConfig,
  WatchlistClientConfig,
  WatchlistParseError,
} from './types';
import { WatchlistIoError, WatchlistRequestError } from './types';

export const DEFAULT_ENDPOINT =
  'https://watchlistapi.icedatavault.icedataservices.com/v1/configurations/watchlists';
const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Watchlist API Client
 *
 * Retrieves the active (or a historically active) source subscription
 * configuration and submits new configuration files. Every call is a single
 * request with Basic authentication; nothing is retried.
 */
export class WatchlistClient {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private readonly transport: HttpTransport;
  private readonly authorization: string;

  constructor(config: WatchlistClientConfig) {
    this.endpoint = config.endpoint ?? DEFAULT_ENDPOINT;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = config.logger;
    this.transport = config.transport ?? ((url, init) => fetch(url, init));
    this.authorization = basicAuthorization(config.credentials);
  }

  /**
   * Retrieve the configuration active at `at`, or the currently active one.
   *
   * @param at - Any timestamp the parser accepts, e.g. `2020-11-18T12:30:52Z`
   */
  retrieveConfig(
    at?: string,
  ): ResultAsync<RetrievedConfig, WatchlistRequestError | WatchlistParseError> {
    return buildRetrievalUrl(this.endpoint, at)
      .asyncAndThen((url) =>
        this.execute(url, { method: 'GET', headers: { Authorization: this.authorization } }).map(
          (response) => ({ url, response }),
        ),
      )
      .andThen(({ url, response }) => packageRetrievedConfig(url, response));
  }

  /**
   * Upload a configuration file as the multipart field `file`.
   *
   * The file is sent as is; run the configuration validator first.
   */
  submitConfig(
    filePath: string,
  ): ResultAsync<RequestSummary, WatchlistRequestError | WatchlistParseError | WatchlistIoError> {
    return ResultAsync.fromPromise(
      readFile(filePath),
      (error) =>
        new WatchlistIoError(
          `Unable to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
          filePath,
        ),
    )
      .andThen((contents) => {
        const form = new FormData();
        form.append('file', new Blob([new Uint8Array(contents)]), path.basename(filePath));
        return this.execute(this.endpoint, {
          method: 'POST',
          headers: { Authorization: this.authorization },
          body: form,
        });
      })
      .andThen(mapSubmissionResponse);
  }

  private execute(url: string, init: RequestInit): ResultAsync<Response, WatchlistRequestError> {
    const method = init.method ?? 'GET';
    this.logger?.debug?.(`[WatchlistClient] ${method} ${url}`);

    const checkStatus = (response: Response): ResultAsync<Response, WatchlistRequestError> => {
      this.logger?.debug?.(`[WatchlistClient] ${method} ${url} -> ${response.status}`);
      if (response.ok) {
        return okAsync(response);
      }
      return ResultAsync.fromSafePromise(safeReadBody(response)).andThen((body) =>
        errAsync(
          new WatchlistRequestError(
            `Watchlist request failed with status ${response.status}`,
            response.status,
            body,
          ),
        ),
      );
    };

    return this.executeHttp(url, init).andThen(checkStatus);
  }

  private executeHttp(url: string, init: RequestInit): ResultAsync<Response, WatchlistRequestError> {
    const toRequestError = (error: unknown) => {
      const message = error instanceof Error ? error.message : 'network error';
      this.logger?.warn?.(`[WatchlistClient] ${init.method ?? 'GET'} ${url} failed: ${message}`);
      return new WatchlistRequestError(`Watchlist request failed: ${message}`, 0);
    };

    if (this.timeoutMs <= 0) {
      return ResultAsync.fromPromise(this.transport(url, init), toRequestError);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    return ResultAsync.fromPromise(
      this.transport(url, { ...init, signal: controller.signal }).finally(() =>
        clearTimeout(timeoutId),
      ),
      toRequestError,
    );
  }
}

function basicAuthorization(credentials: Credentials): string {
  const encoded = Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64');
  return `Basic ${encoded}`;
}

async function safeReadBody(response: Response): Promise<string | undefined> {
  try {
    return await response.text();
  } catch (err) {
    return undefined;
  }
}

/**
 * Factory function to create a Watchlist client with endpoint and timeout
 * read from environment variables
 *
 * - `WATCHLIST_API_ENDPOINT` - API endpoint (default: the production endpoint)
 * - `WATCHLIST_TIMEOUT_MS` - Per-request timeout (default: 30000)
 *
 * @param credentials - Validated Basic auth credentials
 * @param overrides - Config values that take precedence over the environment
 */
export function createWatchlistClient(
  credentials: Credentials,
  overrides: Partial<Omit<WatchlistClientConfig, 'credentials'>> = {},
): WatchlistClient {
  return new WatchlistClient({
    credentials,
    endpoint: overrides.endpoint ?? process.env.WATCHLIST_API_ENDPOINT ?? DEFAULT_ENDPOINT,
    timeoutMs:
      overrides.timeoutMs ??
      parseOptionalNumber(process.env.WATCHLIST_TIMEOUT_MS) ??
      DEFAULT_TIMEOUT_MS,
    logger: overrides.logger,
    transport: overrides.transport,
  });
}

function parseOptionalNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

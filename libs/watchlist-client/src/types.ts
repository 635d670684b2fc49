/**
 * Watchlist API Client Types
 *
 * Configuration, error and record definitions shared by the retrieval and
 * submission paths.
 */

// ============================================================================
// Errors
// ============================================================================

export class ApiRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly responseBody?: string,
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

/** Non-2xx response, or a transport failure (status 0). */
export class WatchlistRequestError extends ApiRequestError {
  readonly kind = 'http' as const;

  constructor(message: string, status: number, responseBody?: string) {
    super(message, status, responseBody);
    this.name = 'WatchlistRequestError';
  }
}

/**
 * Raised by the configuration file validator. `line` is the 0-based record
 * index of the failing row and is absent when the header is at fault.
 */
export class ImproperFileFormatError extends Error {
  readonly kind = 'format' as const;

  constructor(
    message: string,
    public readonly line?: number,
  ) {
    super(message);
    this.name = 'ImproperFileFormatError';
  }
}

export type CredentialErrorReason = 'missing' | 'invalid-type';

export class CredentialError extends Error {
  readonly kind = 'credentials' as const;

  constructor(
    message: string,
    public readonly reason: CredentialErrorReason,
  ) {
    super(message);
    this.name = 'CredentialError';
  }
}

/** Unrecognised timestamp grammar, invalid JSON or an unexpected response shape. */
export class WatchlistParseError extends Error {
  readonly kind = 'parse' as const;

  constructor(message: string) {
    super(message);
    this.name = 'WatchlistParseError';
  }
}

export class WatchlistIoError extends Error {
  readonly kind = 'io' as const;

  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'WatchlistIoError';
  }
}

export type WatchlistError =
  | WatchlistRequestError
  | ImproperFileFormatError
  | CredentialError
  | WatchlistParseError
  | WatchlistIoError;

// ============================================================================
// Client Configuration
// ============================================================================

export interface Logger {
  debug?(msg: string, meta?: unknown): void;
  info?(msg: string, meta?: unknown): void;
  warn?(msg: string, meta?: unknown): void;
  error?(msg: string, meta?: unknown): void;
}

export interface HttpTransport {
  (url: string, init: RequestInit): Promise<Response>;
}

export interface Credentials {
  username: string;
  password: string;
}

export interface WatchlistClientConfig {
  credentials: Credentials;
  endpoint?: string;
  /** Per-request timeout; 0 disables it. */
  timeoutMs?: number;
  logger?: Logger;
  transport?: HttpTransport;
}

// ============================================================================
// Records
// ============================================================================

export interface RetrievedConfig {
  /** `YYYYMMDDTHHMMSSZ` */
  readonly timestamp: string;
  readonly body: Uint8Array;
}

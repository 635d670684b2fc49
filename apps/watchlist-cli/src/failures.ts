import type { WatchlistError } from '@libs/watchlist-client';

export type KnownCauses = Readonly<Record<number, string>>;

export const SUBMIT_ERROR_CAUSES: KnownCauses = {
  400: 'Input CSV file is improperly formatted',
  401: 'Improper credentials',
  500: 'Failed request',
};

export const RETRIEVE_ERROR_CAUSES: KnownCauses = {
  401: 'Improper credentials',
  404: 'No active configuration for the given date and time',
};

/** One-line, user-facing description of a failed command. */
export function describeFailure(error: WatchlistError, knownCauses: KnownCauses = {}): string {
  switch (error.kind) {
    case 'credentials':
      return error.reason === 'missing'
        ? `Missing Credentials Error: ${error.message}`
        : 'Invalid credentials type';
    case 'format':
      return `Invalid Configuration File: ${error.message}`;
    case 'http': {
      if (error.status === 0) {
        return `Request failed: ${error.message}`;
      }
      const cause = knownCauses[error.status];
      return cause ? `HTTP ${error.status}: ${cause}` : `HTTP ${error.status}`;
    }
    case 'parse':
      return `Unexpected response: ${error.message}`;
    case 'io':
      return error.message;
  }
}

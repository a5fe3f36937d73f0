import type { MovieEntry } from './snapshot.js';
import type { Result } from './result.js';

/**
 * 設定ファイルの映画館エントリ
 */
export interface TheaterConfig {
  name: string;
  location?: string | undefined;
}

/**
 * What the fetcher returns for a single theater query.
 */
export interface TheaterListing {
  address: string | null;
  movies: MovieEntry[];
}

/**
 * Fetch error types.
 */
export type FetchError =
  | { type: 'http_error'; status: number; message: string }
  | { type: 'api_error'; message: string }
  | { type: 'network_error'; message: string }
  | { type: 'unexpected'; message: string };

export type FetchOne = (theater: TheaterConfig) => Promise<Result<TheaterListing, FetchError>>;

export function describeFetchError(error: FetchError): string {
  switch (error.type) {
    case 'http_error':
      return `HTTP ${error.status}: ${error.message}`;
    case 'api_error':
      return `API error: ${error.message}`;
    case 'network_error':
      return `Network error: ${error.message}`;
    case 'unexpected':
      return error.message;
  }
}

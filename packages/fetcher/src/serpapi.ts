import axios, { type AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import {
  ok,
  err,
  type FetchError,
  type Result,
  type TheaterConfig,
  type TheaterListing,
} from '@showtime-console/shared';
import { extractApiError, normalizeShowtimes } from './normalize.js';

export const SERP_ENDPOINT = 'https://serpapi.com/search.json';
const USER_AGENT = 'MovieShowtimes-Console/1.1';

/**
 * フェッチャー設定
 */
export interface SerpApiFetcherOptions {
  apiKey: string;
  hl: string;
  gl: string;
  timeoutMs?: number;
  signal?: AbortSignal | undefined;
  logger?: Logger;
}

export interface ShowtimeFetcher {
  fetchTheater(theater: TheaterConfig): Promise<Result<TheaterListing, FetchError>>;
}

const DEFAULT_TIMEOUT_MS = 15_000;

function toFetchError(error: unknown): FetchError {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      const apiMessage = extractApiError(error.response.data);
      return {
        type: 'http_error',
        status: error.response.status,
        message: apiMessage ?? error.message,
      };
    }
    return { type: 'network_error', message: error.message };
  }
  return { type: 'unexpected', message: error instanceof Error ? error.message : String(error) };
}

/**
 * SerpAPIで映画館の上映スケジュールを検索するフェッチャーを作成する
 */
export function createSerpApiFetcher(
  options: SerpApiFetcherOptions,
  client?: AxiosInstance
): ShowtimeFetcher {
  const http =
    client ??
    axios.create({
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      headers: { 'User-Agent': USER_AGENT },
    });

  return {
    async fetchTheater(theater: TheaterConfig): Promise<Result<TheaterListing, FetchError>> {
      const params: Record<string, string> = {
        q: theater.name,
        hl: options.hl,
        gl: options.gl,
        api_key: options.apiKey,
      };
      if (theater.location) {
        params.location = theater.location;
      }

      options.logger?.debug({ theater: theater.name, location: theater.location }, 'querying SerpAPI');

      let payload: unknown;
      try {
        const response = await http.get<unknown>(SERP_ENDPOINT, { params, signal: options.signal });
        payload = response.data;
      } catch (error) {
        return err(toFetchError(error));
      }

      const apiError = extractApiError(payload);
      if (apiError) {
        return err({ type: 'api_error', message: apiError });
      }

      return ok(normalizeShowtimes(payload));
    },
  };
}

// @showtime-console/fetcher
// SerpAPI showtime search client

export { createSerpApiFetcher, SERP_ENDPOINT } from './serpapi.js';
export type { SerpApiFetcherOptions, ShowtimeFetcher } from './serpapi.js';
export {
  normalizeShowtimes,
  detectPremiumFormat,
  extractApiError,
  MAX_SHOWTIMES_PER_MOVIE,
} from './normalize.js';

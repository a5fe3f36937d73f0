import { z } from 'zod';
import type { MovieEntry, TheaterListing } from '@showtime-console/shared';

/** 1作品あたりの表示上限 */
export const MAX_SHOWTIMES_PER_MOVIE = 8;

/**
 * Premium format detection patterns
 */
const PREMIUM_FORMAT_PATTERNS: Array<{ pattern: RegExp; format: string }> = [
  { pattern: /IMAX/i, format: 'IMAX' },
  { pattern: /Dolby\s*Cinema/i, format: 'DOLBY_CINEMA' },
  { pattern: /Dolby[\s-]*Atmos/i, format: 'DOLBY_ATMOS' },
  { pattern: /SCREEN\s*X/i, format: 'SCREENX' },
  { pattern: /4DX|MX4D/i, format: '4DX' },
  { pattern: /\bRPX\b/i, format: 'RPX' },
  { pattern: /\b3D\b/i, format: '3D' },
];

/**
 * Detects premium format from a showtime label
 */
export function detectPremiumFormat(text: string): string | null {
  for (const { pattern, format } of PREMIUM_FORMAT_PATTERNS) {
    if (pattern.test(text)) {
      return format;
    }
  }
  return null;
}

// SerpAPI returns a handful of alternative field names depending on the query.
const TimeBlockSchema = z.union([
  z.string(),
  z.object({
    time: z.union([z.string(), z.array(z.string())]).optional(),
    start_time: z.string().optional(),
    start: z.string().optional(),
    type: z.string().optional(),
    format: z.string().optional(),
    ticket_type: z.string().optional(),
  }),
]);

const MovieSchema = z.object({
  title: z.string().optional(),
  name: z.string().optional(),
  film_name: z.string().optional(),
  rating: z.string().optional(),
  showtimes: z.array(z.unknown()).optional(),
  times: z.array(z.unknown()).optional(),
  showing: z.array(z.unknown()).optional(),
});

const DaySchema = z.object({
  address: z.string().optional(),
  address_line: z.string().optional(),
  full_address: z.string().optional(),
  movies: z.array(z.unknown()).optional(),
  showing: z.array(z.unknown()).optional(),
});

const PayloadSchema = z.object({
  error: z.string().optional(),
  showtimes: z.array(z.unknown()).optional(),
});

/**
 * APIレスポンスのエラーメッセージを取り出す
 */
export function extractApiError(payload: unknown): string | null {
  const parsed = PayloadSchema.safeParse(payload);
  return parsed.success ? (parsed.data.error ?? null) : null;
}

function normalizeTimes(blocks: unknown[]): { showtimes: string[]; formats: string[] } {
  const showtimes: string[] = [];
  const formats = new Set<string>();

  for (const block of blocks) {
    const parsed = TimeBlockSchema.safeParse(block);
    if (!parsed.success) continue;

    if (typeof parsed.data === 'string') {
      showtimes.push(parsed.data);
      continue;
    }

    const { time, start_time, start, type, format, ticket_type } = parsed.data;
    const value = time ?? start_time ?? start;
    const times = Array.isArray(value) ? value : value ? [value] : [];
    const label = type ?? format ?? ticket_type;

    if (label) {
      const premium = detectPremiumFormat(label);
      if (premium) formats.add(premium);
    }
    for (const t of times) {
      if (!t) continue;
      showtimes.push(label ? `${t} (${label})` : t);
    }
  }

  return { showtimes: showtimes.slice(0, MAX_SHOWTIMES_PER_MOVIE), formats: [...formats] };
}

function normalizeMovie(raw: unknown): MovieEntry | null {
  const parsed = MovieSchema.safeParse(raw);
  if (!parsed.success) return null;

  const movie = parsed.data;
  const { showtimes, formats } = normalizeTimes(movie.showtimes ?? movie.times ?? movie.showing ?? []);

  return {
    title: movie.title || movie.name || movie.film_name || '(title unknown)',
    rating: movie.rating ?? null,
    formats,
    showtimes,
  };
}

/**
 * SerpAPIのレスポンスを上映情報に正規化する
 * 当日分（先頭エントリ）のみを対象とする
 */
export function normalizeShowtimes(payload: unknown): TheaterListing {
  const parsed = PayloadSchema.safeParse(payload);
  const today = parsed.success ? parsed.data.showtimes?.[0] : undefined;
  const day = DaySchema.safeParse(today ?? {});
  if (!day.success) {
    return { address: null, movies: [] };
  }

  let rawMovies: unknown[] = day.data.movies ?? day.data.showing ?? [];
  // Some responses nest the day's movies one level deeper.
  const first = rawMovies[0];
  if (Array.isArray(first)) {
    rawMovies = first;
  }

  const movies: MovieEntry[] = [];
  for (const raw of rawMovies) {
    const movie = normalizeMovie(raw);
    if (movie) movies.push(movie);
  }

  return {
    address: day.data.address || day.data.address_line || day.data.full_address || null,
    movies,
  };
}

import { z } from 'zod';

/**
 * 1作品分の上映情報
 */
export const MovieEntrySchema = z.object({
  title: z.string(),
  rating: z.string().nullable().default(null),
  formats: z.array(z.string()).default([]),
  showtimes: z.array(z.string()),
});

export type MovieEntry = z.infer<typeof MovieEntrySchema>;

/**
 * 映画館ごとの取得結果
 */
export const TheaterResultSchema = z.object({
  name: z.string(),
  location: z.string().nullable().default(null),
  address: z.string().nullable().default(null),
  movies: z.array(MovieEntrySchema),
});

export type TheaterResult = z.infer<typeof TheaterResultSchema>;

/**
 * Cached showtimes for every configured theater on one UTC day.
 */
export const CacheSnapshotSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  theaters: z.array(TheaterResultSchema),
});

export type CacheSnapshot = z.infer<typeof CacheSnapshotSchema>;

import { z } from 'zod';

export const RATING_MIN = 1;
export const RATING_MAX = 5;
export const DEFAULT_PER_PAGE = 10;
export const MAX_PER_PAGE = 100;

// Audio feature columns, in table order
export const AUDIO_FEATURE_COLUMNS = [
  'danceability',
  'energy',
  'key',
  'loudness',
  'mode',
  'acousticness',
  'instrumentalness',
  'liveness',
  'valence',
  'tempo',
  'duration_ms',
  'time_signature',
  'num_bars',
  'num_sections',
  'num_segments',
  'class',
] as const;

// Rating Schema
export const RatingValueSchema = z.number().int().min(RATING_MIN).max(RATING_MAX);

export const RatingRequestSchema = z.object({
  rating: RatingValueSchema,
});

// Query Schemas (query strings arrive as text)
export const SongListQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(MAX_PER_PAGE).default(DEFAULT_PER_PAGE),
});

export const SongSearchQuerySchema = z.object({
  title: z.string().min(1),
});

export const SongIdSchema = z.string().trim().min(1).max(255);

// Ingestion Schema: attribute name -> stringified row index -> value
export const ColumnValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ColumnarSongExportSchema = z.record(
  z.string(),
  z.record(z.string(), ColumnValueSchema),
);

// WebSocket Schemas
export const RatingSubscriptionSchema = z.object({
  songId: SongIdSchema,
});

// Export type inference helpers
export type RatingRequestInput = z.infer<typeof RatingRequestSchema>;
export type SongListQueryInput = z.infer<typeof SongListQuerySchema>;
export type SongSearchQueryInput = z.infer<typeof SongSearchQuerySchema>;
export type ColumnValue = z.infer<typeof ColumnValueSchema>;
export type ColumnarSongExport = z.infer<typeof ColumnarSongExportSchema>;
export type RatingSubscriptionInput = z.infer<typeof RatingSubscriptionSchema>;

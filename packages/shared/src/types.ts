import type { ColumnValue } from './schemas';

// Song Types
export interface AudioFeatures {
  danceability: number | null;
  energy: number | null;
  key: number | null;
  loudness: number | null;
  mode: number | null;
  acousticness: number | null;
  instrumentalness: number | null;
  liveness: number | null;
  valence: number | null;
  tempo: number | null;
  duration_ms: number | null;
  time_signature: number | null;
  num_bars: number | null;
  num_sections: number | null;
  num_segments: number | null;
  class: number | null;
}

export type AudioFeatureColumn = keyof AudioFeatures;

export interface Song extends AudioFeatures {
  id: string;
  title: string | null;
  current_rating: number | null; // null until the first rating
}

export interface PaginatedSongs {
  items: Song[];
  total: number;
  page: number;
  per_page: number;
  total_pages: number;
}

// Rating Types
export interface RatingSummary {
  song_id: string;
  average_rating: number;
  total_ratings: number;
}

// Ingestion Types
export type NormalizedSongRecord = Record<string, ColumnValue> & {
  current_rating: null;
};

export interface IngestionResult {
  inserted: number;
  skipped: number;
}

// WebSocket Event Types
export type RatingUpdateEvent = RatingSummary & {
  updatedAt: string;
};

// API Response Types
export interface HealthResponse {
  status: 'healthy';
  message: string;
}

export interface ApiInfoResponse {
  message: string;
  version: string;
  endpoints: Record<string, string>;
}

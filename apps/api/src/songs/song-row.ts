import { AUDIO_FEATURE_COLUMNS, Song } from '@playlist-api/shared';

// Mapped alias: pg row types need an implicit index signature, which interfaces lack
export type SongRow = { [K in keyof Song]: Song[K] };

export const SONG_COLUMNS = ['id', 'title', ...AUDIO_FEATURE_COLUMNS, 'current_rating'] as const;

// Identifiers are quoted: "key", "mode" and "class" are SQL keywords
export const SONG_SELECT = SONG_COLUMNS.map((column) => `"${column}"`).join(', ');

export function mapRowToSong(row: SongRow): Song {
  return {
    id: row.id,
    title: row.title,
    danceability: row.danceability,
    energy: row.energy,
    key: row.key,
    loudness: row.loudness,
    mode: row.mode,
    acousticness: row.acousticness,
    instrumentalness: row.instrumentalness,
    liveness: row.liveness,
    valence: row.valence,
    tempo: row.tempo,
    duration_ms: row.duration_ms,
    time_signature: row.time_signature,
    num_bars: row.num_bars,
    num_sections: row.num_sections,
    num_segments: row.num_segments,
    class: row.class,
    current_rating: row.current_rating,
  };
}

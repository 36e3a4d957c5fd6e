import { Injectable, Logger } from '@nestjs/common';
import { RatingSummary, RatingValueSchema, SongIdSchema } from '@playlist-api/shared';
import { DatabaseService, Queryable } from '../config/database.service';
import { NotFoundError } from '../common/errors';
import { parseInput } from '../common/validation';

type RatingTotals = {
  sum: number;
  count: number;
};

type SongRatingTotals = {
  id: string;
  sum: number;
  count: number;
};

type LockedSong = {
  id: string;
  current_rating: number | null;
};

export interface ReconcileResult {
  song_id: string;
  current_rating: number | null;
  changed: boolean;
}

export function roundRating(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/** Mean of the logged values rounded to 2 places, or null with no ratings. */
export function averageOf({ sum, count }: RatingTotals): number | null {
  return count === 0 ? null : roundRating(sum / count);
}

@Injectable()
export class RatingsService {
  private readonly logger = new Logger(RatingsService.name);

  constructor(private db: DatabaseService) {}

  /**
   * Appends a rating event and refreshes the song's cached average in one
   * transaction. The song row lock serializes submissions for the same song.
   */
  async submitRating(songId: string, value: unknown): Promise<RatingSummary> {
    const rating = parseInput(
      RatingValueSchema,
      value,
      'Rating must be an integer between 1 and 5',
    );
    const id = parseInput(SongIdSchema, songId, 'Invalid song id');

    const summary = await this.db.transaction(async (tx) => {
      await this.lockSong(tx, id);

      await tx.query('INSERT INTO rating_events (song_id, value) VALUES ($1, $2)', [
        id,
        rating,
      ]);

      // Recompute from the full log, never from the cached value
      const totals = await this.readTotals(tx, id);
      const average = averageOf(totals);

      await tx.query('UPDATE songs SET current_rating = $2 WHERE id = $1', [id, average]);

      return {
        song_id: id,
        average_rating: average ?? 0,
        total_ratings: totals.count,
      };
    });

    this.logger.log(
      `Song ${id} rated ${rating}: average ${summary.average_rating} over ${summary.total_ratings}`,
    );

    return summary;
  }

  async getRating(songId: string): Promise<RatingSummary> {
    const id = parseInput(SongIdSchema, songId, 'Invalid song id');

    // Existence and totals in one statement, so one snapshot
    const row = await this.db.queryOne<SongRatingTotals>(
      `SELECT s.id,
              COALESCE(SUM(r.value), 0)::float8 AS sum,
              COUNT(r.id)::int AS count
       FROM songs s
       LEFT JOIN rating_events r ON r.song_id = s.id
       WHERE s.id = $1
       GROUP BY s.id`,
      [id],
    );

    if (!row) {
      throw new NotFoundError('Song', id);
    }

    return {
      song_id: row.id,
      average_rating: averageOf(row) ?? 0,
      total_ratings: row.count,
    };
  }

  /** Rebuilds one song's cached average from its rating log. */
  async reconcileAggregate(songId: string): Promise<ReconcileResult> {
    const id = parseInput(SongIdSchema, songId, 'Invalid song id');

    return this.db.transaction(async (tx) => {
      const stored = await this.lockSong(tx, id);
      const expected = averageOf(await this.readTotals(tx, id));
      const changed = stored.current_rating !== expected;

      if (changed) {
        await tx.query('UPDATE songs SET current_rating = $2 WHERE id = $1', [id, expected]);
        this.logger.warn(
          `Repaired rating cache for song ${id}: ${stored.current_rating} -> ${expected}`,
        );
      }

      return { song_id: id, current_rating: expected, changed };
    });
  }

  /**
   * Finds songs whose cached average disagrees with their log and repairs
   * each under its own row lock. Returns the number of songs repaired.
   */
  async reconcileAll(): Promise<number> {
    const drifted = await this.db.query<{ id: string }>(
      `SELECT s.id
       FROM songs s
       LEFT JOIN rating_events r ON r.song_id = s.id
       GROUP BY s.id, s.current_rating
       HAVING s.current_rating IS DISTINCT FROM ROUND(AVG(r.value)::numeric, 2)::float8
       ORDER BY s.id`,
    );

    let repaired = 0;
    for (const { id } of drifted) {
      const result = await this.reconcileAggregate(id);
      if (result.changed) repaired++;
    }

    this.logger.log(`Reconciled ${drifted.length} drifted songs, repaired ${repaired}`);
    return repaired;
  }

  private async lockSong(tx: Queryable, id: string): Promise<LockedSong> {
    const song = await tx.queryOne<LockedSong>(
      'SELECT id, current_rating FROM songs WHERE id = $1 FOR UPDATE',
      [id],
    );

    if (!song) {
      throw new NotFoundError('Song', id);
    }

    return song;
  }

  private async readTotals(tx: Queryable, id: string): Promise<RatingTotals> {
    const totals = await tx.queryOne<RatingTotals>(
      `SELECT COALESCE(SUM(value), 0)::float8 AS sum, COUNT(*)::int AS count
       FROM rating_events
       WHERE song_id = $1`,
      [id],
    );

    return totals ?? { sum: 0, count: 0 };
  }
}

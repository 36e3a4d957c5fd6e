import { Injectable, Logger } from '@nestjs/common';
import {
  PaginatedSongs,
  Song,
  SongIdSchema,
  SongListQuerySchema,
  SongSearchQuerySchema,
} from '@playlist-api/shared';
import { DatabaseService } from '../config/database.service';
import { NotFoundError } from '../common/errors';
import { parseInput } from '../common/validation';
import { escapeLikePattern, pageOffset, totalPages } from './pagination';
import { SONG_SELECT, SongRow, mapRowToSong } from './song-row';

@Injectable()
export class SongsService {
  private readonly logger = new Logger(SongsService.name);

  constructor(private db: DatabaseService) {}

  async listSongs(page: number, perPage: number): Promise<PaginatedSongs> {
    const query = parseInput(
      SongListQuerySchema,
      { page, per_page: perPage },
      'Invalid pagination parameters',
    );
    const offset = pageOffset(query.page, query.per_page);

    // Count and page from one snapshot so total and items agree
    const { total, rows } = await this.db.transaction(
      async (tx) => {
        const count = await tx.queryOne<{ total: number }>(
          'SELECT COUNT(*)::int AS total FROM songs',
        );
        const total = count?.total ?? 0;
        // past the end; an offset this large may not even fit a bigint
        if (offset >= total) {
          return { total, rows: [] };
        }

        const rows = await tx.query<SongRow>(
          `SELECT ${SONG_SELECT}
           FROM songs
           ORDER BY title ASC, id ASC
           LIMIT $1 OFFSET $2`,
          [query.per_page, offset],
        );
        return { total, rows };
      },
      { isolation: 'REPEATABLE READ', readOnly: true },
    );

    return {
      items: rows.map(mapRowToSong),
      total,
      page: query.page,
      per_page: query.per_page,
      total_pages: totalPages(total, query.per_page),
    };
  }

  async searchByTitle(title: string): Promise<Song[]> {
    const query = parseInput(SongSearchQuerySchema, { title }, 'Search title is required');

    const rows = await this.db.query<SongRow>(
      `SELECT ${SONG_SELECT}
       FROM songs
       WHERE title ILIKE $1 ESCAPE '\\'
       ORDER BY title ASC, id ASC`,
      [`%${escapeLikePattern(query.title)}%`],
    );

    this.logger.debug(`Search "${query.title}" matched ${rows.length} songs`);
    return rows.map(mapRowToSong);
  }

  async findById(id: string): Promise<Song> {
    const songId = parseInput(SongIdSchema, id, 'Invalid song id');
    const row = await this.db.queryOne<SongRow>(
      `SELECT ${SONG_SELECT} FROM songs WHERE id = $1`,
      [songId],
    );

    if (!row) {
      throw new NotFoundError('Song', songId);
    }

    return mapRowToSong(row);
  }
}

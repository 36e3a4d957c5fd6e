import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiQuery } from '@nestjs/swagger';
import {
  PaginatedSongs,
  Song,
  SongListQuerySchema,
  SongSearchQuerySchema,
} from '@playlist-api/shared';
import { SongsService } from './songs.service';
import { parseInput } from '../common/validation';

@ApiTags('songs')
@Controller('songs')
export class SongsController {
  constructor(private songsService: SongsService) {}

  @Get()
  @ApiOperation({ summary: 'List songs ordered by title, one page at a time' })
  @ApiQuery({ name: 'page', required: false, type: Number })
  @ApiQuery({ name: 'per_page', required: false, type: Number })
  async listSongs(
    @Query('page') page?: string,
    @Query('per_page') perPage?: string,
  ): Promise<PaginatedSongs> {
    const query = parseInput(
      SongListQuerySchema,
      { page, per_page: perPage },
      'Invalid pagination parameters',
    );
    return this.songsService.listSongs(query.page, query.per_page);
  }

  // Declared before :id so "search" is not taken for a song id
  @Get('search')
  @ApiOperation({ summary: 'Case-insensitive substring search over song titles' })
  @ApiQuery({ name: 'title', required: true, type: String })
  async searchSongs(@Query('title') title?: string): Promise<Song[]> {
    const query = parseInput(SongSearchQuerySchema, { title }, 'Search title is required');
    return this.songsService.searchByTitle(query.title);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a single song with all attributes' })
  async findOne(@Param('id') id: string): Promise<Song> {
    return this.songsService.findById(id);
  }
}

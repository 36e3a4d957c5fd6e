import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation } from '@nestjs/swagger';
import { ApiInfoResponse, HealthResponse } from '@playlist-api/shared';

export const API_VERSION = '1.0.0';

@ApiTags('health')
@Controller()
export class HealthController {
  @Get()
  @ApiOperation({ summary: 'API information' })
  getInfo(): ApiInfoResponse {
    return {
      message: 'Playlist API',
      version: API_VERSION,
      endpoints: {
        list_songs: '/songs',
        search_songs: '/songs/search',
        get_song: '/songs/{song_id}',
        rate_song: '/songs/{song_id}/rate',
        get_song_rating: '/songs/{song_id}/rating',
      },
    };
  }

  @Get('health')
  @ApiOperation({ summary: 'Liveness check' })
  check(): HealthResponse {
    return { status: 'healthy', message: 'API is running' };
  }
}

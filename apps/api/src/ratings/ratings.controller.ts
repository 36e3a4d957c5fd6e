import { Controller, Get, Post, Body, Param, HttpCode, HttpStatus } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiBody } from '@nestjs/swagger';
import { RatingRequestSchema, RatingSummary } from '@playlist-api/shared';
import { RatingsService } from './ratings.service';
import { RatingsGateway } from './ratings.gateway';
import { parseInput } from '../common/validation';

@ApiTags('ratings')
@Controller('songs')
export class RatingsController {
  constructor(
    private ratingsService: RatingsService,
    private ratingsGateway: RatingsGateway,
  ) {}

  @Post(':id/rate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Rate a song with 1 to 5 stars' })
  @ApiBody({
    schema: {
      type: 'object',
      required: ['rating'],
      properties: { rating: { type: 'integer', minimum: 1, maximum: 5 } },
    },
  })
  async rateSong(@Param('id') id: string, @Body() body: unknown): Promise<RatingSummary> {
    const validated = parseInput(
      RatingRequestSchema,
      body,
      'Rating must be an integer between 1 and 5',
    );

    const summary = await this.ratingsService.submitRating(id, validated.rating);

    this.ratingsGateway.broadcastRatingUpdate(summary);

    return summary;
  }

  @Get(':id/rating')
  @ApiOperation({ summary: 'Get the average rating and rating count of a song' })
  async getRating(@Param('id') id: string): Promise<RatingSummary> {
    return this.ratingsService.getRating(id);
  }
}

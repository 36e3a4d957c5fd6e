import { Module } from '@nestjs/common';
import { RatingsService } from './ratings.service';
import { RatingsController } from './ratings.controller';
import { RatingsGateway } from './ratings.gateway';

@Module({
  providers: [RatingsService, RatingsGateway],
  controllers: [RatingsController],
  exports: [RatingsService],
})
export class RatingsModule {}

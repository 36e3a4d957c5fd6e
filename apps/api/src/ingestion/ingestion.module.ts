import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { RatingsModule } from '../ratings/ratings.module';
import { IngestionService } from './ingestion.service';

@Module({
  imports: [ConfigModule, RatingsModule],
  providers: [IngestionService],
  exports: [IngestionService],
})
export class IngestionModule {}

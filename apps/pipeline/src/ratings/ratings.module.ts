import { Module } from '@nestjs/common';
import { RunsModule } from '../runs/runs.module';
import { ImdbPublicService } from './imdb-public.service';
import { SEEN_INDEX_LOADER } from './ratings.types';
import { SeenIndexService } from './seen-index.service';

@Module({
  imports: [RunsModule],
  providers: [
    ImdbPublicService,
    SeenIndexService,
    { provide: SEEN_INDEX_LOADER, useExisting: SeenIndexService },
  ],
  exports: [SEEN_INDEX_LOADER, SeenIndexService],
})
export class RatingsModule {}

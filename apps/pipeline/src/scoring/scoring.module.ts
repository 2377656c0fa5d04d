import { Module } from '@nestjs/common';
import { ScoringService } from './scoring.service';
import { ITEM_SCORER_FACTORY } from './scoring.types';

@Module({
  providers: [
    ScoringService,
    { provide: ITEM_SCORER_FACTORY, useExisting: ScoringService },
  ],
  exports: [ITEM_SCORER_FACTORY],
})
export class ScoringModule {}

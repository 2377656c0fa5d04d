import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { RatingsModule } from '../ratings/ratings.module';
import { RunsModule } from '../runs/runs.module';
import { ScoringModule } from '../scoring/scoring.module';
import { SettingsModule } from '../settings/settings.module';
import { PipelineScheduler } from './pipeline.scheduler';
import { PipelineService } from './pipeline.service';

@Module({
  imports: [SettingsModule, RunsModule, CatalogModule, RatingsModule, ScoringModule],
  providers: [PipelineService, PipelineScheduler],
  exports: [PipelineService, PipelineScheduler],
})
export class PipelineModule {}

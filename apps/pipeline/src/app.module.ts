import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { PipelineModule } from './pipeline/pipeline.module';
import { RunsModule } from './runs/runs.module';
import { SettingsModule } from './settings/settings.module';

@Module({
  imports: [ScheduleModule.forRoot(), SettingsModule, RunsModule, PipelineModule],
})
export class AppModule {}

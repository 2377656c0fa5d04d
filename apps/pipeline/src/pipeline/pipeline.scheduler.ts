import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { CronJob } from 'cron';
import { errToMessage } from '../errors';
import { PipelineService } from './pipeline.service';

export const PIPELINE_CRON_JOB = 'pipeline:daily';

@Injectable()
export class PipelineScheduler implements OnModuleDestroy {
  private readonly logger = new Logger(PipelineScheduler.name);

  constructor(
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly pipeline: PipelineService,
  ) {}

  /** Registers (or replaces) the daily job. Throws on an invalid cron expression. */
  start(params: { cron: string; timezone?: string | null }): CronJob {
    this.stop();

    const job = new CronJob(
      params.cron,
      () => {
        void this.tick();
      },
      null,
      false,
      params.timezone ?? undefined,
    );

    this.schedulerRegistry.addCronJob(PIPELINE_CRON_JOB, job);
    job.start();
    this.logger.log(
      `Scheduled pipeline cron=${params.cron} tz=${params.timezone ?? 'local'}`,
    );
    return job;
  }

  stop() {
    if (!this.schedulerRegistry.doesExist('cron', PIPELINE_CRON_JOB)) return;
    this.schedulerRegistry.deleteCronJob(PIPELINE_CRON_JOB);
  }

  onModuleDestroy() {
    this.stop();
  }

  /**
   * One scheduled invocation. Never rejects: an overlapping tick is skipped
   * and failures are logged.
   */
  async tick(): Promise<void> {
    if (this.pipeline.isRunning()) {
      this.logger.warn('Skipping scheduled run; previous run still in progress');
      return;
    }
    try {
      const res = await this.pipeline.run({ trigger: 'schedule' });
      this.logger.log(`Scheduled run finished runDir=${res.runDir}`);
    } catch (err) {
      this.logger.error(`Scheduled run failed: ${errToMessage(err)}`);
    }
  }
}

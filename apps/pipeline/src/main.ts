#!/usr/bin/env node
import 'reflect-metadata';
import { Logger, type INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ensureBootstrapEnv } from './bootstrap-env';
import { errToMessage, PipelineFatalError } from './errors';
import { PipelineLogger } from './logs/pipeline-logger';
import { PipelineScheduler } from './pipeline/pipeline.scheduler';
import { PipelineService } from './pipeline/pipeline.service';
import { RunPointerAccessor } from './runs/run-pointer.accessor';
import { SettingsService } from './settings/settings.service';

export const CLI_COMMANDS = ['run', 'schedule', 'latest'] as const;
export type CliCommand = (typeof CLI_COMMANDS)[number];

export function parseCommand(argv: readonly string[]): CliCommand | null {
  const raw = (argv[0] ?? 'run').trim().toLowerCase();
  return CLI_COMMANDS.find((c) => c === raw) ?? null;
}

async function runOnce(app: INestApplicationContext, logger: Logger) {
  const res = await app.get(PipelineService).run({ trigger: 'manual' });
  logger.log(
    `Run complete: ${res.runDir} (latest=${res.latest.mode}, discovered=${res.counts.discovered}, above_cut=${res.counts.aboveCut})`,
  );
}

async function printLatest(app: INestApplicationContext) {
  const options = await app.get(SettingsService).resolveOptions();
  const pointers = app.get(RunPointerAccessor);
  const latest = await pointers.resolveLatest(options.outDir);
  const lastRunDir = await pointers.readLastRunDir(options.outDir);
  console.log(
    JSON.stringify(
      {
        outDir: options.outDir,
        latest,
        lastRunDir,
      },
      null,
      2,
    ),
  );
}

async function schedule(app: INestApplicationContext, logger: Logger) {
  const options = await app.get(SettingsService).resolveOptions();
  app.get(PipelineScheduler).start({
    cron: options.cron,
    timezone: options.timezone,
  });

  await new Promise<void>((resolve) => {
    const shutdown = (signal: string) => {
      logger.log(`Received ${signal}; stopping scheduler`);
      resolve();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
}

async function main() {
  const bootstrapLogger = new Logger('Bootstrap');
  const command = parseCommand(process.argv.slice(2));
  if (!command) {
    bootstrapLogger.error(
      `Unknown command "${process.argv[2] ?? ''}". Expected one of: ${CLI_COMMANDS.join(', ')}`,
    );
    process.exitCode = 2;
    return;
  }

  const { dataDir } = await ensureBootstrapEnv();
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: new PipelineLogger(),
  });
  bootstrapLogger.debug(`command=${command} dataDir=${dataDir}`);

  try {
    if (command === 'run') await runOnce(app, bootstrapLogger);
    else if (command === 'latest') await printLatest(app);
    else await schedule(app, bootstrapLogger);
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  void main().catch((err: unknown) => {
    const logger = new Logger('Bootstrap');
    if (err instanceof PipelineFatalError) {
      logger.error(`${err.name}: ${errToMessage(err)}`);
    } else {
      logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
    }
    process.exitCode = 1;
  });
}

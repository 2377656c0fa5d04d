import { ConflictException, Inject, Injectable, Logger } from '@nestjs/common';
import { join } from 'node:path';
import { ARTIFACTS } from '../app.constants';
import {
  CATALOG_PROVIDER,
  type CandidateItem,
  type CatalogDiscoverResult,
  type CatalogProvider,
} from '../catalog/catalog.types';
import { errToMessage } from '../errors';
import { RUN_LOG_CONTEXT } from '../logs/pipeline-logger';
import {
  attachRunLog,
  detachRunLog,
  RunLog,
  type JsonObject,
  type RunLogLevel,
} from '../logs/run-log';
import {
  SEEN_INDEX_LOADER,
  type SeenIndexLoader,
  type SeenIndexLoadResult,
} from '../ratings/ratings.types';
import { filterUnseen, SeenIndex } from '../ratings/seen-index';
import { writeJsonArtifact, writeTextArtifact } from '../runs/artifact-writer';
import { FS_OPS, type FsOps } from '../runs/fs-ops';
import { LatestPointerService } from '../runs/latest-pointer.service';
import { RunDirectoryService } from '../runs/run-directory.service';
import { RunPointerAccessor } from '../runs/run-pointer.accessor';
import { rankItems } from '../scoring/scoring.service';
import {
  ITEM_SCORER_FACTORY,
  type ItemScorerFactory,
  type RankedItem,
} from '../scoring/scoring.types';
import { redactOptions, type PipelineOptions } from '../settings/pipeline-options';
import { SettingsService } from '../settings/settings.service';
import type {
  PipelineContext,
  PipelineCounts,
  PipelineRunResult,
  PipelineRunTrigger,
} from './pipeline.types';
import { buildRunReport } from './run-report';
import { runStage, skipStage, toOutcome } from './stage-result';
import { formatCountsLine, renderSummaryMarkdown } from './summary';

function emptySeenIndex(query: PipelineOptions): SeenIndexLoadResult {
  return {
    index: new SeenIndex(),
    sources: {
      csvPath: query.ratingsCsvPath,
      csvFound: false,
      csvRowsUsed: 0,
      publicIds: 0,
      publicError: null,
    },
  };
}

@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);
  private running = false;

  constructor(
    private readonly settings: SettingsService,
    private readonly runDirs: RunDirectoryService,
    private readonly latestPointer: LatestPointerService,
    private readonly pointers: RunPointerAccessor,
    @Inject(CATALOG_PROVIDER) private readonly catalog: CatalogProvider,
    @Inject(SEEN_INDEX_LOADER) private readonly seenIndex: SeenIndexLoader,
    @Inject(ITEM_SCORER_FACTORY) private readonly scorers: ItemScorerFactory,
    @Inject(FS_OPS) private readonly fs: FsOps,
  ) {}

  isRunning(): boolean {
    return this.running;
  }

  /**
   * One invocation: a fresh run directory, every artifact, then `latest`.
   * Only `RunDirectoryError` and `LatestPointerError` escape; collaborator
   * failures degrade their stage.
   */
  async run(params: {
    trigger: PipelineRunTrigger;
    now?: Date;
    options?: PipelineOptions;
  }): Promise<PipelineRunResult> {
    if (this.running) {
      throw new ConflictException('Pipeline already running');
    }
    this.running = true;

    try {
      const settings = params.options
        ? { options: params.options, issues: [] }
        : await this.settings.resolve();
      return await this.execute({
        trigger: params.trigger,
        now: params.now ?? new Date(),
        options: settings.options,
        settingsIssues: settings.issues,
      });
    } finally {
      this.running = false;
    }
  }

  private async execute(params: {
    trigger: PipelineRunTrigger;
    now: Date;
    options: PipelineOptions;
    settingsIssues: string[];
  }): Promise<PipelineRunResult> {
    const { trigger, now, options } = params;

    const allocated = await this.runDirs.allocate({ outDir: options.outDir, now });
    const runDir = allocated.path;
    const runLog = new RunLog(join(runDir, ARTIFACTS.runLog), this.fs);
    attachRunLog(runLog);

    const runLogger = new Logger(RUN_LOG_CONTEXT);
    const log = (level: RunLogLevel, message: string, context?: JsonObject) => {
      runLog.write(level, message, context ?? null);
      const line = `[${allocated.name}] ${message}`;
      if (level === 'error') runLogger.error(line);
      else if (level === 'warn') runLogger.warn(line);
      else if (level === 'debug') runLogger.debug(line);
      else runLogger.log(line);
    };

    const ctx: PipelineContext = {
      runId: allocated.name,
      runDir,
      trigger,
      startedAt: now,
      options,
      log,
      debug: (m, c) => log('debug', m, c),
      info: (m, c) => log('info', m, c),
      warn: (m, c) => log('warn', m, c),
      error: (m, c) => log('error', m, c),
    };

    try {
      return await this.executeStages(ctx, runLog, params.settingsIssues);
    } finally {
      await runLog.flush();
      detachRunLog(runLog);
      const failures = runLog.getWriteFailures();
      if (failures.count) {
        this.logger.warn(
          `runner.log: ${failures.count} write(s) failed: ${failures.lastError ?? 'unknown'}`,
        );
      }
    }
  }

  private async executeStages(
    ctx: PipelineContext,
    runLog: RunLog,
    settingsIssues: string[],
  ): Promise<PipelineRunResult> {
    const { options, runDir } = ctx;
    ctx.info('run: started', {
      trigger: ctx.trigger,
      runDir,
      outDir: options.outDir,
    });
    for (const issue of settingsIssues) ctx.warn(`settings: ${issue}`);

    await this.writeJson(ctx, ARTIFACTS.optionsSanity, redactOptions(options));

    // 1. discover
    let catalogMeta: CatalogDiscoverResult['meta'] | null = null;
    const catalog = await runStage<CandidateItem[]>({
      ctx,
      stage: 'catalog',
      run: async () => {
        const res = await this.catalog.discover(options);
        catalogMeta = res.meta;
        return res.items;
      },
      fallback: () => [],
    });
    const discovered = catalog.value;
    await this.writeJson(ctx, ARTIFACTS.discovered, discovered);

    // 2. seen index + filter
    const seen = await runStage({
      ctx,
      stage: 'seenIndex',
      run: () => this.seenIndex.load(options),
      fallback: () => emptySeenIndex(options),
    });
    const filter = await runStage({
      ctx,
      stage: 'filter',
      run: () => filterUnseen(discovered, seen.value.index),
      fallback: () => [...discovered],
    });
    const eligible = filter.value;

    // 3. rank; nothing to enrich without a catalog
    const rank =
      catalog.status === 'ok'
        ? await runStage<RankedItem[] | null>({
            ctx,
            stage: 'rank',
            run: () =>
              rankItems(eligible, this.scorers.create(options), options.minMatchCut),
            fallback: () => null,
          })
        : skipStage<RankedItem[] | null>({
            ctx,
            stage: 'rank',
            reason: 'catalog unavailable',
            fallback: null,
          });
    const ranked = rank.value;
    if (ranked) {
      await this.writeJson(ctx, ARTIFACTS.enriched, ranked);
      await this.writeJson(ctx, ARTIFACTS.feed, ranked);
    }

    // 4. telemetry
    const counts: PipelineCounts = {
      discovered: discovered.length,
      eligible: eligible.length,
      ranked: ranked?.length ?? 0,
      aboveCut: ranked?.filter((i) => i.aboveCut).length ?? 0,
    };
    const stages = [catalog, seen, filter, rank].map((s) => toOutcome(s));
    ctx.info(`counts: ${formatCountsLine(counts)}`);

    await this.writeText(
      ctx,
      ARTIFACTS.summary,
      renderSummaryMarkdown({
        runId: ctx.runId,
        trigger: ctx.trigger,
        startedAt: ctx.startedAt,
        region: options.region,
        minMatchCut: options.minMatchCut,
        topN: options.topN,
        counts,
        stages,
        ranked,
      }),
    );

    const sources = seen.value.sources;
    await this.writeJson(
      ctx,
      ARTIFACTS.diag,
      buildRunReport({
        runId: ctx.runId,
        trigger: ctx.trigger,
        startedAt: ctx.startedAt,
        finishedAt: new Date(),
        counts,
        minMatchCut: options.minMatchCut,
        stages,
        stageFacts: {
          catalog: [{ label: 'Items', value: discovered.length }],
          seenIndex: [
            { label: 'Ratings rows', value: sources.csvRowsUsed },
            { label: 'Public ids', value: sources.publicIds },
          ],
          filter: [{ label: 'Dropped', value: discovered.length - eligible.length }],
          rank: [{ label: 'Above cut', value: counts.aboveCut }],
        },
        warnings: settingsIssues,
        raw: { catalog: catalogMeta, seenIndex: sources },
      }),
    );

    // 5. pointers
    let lastRunDirFile: string | null = null;
    try {
      lastRunDirFile = await this.pointers.writeLastRunDir(options.outDir, runDir);
    } catch (err) {
      ctx.error('last_run_dir.txt: write failed', { error: errToMessage(err) });
    }

    ctx.info('run: finished', { ...counts });
    // `latest` may become a copy; get the log on disk first.
    await runLog.flush();

    const latest = await this.latestPointer
      .update({
        outDir: options.outDir,
        runDir,
        disableSymlink: options.disableSymlink,
      })
      .catch((err: unknown) => {
        ctx.error('latest: update failed', { error: errToMessage(err) });
        throw err;
      });

    ctx.info(`latest: ${latest.mode}`, {
      latestPath: latest.latestPath,
      errors: latest.sanity.errors,
    });

    return {
      runId: ctx.runId,
      runDir,
      trigger: ctx.trigger,
      counts,
      stages,
      latest: { mode: latest.mode, path: latest.latestPath },
      lastRunDirFile,
    };
  }

  private async writeJson(ctx: PipelineContext, name: string, value: unknown) {
    const res = await writeJsonArtifact(join(ctx.runDir, name), value, this.fs);
    if (!res.ok) ctx.error(`artifact ${name}: write failed`, { error: res.error });
  }

  private async writeText(ctx: PipelineContext, name: string, text: string) {
    const res = await writeTextArtifact(join(ctx.runDir, name), text, this.fs);
    if (!res.ok) ctx.error(`artifact ${name}: write failed`, { error: res.error });
  }
}

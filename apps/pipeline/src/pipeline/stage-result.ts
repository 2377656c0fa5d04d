import { errToMessage, PipelineFatalError } from '../errors';
import type { PipelineContext } from './pipeline.types';

export type StageName = 'catalog' | 'seenIndex' | 'filter' | 'rank';

/**
 * What a stage produced. A degraded stage carries the fallback value the rest
 * of the run continues with, plus the cause.
 */
export type StageResult<T> =
  | { status: 'ok'; stage: StageName; value: T; durationMs: number }
  | {
      status: 'degraded';
      stage: StageName;
      value: T;
      error: string;
      durationMs: number;
    };

export type StageOutcome = {
  stage: StageName;
  status: 'ok' | 'degraded';
  durationMs: number;
  error: string | null;
};

export function toOutcome(result: StageResult<unknown>): StageOutcome {
  return {
    stage: result.stage,
    status: result.status,
    durationMs: result.durationMs,
    error: result.status === 'degraded' ? result.error : null,
  };
}

/**
 * Runs one collaborator call. Any failure other than a fatal one becomes a
 * `degraded` result with `fallback()` as its value, logged to the run log.
 */
export async function runStage<T>(params: {
  ctx: PipelineContext;
  stage: StageName;
  run: () => Promise<T> | T;
  fallback: () => T;
  now?: () => number;
}): Promise<StageResult<T>> {
  const { ctx, stage } = params;
  const now = params.now ?? Date.now;
  const started = now();
  ctx.debug(`stage ${stage}: started`);

  try {
    const value = await params.run();
    const durationMs = now() - started;
    ctx.info(`stage ${stage}: ok`, { durationMs });
    return { status: 'ok', stage, value, durationMs };
  } catch (err) {
    if (err instanceof PipelineFatalError) throw err;
    const error = errToMessage(err);
    const durationMs = now() - started;
    ctx.error(`stage ${stage}: failed; continuing with fallback`, {
      error,
      durationMs,
    });
    return { status: 'degraded', stage, value: params.fallback(), error, durationMs };
  }
}

/** Records a stage that was not attempted because an input it needs degraded. */
export function skipStage<T>(params: {
  ctx: PipelineContext;
  stage: StageName;
  reason: string;
  fallback: T;
}): StageResult<T> {
  params.ctx.warn(`stage ${params.stage}: skipped (${params.reason})`);
  return {
    status: 'degraded',
    stage: params.stage,
    value: params.fallback,
    error: `skipped: ${params.reason}`,
    durationMs: 0,
  };
}

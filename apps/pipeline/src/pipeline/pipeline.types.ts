import type { JsonObject, RunLogLevel } from '../logs/run-log';
import type { LatestPointerMode } from '../runs/latest-pointer.service';
import type { PipelineOptions } from '../settings/pipeline-options';
import type { StageOutcome } from './stage-result';

export type PipelineRunTrigger = 'manual' | 'schedule';

export type PipelineContext = {
  runId: string;
  runDir: string;
  trigger: PipelineRunTrigger;
  startedAt: Date;
  options: PipelineOptions;
  log: (level: RunLogLevel, message: string, context?: JsonObject) => void;
  debug: (message: string, context?: JsonObject) => void;
  info: (message: string, context?: JsonObject) => void;
  warn: (message: string, context?: JsonObject) => void;
  error: (message: string, context?: JsonObject) => void;
};

export type PipelineCounts = {
  discovered: number;
  eligible: number;
  ranked: number;
  aboveCut: number;
};

export type PipelineRunResult = {
  runId: string;
  runDir: string;
  trigger: PipelineRunTrigger;
  counts: PipelineCounts;
  stages: StageOutcome[];
  latest: { mode: LatestPointerMode; path: string };
  lastRunDirFile: string | null;
};

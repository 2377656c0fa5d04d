import type { JsonObject, JsonValue } from '../logs/run-log';
import type { PipelineCounts, PipelineRunTrigger } from './pipeline.types';
import type { StageName, StageOutcome } from './stage-result';

export type RunReportIssueLevel = 'warn' | 'error';
export type RunReportTaskStatus = 'success' | 'failed';

export type RunReportMetricRow = {
  label: string;
  value: number | null;
  unit?: string;
  note?: string;
};

export type RunReportSection = {
  id: string;
  title: string;
  rows: RunReportMetricRow[];
};

export type RunReportIssue = {
  level: RunReportIssueLevel;
  message: string;
};

export type RunReportTask = {
  id: StageName;
  title: string;
  status: RunReportTaskStatus;
  facts?: Array<{ label: string; value: JsonValue }>;
  issues?: RunReportIssue[];
};

export type RunReportV1 = {
  template: 'runReportV1';
  version: 1;
  runId: string;
  trigger: PipelineRunTrigger;
  startedAt: string;
  finishedAt: string;
  headline: string;
  sections: RunReportSection[];
  tasks: RunReportTask[];
  issues: RunReportIssue[];
  /**
   * Stage-specific output kept for debugging. Not a stable contract.
   */
  raw: JsonObject;
};

const STAGE_TITLES: Record<StageName, string> = {
  catalog: 'Discover catalog',
  seenIndex: 'Load seen index',
  filter: 'Drop seen titles',
  rank: 'Score and rank',
};

function asFiniteNumber(v: unknown): number | null {
  return typeof v === 'number' && Number.isFinite(v) ? v : null;
}

export function metricRow(params: {
  label: string;
  value?: number | null;
  unit?: string | null;
  note?: string | null;
}): RunReportMetricRow {
  const row: RunReportMetricRow = {
    label: params.label,
    value: asFiniteNumber(params.value),
  };
  const unit = (params.unit ?? '').trim();
  if (unit) row.unit = unit;
  const note = (params.note ?? '').trim();
  if (note) row.note = note;
  return row;
}

export function issue(level: RunReportIssueLevel, message: string): RunReportIssue {
  return { level, message: message.trim() };
}

export function buildRunReport(params: {
  runId: string;
  trigger: PipelineRunTrigger;
  startedAt: Date;
  finishedAt: Date;
  counts: PipelineCounts;
  minMatchCut: number;
  stages: StageOutcome[];
  stageFacts?: Partial<Record<StageName, Array<{ label: string; value: JsonValue }>>>;
  /** Run-level problems outside any stage, e.g. an unusable options file. */
  warnings?: string[];
  raw?: JsonObject;
}): RunReportV1 {
  const { counts } = params;

  const tasks: RunReportTask[] = params.stages.map((s) => {
    const task: RunReportTask = {
      id: s.stage,
      title: STAGE_TITLES[s.stage],
      status: s.status === 'ok' ? 'success' : 'failed',
    };
    const facts = [
      { label: 'Duration (ms)', value: s.durationMs },
      ...(params.stageFacts?.[s.stage] ?? []),
    ];
    task.facts = facts;
    if (s.error) task.issues = [issue('error', s.error)];
    return task;
  });

  const stageIssues = params.stages
    .filter((s) => s.status === 'degraded')
    .map((s) =>
      issue('warn', `${STAGE_TITLES[s.stage]} degraded: ${s.error ?? 'unknown error'}`),
    );
  const issues = [
    ...stageIssues,
    ...(params.warnings ?? []).map((w) => issue('warn', w)),
  ];

  const degraded = stageIssues.length;
  const headline = degraded
    ? `${counts.aboveCut} picks above ${params.minMatchCut}; ${degraded} stage(s) degraded`
    : `${counts.aboveCut} picks above ${params.minMatchCut}`;

  return {
    template: 'runReportV1',
    version: 1,
    runId: params.runId,
    trigger: params.trigger,
    startedAt: params.startedAt.toISOString(),
    finishedAt: params.finishedAt.toISOString(),
    headline,
    sections: [
      {
        id: 'funnel',
        title: 'Funnel',
        rows: [
          metricRow({ label: 'Discovered', value: counts.discovered }),
          metricRow({
            label: 'Eligible',
            value: counts.eligible,
            note: 'after dropping seen titles',
          }),
          metricRow({ label: 'Ranked', value: counts.ranked }),
          metricRow({
            label: 'Above cut',
            value: counts.aboveCut,
            note: `match >= ${params.minMatchCut}`,
          }),
        ],
      },
    ],
    tasks,
    issues,
    raw: params.raw ?? {},
  };
}

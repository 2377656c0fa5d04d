import type { RankedItem } from '../scoring/scoring.types';
import type { PipelineCounts, PipelineRunTrigger } from './pipeline.types';
import type { StageOutcome } from './stage-result';

export function formatCountsLine(counts: PipelineCounts): string {
  return `discovered=${counts.discovered} eligible=${counts.eligible} ranked=${counts.ranked} above_cut=${counts.aboveCut}`;
}

function cell(value: string | number | null): string {
  if (value === null) return '';
  return String(value).replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function row(cells: Array<string | number | null>): string {
  return `| ${cells.map(cell).join(' | ')} |`;
}

export function renderSummaryMarkdown(params: {
  runId: string;
  trigger: PipelineRunTrigger;
  startedAt: Date;
  region: string;
  minMatchCut: number;
  topN: number;
  counts: PipelineCounts;
  stages: StageOutcome[];
  ranked: RankedItem[] | null;
}): string {
  const lines: string[] = [
    `# Daily picks ${params.runId}`,
    '',
    `- started: ${params.startedAt.toISOString()}`,
    `- trigger: ${params.trigger}`,
    `- region: ${params.region}`,
    `- cut: ${params.minMatchCut}`,
    '',
    `counts: ${formatCountsLine(params.counts)}`,
    '',
    '## Stages',
    '',
    row(['stage', 'status', 'ms', 'error']),
    '|---|---|---|---|',
    ...params.stages.map((s) => row([s.stage, s.status, s.durationMs, s.error])),
    '',
    `## Top ${params.topN}`,
    '',
  ];

  if (!params.ranked) {
    lines.push('_Ranking unavailable for this run._');
  } else if (!params.ranked.length) {
    lines.push('_No eligible titles._');
  } else {
    lines.push(row(['#', 'title', 'year', 'kind', 'match', 'source']));
    lines.push('|---|---|---|---|---|---|');
    for (const item of params.ranked.slice(0, params.topN)) {
      lines.push(
        row([
          item.rank,
          item.title,
          item.year,
          item.kind,
          item.match,
          item.aboveCut ? item.matchSource : `${item.matchSource}, below cut`,
        ]),
      );
    }
  }

  return `${lines.join('\n')}\n`;
}

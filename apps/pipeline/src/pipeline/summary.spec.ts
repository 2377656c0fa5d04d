import type { RankedItem } from '../scoring/scoring.types';
import { buildRunReport } from './run-report';
import type { StageOutcome } from './stage-result';
import { formatCountsLine, renderSummaryMarkdown } from './summary';

const counts = { discovered: 3, eligible: 2, ranked: 2, aboveCut: 1 };

const stages: StageOutcome[] = [
  { stage: 'catalog', status: 'ok', durationMs: 12, error: null },
  { stage: 'seenIndex', status: 'degraded', durationMs: 3, error: 'EACCES' },
  { stage: 'filter', status: 'ok', durationMs: 0, error: null },
  { stage: 'rank', status: 'ok', durationMs: 1, error: null },
];

function ranked(rank: number, title: string, match: number, aboveCut: boolean): RankedItem {
  return {
    kind: 'movie',
    tmdbId: rank,
    imdbId: null,
    title,
    year: 2021,
    popularity: null,
    voteAverage: null,
    voteCount: null,
    originalLanguage: 'en',
    rank,
    match,
    matchSource: 'scorer',
    aboveCut,
  };
}

describe('summary', () => {
  it('formats the counts line', () => {
    expect(formatCountsLine(counts)).toBe('discovered=3 eligible=2 ranked=2 above_cut=1');
  });

  it('renders telemetry, stages and the top-N preview', () => {
    const md = renderSummaryMarkdown({
      runId: 'run_20240102_030405',
      trigger: 'schedule',
      startedAt: new Date('2024-01-02T03:04:05.000Z'),
      region: 'US',
      minMatchCut: 58,
      topN: 1,
      counts,
      stages,
      ranked: [ranked(1, 'Fish | Chips', 70, true), ranked(2, 'Other', 50, false)],
    });

    expect(md).toBe(
      [
        '# Daily picks run_20240102_030405',
        '',
        '- started: 2024-01-02T03:04:05.000Z',
        '- trigger: schedule',
        '- region: US',
        '- cut: 58',
        '',
        'counts: discovered=3 eligible=2 ranked=2 above_cut=1',
        '',
        '## Stages',
        '',
        '| stage | status | ms | error |',
        '|---|---|---|---|',
        '| catalog | ok | 12 |  |',
        '| seenIndex | degraded | 3 | EACCES |',
        '| filter | ok | 0 |  |',
        '| rank | ok | 1 |  |',
        '',
        '## Top 1',
        '',
        '| # | title | year | kind | match | source |',
        '|---|---|---|---|---|---|',
        '| 1 | Fish \\| Chips | 2021 | movie | 70 | scorer |',
        '',
      ].join('\n'),
    );
  });

  it('notes an empty or missing ranking', () => {
    const base = {
      runId: 'run_1',
      trigger: 'manual' as const,
      startedAt: new Date(0),
      region: 'US',
      minMatchCut: 58,
      topN: 10,
      counts,
      stages,
    };
    expect(renderSummaryMarkdown({ ...base, ranked: [] })).toContain('_No eligible titles._\n');
    expect(renderSummaryMarkdown({ ...base, ranked: null })).toContain(
      '_Ranking unavailable for this run._\n',
    );
  });
});

describe('buildRunReport', () => {
  it('maps stages to tasks and degraded stages to issues', () => {
    const report = buildRunReport({
      runId: 'run_1',
      trigger: 'manual',
      startedAt: new Date('2024-01-02T03:04:05.000Z'),
      finishedAt: new Date('2024-01-02T03:04:06.000Z'),
      counts,
      minMatchCut: 58,
      stages,
      stageFacts: { catalog: [{ label: 'Items', value: 3 }] },
      raw: { catalog: null },
    });

    expect(report.template).toBe('runReportV1');
    expect(report.headline).toBe('1 picks above 58; 1 stage(s) degraded');
    expect(report.tasks.map((t) => [t.id, t.status])).toEqual([
      ['catalog', 'success'],
      ['seenIndex', 'failed'],
      ['filter', 'success'],
      ['rank', 'success'],
    ]);
    expect(report.tasks[0].facts).toEqual([
      { label: 'Duration (ms)', value: 12 },
      { label: 'Items', value: 3 },
    ]);
    expect(report.tasks[1].issues).toEqual([{ level: 'error', message: 'EACCES' }]);
    expect(report.issues).toEqual([
      { level: 'warn', message: 'Load seen index degraded: EACCES' },
    ]);
    expect(report.sections[0].rows.map((r) => [r.label, r.value])).toEqual([
      ['Discovered', 3],
      ['Eligible', 2],
      ['Ranked', 2],
      ['Above cut', 1],
    ]);
  });
});

import { promises as fs } from 'node:fs';
import { EMPTY_RESULTS } from '../automation/result-extractor';
import type { CollectionOutcome, ScenarioRecord } from '../collection/CollectionRunner';
import { buildResultRow, enumerateScenarios } from '../collection/scenarios';
import {
  buildRunSummary,
  EMPTY_PAGE_METRICS,
  RUN_SUMMARY_FILE,
  writeRunSummary,
  writeRunSummarySafely
} from '../observability/run-summary';
import { test, expect } from '../fixtures/test.fixture';

const scenarios = enumerateScenarios({
  models: [{ displayName: 'A (FP16)', siteName: 'A', quantization: 'FP16' }],
  batchSizes: [1],
  contextLengths: [{ tokens: 2048, label: '2K' }],
  concurrentUsers: [1, 4, 8]
});

const records: ScenarioRecord[] = [
  {
    scenario: scenarios[0],
    row: buildResultRow(scenarios[0], { ...EMPTY_RESULTS, vramGb: 20.5, perUserSpeed: 40, totalThroughput: 40 }),
    failedFields: [],
    missingData: false,
    configMismatches: []
  },
  {
    scenario: scenarios[1],
    row: buildResultRow(scenarios[1], EMPTY_RESULTS),
    failedFields: ['quantization', 'kvCache'],
    missingData: true,
    configMismatches: ['page shows Users: 1, expected 4']
  },
  {
    scenario: scenarios[2],
    row: buildResultRow(scenarios[2], { ...EMPTY_RESULTS, vramGb: 24.5 }),
    failedFields: ['kvCache'],
    missingData: true,
    configMismatches: []
  }
];

const outcome: CollectionOutcome = {
  status: 'interrupted',
  totalScenarios: 5,
  rows: records.map((record) => record.row),
  records,
  exportedTo: 'Reports/vram-results/vram_results_partial.csv',
  startedAt: '2026-01-05T10:00:00.000Z',
  endedAt: '2026-01-05T10:00:12.500Z'
};

test.describe('buildRunSummary', () => {
  test('counts rows, missing data and failed fields', () => {
    const pageMetrics = { ...EMPTY_PAGE_METRICS, requestCount: 42, pageErrors: ['ResizeObserver loop limit exceeded'] };

    const summary = buildRunSummary(outcome, pageMetrics, new Date('2026-01-05T10:00:13.000Z'));

    expect(summary).toEqual({
      generatedAt: '2026-01-05T10:00:13.000Z',
      runId: '2026-01-05T10-00-00-000Z',
      status: 'interrupted',
      startedAt: '2026-01-05T10:00:00.000Z',
      endedAt: '2026-01-05T10:00:12.500Z',
      durationMs: 12_500,
      totalScenarios: 5,
      rowsCollected: 3,
      rowsWithMissingData: 2,
      rowsWithConfigMismatch: 1,
      failedFieldCounts: { quantization: 1, kvCache: 2 },
      exportedTo: 'Reports/vram-results/vram_results_partial.csv',
      page: pageMetrics
    });
  });

  test('writes the summary as JSON into the output directory', async ({}, testInfo) => {
    const summary = buildRunSummary(outcome);

    const written = await writeRunSummary(testInfo.outputPath('summary'), summary);

    expect(written).toBe(testInfo.outputPath('summary', RUN_SUMMARY_FILE));
    expect(JSON.parse(await fs.readFile(written, 'utf-8'))).toEqual(summary);
  });

  test('logs instead of throwing when the summary cannot be written', async ({ logger }, testInfo) => {
    const blocker = testInfo.outputPath('not-a-directory');
    await fs.mkdir(testInfo.outputPath(), { recursive: true });
    await fs.writeFile(blocker, 'occupied', 'utf-8');

    const written = await writeRunSummarySafely(`${blocker}/summary`, buildRunSummary(outcome), logger);

    expect(written).toBeNull();
    expect(logger.messages('error')).toEqual(['Could not write the run summary']);
  });
});

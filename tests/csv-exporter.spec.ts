import { promises as fs } from 'node:fs';
import { CsvResultExporter, exportFileName, formatTimestamp, toCsv } from '../collection/csv-exporter';
import { buildResultRow } from '../collection/scenarios';
import { EMPTY_RESULTS } from '../automation/result-extractor';
import type { ResultRow, Scenario } from '../collection/types';
import { test, expect } from '../fixtures/test.fixture';

const HEADER =
  'Model,Quantization,Batch Size,Context Length,Concurrent Users,VRAM (GB),Tokens per User (tok/s),Total Throughput (tok/s)';

const scenario: Scenario = {
  model: { displayName: 'Gemma-3-27B-IT (FP16)', siteName: 'Gemma 3 27B', quantization: 'FP16' },
  batchSize: 1,
  contextLength: { tokens: 2048, label: '2K' },
  concurrentUsers: 4
};

const fullRow: ResultRow = buildResultRow(scenario, {
  ...EMPTY_RESULTS,
  vramGb: 56,
  perUserSpeed: 40,
  totalThroughput: 160.5
});

test.describe('toCsv', () => {
  test('writes the header and one line per row in column order', () => {
    expect(toCsv([fullRow])).toBe(`${HEADER}\nGemma-3-27B-IT (FP16),FP16,1,2K,4,56,40,160.5\n`);
  });

  test('leaves absent figures as empty cells', () => {
    const row = buildResultRow(
      { ...scenario, model: { displayName: 'qwen3:32b-q8_0', siteName: 'Qwen3-32B', quantization: 'Q8' } },
      EMPTY_RESULTS
    );
    expect(toCsv([row]).split('\n')[1]).toBe('qwen3:32b-q8_0,Q8,1,2K,4,,,');
  });

  test('quotes cells containing commas or quotes', () => {
    const row = buildResultRow(
      { ...scenario, model: { displayName: 'Model "A", v2', siteName: 'A', quantization: 'Q4' } },
      EMPTY_RESULTS
    );
    expect(toCsv([row]).split('\n')[1]).toBe('"Model ""A"", v2",Q4,1,2K,4,,,');
  });

  test('writes only the header for no rows', () => {
    expect(toCsv([])).toBe(`${HEADER}\n`);
  });
});

test.describe('export file names', () => {
  const now = new Date(2026, 0, 5, 9, 3, 7);

  test('stamps complete runs with the local date and time', () => {
    expect(formatTimestamp(now)).toBe('20260105_090307');
    expect(exportFileName('complete', now)).toBe('vram_results_20260105_090307.csv');
  });

  test('uses fixed names for partial and failed runs', () => {
    expect(exportFileName('partial', now)).toBe('vram_results_partial.csv');
    expect(exportFileName('error', now)).toBe('vram_results_error.csv');
  });
});

test.describe('CsvResultExporter', () => {
  test('creates the output directory and writes the file', async ({ logger }, testInfo) => {
    const outputDir = testInfo.outputPath('export');
    const exporter = new CsvResultExporter(outputDir, logger, () => new Date(2026, 0, 5, 9, 3, 7));

    const written = await exporter.export([fullRow], 'complete');

    expect(written).toBe(testInfo.outputPath('export', 'vram_results_20260105_090307.csv'));
    expect(await fs.readFile(testInfo.outputPath('export', 'vram_results_20260105_090307.csv'), 'utf-8')).toBe(
      toCsv([fullRow])
    );
  });

  test('writes nothing when there are no rows', async ({ logger }, testInfo) => {
    const exporter = new CsvResultExporter(testInfo.outputPath('empty'), logger);

    expect(await exporter.export([], 'partial')).toBeNull();
    expect(logger.messages('warn')).toEqual(['No results to save']);
  });
});

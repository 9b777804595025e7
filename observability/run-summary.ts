/**
 * @file run-summary.ts
 * @description Aggregates a finished (or aborted) collection into `run-summary.json`.
 *
 * The CSV holds the data; this file says how trustworthy it is: how many rows
 * are missing figures, which form fields kept failing, and whether the page
 * was throwing errors while it was being driven.
 */

import path from 'node:path';
import { promises as fs } from 'node:fs';
import type { ScenarioField } from '../automation/ConfigurationApplier';
import type { CollectionOutcome } from '../collection/CollectionRunner';
import type { Logger } from './logger';
import type { PageMetrics, RunSummary } from './types';

export const RUN_SUMMARY_FILE = 'run-summary.json';

export const EMPTY_PAGE_METRICS: PageMetrics = {
  requestCount: 0,
  requestFailureCount: 0,
  responseErrorCount: 0,
  consoleErrors: [],
  pageErrors: []
};

export function buildRunSummary(
  outcome: CollectionOutcome,
  page: PageMetrics = EMPTY_PAGE_METRICS,
  now: Date = new Date()
): RunSummary {
  const failedFieldCounts: Partial<Record<ScenarioField, number>> = {};
  for (const record of outcome.records) {
    for (const field of record.failedFields) {
      failedFieldCounts[field] = (failedFieldCounts[field] ?? 0) + 1;
    }
  }

  return {
    generatedAt: now.toISOString(),
    runId: outcome.startedAt.replace(/[:.]/g, '-'),
    status: outcome.status,
    startedAt: outcome.startedAt,
    endedAt: outcome.endedAt,
    durationMs: Date.parse(outcome.endedAt) - Date.parse(outcome.startedAt),
    totalScenarios: outcome.totalScenarios,
    rowsCollected: outcome.rows.length,
    rowsWithMissingData: outcome.records.filter((record) => record.missingData).length,
    rowsWithConfigMismatch: outcome.records.filter((record) => record.configMismatches.length > 0).length,
    failedFieldCounts,
    exportedTo: outcome.exportedTo,
    page
  };
}

export async function writeRunSummary(outputDir: string, summary: RunSummary): Promise<string> {
  await fs.mkdir(outputDir, { recursive: true });
  const filePath = path.join(outputDir, RUN_SUMMARY_FILE);
  await fs.writeFile(filePath, JSON.stringify(summary, null, 2), 'utf-8');
  return filePath;
}

/**
 * For the failure path: a summary that cannot be written is logged, so the
 * session failure stays the error the run reports.
 */
export async function writeRunSummarySafely(outputDir: string, summary: RunSummary, logger: Logger): Promise<string | null> {
  try {
    return await writeRunSummary(outputDir, summary);
  } catch (error) {
    logger.error('Could not write the run summary', error);
    return null;
  }
}

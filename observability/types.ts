/**
 * @file types.ts
 * @description Shapes of the observability data written next to the CSV after each run.
 *
 * DATA FLOW:
 *
 *   PageMetrics
 *     PRODUCED BY: observability/page-observer.ts (page.on listeners during the run)
 *     CONSUMED BY: observability/run-summary.ts
 *
 *   RunSummary
 *     PRODUCED BY: observability/run-summary.ts (from CollectionOutcome + PageMetrics)
 *     WRITTEN TO:  <OUTPUT_DIR>/run-summary.json
 */

import type { ScenarioField } from '../automation/ConfigurationApplier';

/** Network and error activity of the calculator page during a run. */
export interface PageMetrics {
  /** Total network requests made by the page. */
  requestCount: number;
  /** Requests that failed at the network level (DNS, TLS, refused...). */
  requestFailureCount: number;
  /** HTTP responses with status >= 400. */
  responseErrorCount: number;
  /** `console.error()` messages emitted by the page. */
  consoleErrors: string[];
  /** Uncaught page exceptions. */
  pageErrors: string[];
}

export interface RunSummary {
  /** ISO timestamp when this summary was generated. */
  generatedAt: string;
  /** Unique run identifier (timestamp-based). */
  runId: string;
  status: 'complete' | 'interrupted' | 'failed';
  startedAt: string;
  endedAt: string;
  durationMs: number;
  totalScenarios: number;
  rowsCollected: number;
  /** Rows where VRAM, per-user or total throughput is absent. */
  rowsWithMissingData: number;
  /** Rows where the page did not show the scenario's batch size, context or users. */
  rowsWithConfigMismatch: number;
  /** How many scenarios each form field failed to apply in. */
  failedFieldCounts: Partial<Record<ScenarioField, number>>;
  exportedTo: string | null;
  page: PageMetrics;
}

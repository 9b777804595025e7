/**
 * @file types.ts
 * @description Data dictionary for a collection run: what goes in (Scenario),
 *              what comes out of the page (ExtractedResults) and what is stored (ResultRow).
 *
 * DATA FLOW:
 *
 *   Scenario
 *     PRODUCED BY: collection/scenarios.ts (cross product of the scenario file)
 *     CONSUMED BY: automation/ConfigurationApplier.ts, collection/CollectionRunner.ts
 *
 *   ExtractedResults
 *     PRODUCED BY: automation/result-extractor.ts (pattern match over panel text)
 *     CONSUMED BY: collection/CollectionRunner.ts
 *
 *   ResultRow
 *     PRODUCED BY: collection/CollectionRunner.ts (one per scenario)
 *     CONSUMED BY: collection/csv-exporter.ts, observability/run-summary.ts
 */

import type { ContextLength, ModelConfig } from '../config/settings';

export type { ContextLength, ModelConfig };

/** One point of the models × batch sizes × context lengths × users cross product. */
export interface Scenario {
  readonly model: Readonly<ModelConfig>;
  readonly batchSize: number;
  readonly contextLength: Readonly<ContextLength>;
  readonly concurrentUsers: number;
}

/**
 * Numbers read from the results panel. `null` means the pattern was not found;
 * a miss is recorded as missing data, never raised.
 */
export interface ExtractedResults {
  vramGb: number | null;
  totalThroughput: number | null;
  perUserSpeed: number | null;
  /** `Batch: N` as echoed by the panel. */
  verifiedBatch: number | null;
  /** `Users: N` as echoed by the panel. */
  verifiedUsers: number | null;
  /** Shared part of `X GB shared + Y GB per user`. */
  sharedGb: number | null;
  /** Per-user part of `X GB shared + Y GB per user`. */
  perUserGb: number | null;
}

/** Column order of the exported dataset. */
export const RESULT_COLUMNS = [
  'Model',
  'Quantization',
  'Batch Size',
  'Context Length',
  'Concurrent Users',
  'VRAM (GB)',
  'Tokens per User (tok/s)',
  'Total Throughput (tok/s)'
] as const;

export type ResultColumn = (typeof RESULT_COLUMNS)[number];

export interface ResultRow {
  readonly 'Model': string;
  readonly 'Quantization': string;
  readonly 'Batch Size': number;
  readonly 'Context Length': string;
  readonly 'Concurrent Users': number;
  readonly 'VRAM (GB)': number | null;
  readonly 'Tokens per User (tok/s)': number | null;
  readonly 'Total Throughput (tok/s)': number | null;
}

/** How a run ended; also selects the export file name. */
export type RunOutcome = 'complete' | 'partial' | 'error';

/** Persists accumulated rows. Returns the written path, or null when nothing was written. */
export interface ResultExporter {
  export(rows: readonly ResultRow[], outcome: RunOutcome): Promise<string | null>;
}

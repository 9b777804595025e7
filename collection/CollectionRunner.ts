/**
 * @file CollectionRunner.ts
 * @description Walks the scenario list against one calculator page and accumulates a row per scenario.
 *
 * ╔══════════════════════════════════════════════════════════════════════════╗
 * ║  PER SCENARIO (strictly one at a time, one shared page):               ║
 * ║                                                                        ║
 * ║    1. ConfigurationApplier.apply()   set every field, settle           ║
 * ║    2. readAppliedConfiguration()     log what the page shows           ║
 * ║    3. readResultsText()              grab the results panel            ║
 * ║    4. extractResults()               numbers, or null where missing    ║
 * ║       findConfigMismatches()         page vs scenario, warn + record   ║
 * ║    5. append the row                 even when fields are null         ║
 * ╚══════════════════════════════════════════════════════════════════════════╝
 *
 * EXIT PATHS:
 *  - complete     every scenario produced a row; rows exported as 'complete'
 *  - interrupted  the AbortSignal fired; checked only between scenarios, so
 *                 the scenario in flight finishes first; rows exported as 'partial'
 *  - error        anything thrown by the page is a session failure; rows are
 *                 exported as 'error', then SessionFailureError is thrown
 *                 carrying a 'failed' outcome
 */

import type { ApplyReport, ConfigurationApplier, ScenarioField } from '../automation/ConfigurationApplier';
import { extractResults, hasMissingFields } from '../automation/result-extractor';
import { realSleep } from '../automation/sleep';
import type { CalculatorDriver, Sleep } from '../automation/types';
import { BETWEEN_SCENARIOS_DELAY_MS } from '../config/timing';
import type { Logger } from '../observability/logger';
import { SessionFailureError } from './errors';
import { buildResultRow, describeScenario, findConfigMismatches } from './scenarios';
import type { ResultExporter, ResultRow, RunOutcome, Scenario } from './types';

export interface ScenarioRecord {
  scenario: Scenario;
  row: ResultRow;
  failedFields: ScenarioField[];
  /** True when VRAM, per-user or total throughput could not be read. */
  missingData: boolean;
  /** Where the page's inputs or Batch/Users summary disagree with the scenario. */
  configMismatches: string[];
}

export interface CollectionOutcome {
  status: 'complete' | 'interrupted' | 'failed';
  totalScenarios: number;
  rows: ResultRow[];
  records: ScenarioRecord[];
  /** Path written by the exporter, or null when there was nothing to write. */
  exportedTo: string | null;
  startedAt: string;
  endedAt: string;
}

export interface CollectionRunnerOptions {
  driver: CalculatorDriver;
  applier: ConfigurationApplier;
  exporter: ResultExporter;
  logger: Logger;
  betweenScenariosDelayMs?: number;
  sleep?: Sleep;
}

export class CollectionRunner {
  private readonly driver: CalculatorDriver;
  private readonly applier: ConfigurationApplier;
  private readonly exporter: ResultExporter;
  private readonly logger: Logger;
  private readonly betweenScenariosDelayMs: number;
  private readonly sleep: Sleep;

  constructor(options: CollectionRunnerOptions) {
    this.driver = options.driver;
    this.applier = options.applier;
    this.exporter = options.exporter;
    this.logger = options.logger;
    this.betweenScenariosDelayMs = options.betweenScenariosDelayMs ?? BETWEEN_SCENARIOS_DELAY_MS;
    this.sleep = options.sleep ?? realSleep;
  }

  async run(scenarios: readonly Scenario[], signal?: AbortSignal): Promise<CollectionOutcome> {
    const startedAt = new Date().toISOString();
    const records: ScenarioRecord[] = [];
    const rows = (): ResultRow[] => records.map((record) => record.row);
    const total = scenarios.length;

    this.logger.info(`Starting collection of ${total} configurations...`);

    let interrupted = false;
    try {
      for (const [index, scenario] of scenarios.entries()) {
        if (signal?.aborted) {
          interrupted = true;
          break;
        }
        this.logger.info(`[${index + 1}/${total}] ${describeScenario(scenario)}`);
        records.push(await this.collectOne(scenario));
        await this.sleep(this.betweenScenariosDelayMs);
      }
    } catch (error) {
      this.logger.error(`Session failure after ${records.length} rows`, error);
      const exportedTo = await this.exportSafely(rows(), 'error');
      throw new SessionFailureError(
        { status: 'failed', totalScenarios: total, rows: rows(), records, exportedTo, startedAt, endedAt: new Date().toISOString() },
        error
      );
    }

    const outcome: RunOutcome = interrupted ? 'partial' : 'complete';
    if (interrupted) {
      this.logger.warn(`Collection interrupted; saving ${records.length} of ${total} rows`);
    } else {
      this.logger.info(`Collection complete! Collected ${records.length} configurations.`);
    }
    const exportedTo = await this.exporter.export(rows(), outcome);

    return {
      status: interrupted ? 'interrupted' : 'complete',
      totalScenarios: total,
      rows: rows(),
      records,
      exportedTo,
      startedAt,
      endedAt: new Date().toISOString()
    };
  }

  private async collectOne(scenario: Scenario): Promise<ScenarioRecord> {
    const report: ApplyReport = await this.applier.apply(scenario);

    const applied = await this.driver.readAppliedConfiguration();
    this.logger.info(
      `Config: Model='${applied.model ?? ''}', Batch=${applied.displayedBatch ?? '?'}, Users=${applied.displayedUsers ?? '?'}`
    );

    const extracted = extractResults(await this.driver.readResultsText());
    const row = buildResultRow(scenario, extracted);
    const missingData = hasMissingFields(extracted);
    const configMismatches = findConfigMismatches(scenario, applied, extracted);

    this.logger.info(
      `=> VRAM=${extracted.vramGb ?? 'n/a'} GB, Per-User=${extracted.perUserSpeed ?? 'n/a'} tok/s, Total=${extracted.totalThroughput ?? 'n/a'} tok/s`
    );
    if (extracted.sharedGb !== null && extracted.perUserGb !== null) {
      this.logger.info(`   ${extracted.sharedGb} GB shared + ${extracted.perUserGb} GB per user`);
    }
    if (configMismatches.length > 0) {
      this.logger.warn(`Page does not match the scenario: ${configMismatches.join('; ')}`);
    }

    return { scenario, row, failedFields: report.failedFields, missingData, configMismatches };
  }

  /** On the error path the session failure is what propagates; an export failure is only logged. */
  private async exportSafely(rows: ResultRow[], outcome: RunOutcome): Promise<string | null> {
    try {
      return await this.exporter.export(rows, outcome);
    } catch (exportError) {
      this.logger.error('Could not save collected rows', exportError);
      return null;
    }
  }
}

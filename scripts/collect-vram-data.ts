/**
 * @file collect-vram-data.ts
 * @description Entry point: opens the calculator, walks every scenario and writes the CSV + run summary.
 *
 * USAGE:
 *   npm run collect
 *   HEADLESS=true OUTPUT_DIR=out npm run collect
 *
 * Ctrl+C stops after the scenario in flight and saves what was collected as
 * vram_results_partial.csv. A second Ctrl+C kills the process immediately.
 */

import { config as loadDotenv } from 'dotenv';
import { ConfigurationApplier } from '../automation/ConfigurationApplier';
import { DropdownSelector } from '../automation/DropdownSelector';
import { ValueSetter } from '../automation/ValueSetter';
import { CollectionRunner, type CollectionOutcome } from '../collection/CollectionRunner';
import { CsvResultExporter } from '../collection/csv-exporter';
import { SessionFailureError } from '../collection/errors';
import { enumerateScenarios } from '../collection/scenarios';
import { loadRuntimeSettings, loadScenarioConfig } from '../config/settings';
import { createConsoleLogger } from '../observability/logger';
import { observePage, type PageObserver } from '../observability/page-observer';
import { buildRunSummary, EMPTY_PAGE_METRICS, writeRunSummary, writeRunSummarySafely } from '../observability/run-summary';
import type { RunSummary } from '../observability/types';
import { VramCalculatorPage } from '../pages/VramCalculatorPage';
import { withBrowserSession } from '../session/browser-session';

const logger = createConsoleLogger('collector');

function summarise(outcome: CollectionOutcome, observer: PageObserver | undefined): RunSummary {
  return buildRunSummary(outcome, observer?.snapshot() ?? EMPTY_PAGE_METRICS);
}

function logSummary(summaryPath: string, summary: RunSummary): void {
  logger.info(
    `Summary written to ${summaryPath}: ${summary.rowsCollected}/${summary.totalScenarios} rows, ` +
      `${summary.rowsWithMissingData} with missing data, ${summary.rowsWithConfigMismatch} not matching their scenario, ` +
      `${summary.page.pageErrors.length} page errors`
  );
}

async function main(): Promise<void> {
  loadDotenv();
  const settings = loadRuntimeSettings();
  const scenarioConfig = await loadScenarioConfig(settings.scenarioFile);
  const scenarios = enumerateScenarios(scenarioConfig);
  const calculatorUrl = settings.calculatorUrlOverride ?? scenarioConfig.calculatorUrl;

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted by user; finishing the current scenario, then saving partial results');
    controller.abort();
  });

  let observer: PageObserver | undefined;
  try {
    const outcome = await withBrowserSession({ headless: settings.headless }, async ({ page }) => {
      observer = observePage(page);
      const calculator = new VramCalculatorPage(page, { url: calculatorUrl, logger: createConsoleLogger('page') });
      await calculator.open();
      await calculator.switchToManualMode();

      const applier = new ConfigurationApplier({
        dropdowns: new DropdownSelector(calculator, createConsoleLogger('dropdown')),
        values: new ValueSetter(calculator, createConsoleLogger('input')),
        logger: createConsoleLogger('config'),
        kvCacheLabel: scenarioConfig.kvCacheQuantization
      });
      await applier.applyHardware(scenarioConfig.hardware);

      const runner = new CollectionRunner({
        driver: calculator,
        applier,
        exporter: new CsvResultExporter(settings.outputDir, createConsoleLogger('export')),
        logger
      });
      return runner.run(scenarios, controller.signal);
    });
    const summary = summarise(outcome, observer);
    logSummary(await writeRunSummary(settings.outputDir, summary), summary);
  } catch (error) {
    if (error instanceof SessionFailureError) {
      const summary = summarise(error.outcome, observer);
      const summaryPath = await writeRunSummarySafely(settings.outputDir, summary, logger);
      if (summaryPath !== null) {
        logSummary(summaryPath, summary);
      }
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error('[collector] Collection failed: ' + message);
  process.exit(1);
});

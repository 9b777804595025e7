import type { AppliedConfiguration } from '../automation/types';
import type { ScenarioConfig } from '../config/settings';
import type { ExtractedResults, ResultRow, Scenario } from './types';

/** Nested in the order models → batch sizes → context lengths → users. */
export function enumerateScenarios(config: Pick<ScenarioConfig, 'models' | 'batchSizes' | 'contextLengths' | 'concurrentUsers'>): Scenario[] {
  const scenarios: Scenario[] = [];
  for (const model of config.models) {
    for (const batchSize of config.batchSizes) {
      for (const contextLength of config.contextLengths) {
        for (const concurrentUsers of config.concurrentUsers) {
          scenarios.push(Object.freeze({
            model: Object.freeze({ ...model }),
            batchSize,
            contextLength: Object.freeze({ ...contextLength }),
            concurrentUsers
          }));
        }
      }
    }
  }
  return scenarios;
}

export function describeScenario(scenario: Scenario): string {
  return `${scenario.model.displayName}, BS=${scenario.batchSize}, CTX=${scenario.contextLength.label}, Users=${scenario.concurrentUsers}`;
}

export function buildResultRow(scenario: Scenario, extracted: ExtractedResults): ResultRow {
  return Object.freeze({
    'Model': scenario.model.displayName,
    'Quantization': scenario.model.quantization,
    'Batch Size': scenario.batchSize,
    'Context Length': scenario.contextLength.label,
    'Concurrent Users': scenario.concurrentUsers,
    'VRAM (GB)': extracted.vramGb,
    'Tokens per User (tok/s)': extracted.perUserSpeed,
    'Total Throughput (tok/s)': extracted.totalThroughput
  });
}

/**
 * Differences between the scenario and what the page shows after applying it:
 * the numeric inputs, and the `Batch:` / `Users:` summary (from the results
 * panel, else from the page body). Values the page did not show are skipped.
 */
export function findConfigMismatches(
  scenario: Scenario,
  applied: AppliedConfiguration,
  extracted: Pick<ExtractedResults, 'verifiedBatch' | 'verifiedUsers'>
): string[] {
  const mismatches: string[] = [];
  const inputs: Array<[string, string | null, number]> = [
    ['batch size', applied.batchSize, scenario.batchSize],
    ['sequence length', applied.sequenceLength, scenario.contextLength.tokens],
    ['concurrent users', applied.concurrentUsers, scenario.concurrentUsers]
  ];
  for (const [name, actual, expected] of inputs) {
    if (actual !== null && actual !== String(expected)) {
      mismatches.push(`${name} input holds '${actual}', expected ${expected}`);
    }
  }

  const shownBatch = extracted.verifiedBatch ?? applied.displayedBatch;
  if (shownBatch !== null && shownBatch !== scenario.batchSize) {
    mismatches.push(`page shows Batch: ${shownBatch}, expected ${scenario.batchSize}`);
  }
  const shownUsers = extracted.verifiedUsers ?? applied.displayedUsers;
  if (shownUsers !== null && shownUsers !== scenario.concurrentUsers) {
    mismatches.push(`page shows Users: ${shownUsers}, expected ${scenario.concurrentUsers}`);
  }
  return mismatches;
}

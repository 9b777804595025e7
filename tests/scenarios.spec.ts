import { buildResultRow, describeScenario, enumerateScenarios, findConfigMismatches } from '../collection/scenarios';
import { EMPTY_RESULTS } from '../automation/result-extractor';
import type { AppliedConfiguration } from '../automation/types';
import { test, expect } from '../fixtures/test.fixture';

const lists = {
  models: [
    { displayName: 'A (FP16)', siteName: 'A', quantization: 'FP16' },
    { displayName: 'B (Q8)', siteName: 'B', quantization: 'Q8' }
  ],
  batchSizes: [1, 8],
  contextLengths: [
    { tokens: 2048, label: '2K' },
    { tokens: 32768, label: '32K' }
  ],
  concurrentUsers: [1, 16, 64]
};

test.describe('enumerateScenarios', () => {
  test('yields the full cross product with users varying fastest', () => {
    const scenarios = enumerateScenarios(lists);

    expect(scenarios).toHaveLength(2 * 2 * 2 * 3);
    expect(scenarios.slice(0, 4).map(describeScenario)).toEqual([
      'A (FP16), BS=1, CTX=2K, Users=1',
      'A (FP16), BS=1, CTX=2K, Users=16',
      'A (FP16), BS=1, CTX=2K, Users=64',
      'A (FP16), BS=1, CTX=32K, Users=1'
    ]);
    expect(describeScenario(scenarios[scenarios.length - 1])).toBe('B (Q8), BS=8, CTX=32K, Users=64');
  });

  test('returns frozen scenarios detached from the input lists', () => {
    const [first] = enumerateScenarios(lists);

    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.model)).toBe(true);
    expect(first.model).not.toBe(lists.models[0]);
  });

  test('is empty when any list is empty', () => {
    expect(enumerateScenarios({ ...lists, concurrentUsers: [] })).toEqual([]);
  });
});

test.describe('buildResultRow', () => {
  test('uses the display name and the context label', () => {
    const [first] = enumerateScenarios(lists);
    const row = buildResultRow(first, {
      vramGb: 12.25,
      totalThroughput: 80,
      perUserSpeed: 80,
      verifiedBatch: 1,
      verifiedUsers: 1,
      sharedGb: 12,
      perUserGb: 0.25
    });

    expect(row).toEqual({
      'Model': 'A (FP16)',
      'Quantization': 'FP16',
      'Batch Size': 1,
      'Context Length': '2K',
      'Concurrent Users': 1,
      'VRAM (GB)': 12.25,
      'Tokens per User (tok/s)': 80,
      'Total Throughput (tok/s)': 80
    });
    expect(Object.isFrozen(row)).toBe(true);
  });
});

test.describe('findConfigMismatches', () => {
  const scenario = enumerateScenarios(lists)[4]; // A (FP16), BS=1, CTX=32K, Users=16
  const matching: AppliedConfiguration = {
    model: 'A',
    batchSize: '1',
    sequenceLength: '32768',
    concurrentUsers: '16',
    displayedBatch: 1,
    displayedUsers: 16
  };

  test('finds nothing when the page shows the scenario', () => {
    expect(findConfigMismatches(scenario, matching, { verifiedBatch: 1, verifiedUsers: 16 })).toEqual([]);
  });

  test('reports inputs and the summary line that disagree', () => {
    expect(
      findConfigMismatches(scenario, { ...matching, sequenceLength: '2048' }, { verifiedBatch: 1, verifiedUsers: 4 })
    ).toEqual(["sequence length input holds '2048', expected 32768", 'page shows Users: 4, expected 16']);
  });

  test('falls back to the page body when the panel has no summary line', () => {
    expect(findConfigMismatches(scenario, { ...matching, displayedBatch: 8 }, EMPTY_RESULTS)).toEqual([
      'page shows Batch: 8, expected 1'
    ]);
  });

  test('skips values the page did not show', () => {
    const unread: AppliedConfiguration = {
      model: null,
      batchSize: null,
      sequenceLength: null,
      concurrentUsers: null,
      displayedBatch: null,
      displayedUsers: null
    };
    expect(findConfigMismatches(scenario, unread, EMPTY_RESULTS)).toEqual([]);
  });
});

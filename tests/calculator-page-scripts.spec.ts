/**
 * @file calculator-page-scripts.spec.ts
 * @description In-page scripts rebuilt from their source text, the way page.evaluate ships them,
 *              and run against a minimal document.
 */

import { CALCULATOR_SELECTORS, readAppliedConfigurationInPage } from '../pages/VramCalculatorPage';
import { test, expect } from '../fixtures/test.fixture';

const inputValues: Record<string, string> = {
  [CALCULATOR_SELECTORS.model]: 'Gemma 3 27B',
  [CALCULATOR_SELECTORS.batchSize]: '4',
  [CALCULATOR_SELECTORS.sequenceLength]: '8192'
};

const stubDocument = {
  body: { innerText: 'Performance & Memory Results\nBatch: 4 | Users: 16\n61.37 GB of 141 GB VRAM' },
  querySelector: (selector: string) => {
    const value = inputValues[selector];
    return value === undefined ? null : { value };
  }
};

/** Only the function's own source crosses over; module scope does not. */
function rebuildFromSource(script: (arg: typeof CALCULATOR_SELECTORS) => unknown): Function {
  return new Function('arg', `return (${script.toString()})(arg);`);
}

test.describe('readAppliedConfigurationInPage', () => {
  test.beforeEach(() => {
    Object.defineProperty(globalThis, 'document', { value: stubDocument, configurable: true, writable: true });
  });

  test.afterEach(() => {
    Reflect.deleteProperty(globalThis, 'document');
  });

  test('runs from its source text alone and reads inputs and the summary line', () => {
    const rebuilt = rebuildFromSource(readAppliedConfigurationInPage);

    const applied: unknown = rebuilt(CALCULATOR_SELECTORS);

    expect(applied).toEqual({
      model: 'Gemma 3 27B',
      batchSize: '4',
      sequenceLength: '8192',
      concurrentUsers: null,
      displayedBatch: 4,
      displayedUsers: 16
    });
  });

  test('declares no named helpers inside the script', () => {
    const source = readAppliedConfigurationInPage.toString();
    const body = source.slice(source.indexOf('{'));

    expect(body).not.toMatch(/\b(?:const|let|var)\s+\w+\s*=\s*(?:\([^)]*\)|\w+)\s*=>/);
    expect(body).not.toMatch(/\bfunction\s+\w+\s*\(/);
    expect(body).not.toContain('__name');
  });
});

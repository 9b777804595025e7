/**
 * @file test.fixture.ts
 * @description Wires the in-memory collaborators into every test via Playwright's fixtures.
 *
 * ╔══════════════════════════════════════════════════════════════════════════╗
 * ║  EVERY TEST FILE IMPORTS `test` AND `expect` FROM THIS FILE.           ║
 * ║                                                                        ║
 * ║  None of these fixtures touch `page` or `browser`, so Playwright never ║
 * ║  launches a browser: the calculator is FakeCalculatorPage and delays   ║
 * ║  resolve instantly through RecordingSleep.                             ║
 * ╚══════════════════════════════════════════════════════════════════════════╝
 *
 * @example
 *   import { test, expect } from '../fixtures/test.fixture';
 *
 *   test('selects the model', async ({ calculator, dropdowns }) => {
 *     expect(await dropdowns.select(CALCULATOR_SELECTORS.model, 'Gemma 3 27B')).toBe(true);
 *   });
 */

import { test as base, expect } from '@playwright/test';
import { ConfigurationApplier } from '../automation/ConfigurationApplier';
import { DropdownSelector } from '../automation/DropdownSelector';
import { ValueSetter } from '../automation/ValueSetter';
import { FakeCalculatorPage } from './fake-calculator';
import { MemoryExporter, RecordingLogger, RecordingSleep } from './test-doubles';

type CollectorFixtures = {
  /** Fresh fake page per test, default catalogue, options render immediately. */
  calculator: FakeCalculatorPage;
  clock: RecordingSleep;
  logger: RecordingLogger;
  exporter: MemoryExporter;
  /** DropdownSelector over `calculator`, 2 polls × 3 retries to keep counts readable. */
  dropdowns: DropdownSelector;
  values: ValueSetter;
  applier: ConfigurationApplier;
};

export const test = base.extend<CollectorFixtures>({
  calculator: async ({}, use) => {
    await use(new FakeCalculatorPage());
  },
  clock: async ({}, use) => {
    await use(new RecordingSleep());
  },
  logger: async ({}, use) => {
    await use(new RecordingLogger());
  },
  exporter: async ({}, use) => {
    await use(new MemoryExporter());
  },
  dropdowns: async ({ calculator, logger, clock }, use) => {
    await use(new DropdownSelector(calculator, logger, { pollAttempts: 2, maxRetries: 3 }, clock.sleep));
  },
  values: async ({ calculator, logger, clock }, use) => {
    await use(new ValueSetter(calculator, logger, 500, clock.sleep));
  },
  applier: async ({ dropdowns, values, logger, clock }, use) => {
    await use(new ConfigurationApplier({ dropdowns, values, logger, kvCacheLabel: 'FP16', sleep: clock.sleep }));
  }
});

export { expect };

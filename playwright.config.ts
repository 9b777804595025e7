/**
 * @file playwright.config.ts
 * @description Playwright Test configuration for the collector's test suite.
 *
 * ╔══════════════════════════════════════════════════════════════════════════╗
 * ║  `npm test` RUNS `playwright test`, WHICH READS THIS FILE FIRST.       ║
 * ║                                                                        ║
 * ║  The tests exercise the automation against FakeCalculatorPage, so no   ║
 * ║  test requests the `page` fixture and no browser is ever launched.     ║
 * ║  Browsers are only needed by `npm run collect`.                        ║
 * ╚══════════════════════════════════════════════════════════════════════════╝
 *
 * OUTPUT DIRECTORIES (all under `Reports/`):
 *  - `Reports/playwright-html/` Playwright's built-in HTML report
 *  - `Reports/allure-results/`  raw Allure result files (consumed by the Allure CLI)
 *  - `Reports/test-results/`    per-test output (temporary CSV/JSON written by exporter tests)
 *
 * @see {@link ./fixtures/test.fixture.ts} for the fixtures every test uses
 */

import { defineConfig } from '@playwright/test';

export default defineConfig({
  testDir: './tests',

  /**
   * Tests share nothing but are cheap; one worker keeps the list reporter's
   * output in file order.
   */
  fullyParallel: false,
  workers: 1,

  /** Fail the run in CI if a `test.only()` was left behind. */
  forbidOnly: !!process.env.CI,

  /** Everything is in-process and deterministic, so a failure is never flaky. */
  retries: 0,

  timeout: 15_000,

  reporter: [
    ['list'],
    ['html', { outputFolder: 'Reports/playwright-html', open: 'never' }],
    ['allure-playwright', { resultsDir: 'Reports/allure-results', detail: true, suiteTitle: false }]
  ],

  outputDir: 'Reports/test-results'
});

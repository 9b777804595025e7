/**
 * @file page-observer.ts
 * @description Listens to the calculator page for the whole run and counts
 *              network activity, failed requests and page-side errors.
 *
 * LIFECYCLE:
 *   1. `observePage(page)` right after the session opens attaches the listeners
 *   2. listeners silently accumulate while scenarios run
 *   3. `snapshot()` at the end feeds buildRunSummary()
 *
 * A sudden burst of page errors in the summary usually means the third-party
 * page changed under the collector.
 */

import type { Page } from '@playwright/test';
import type { PageMetrics } from './types';

export interface PageObserver {
  snapshot(): PageMetrics;
}

export function observePage(page: Page): PageObserver {
  let requestCount = 0;
  let requestFailureCount = 0;
  let responseErrorCount = 0;
  const consoleErrors: string[] = [];
  const pageErrors: string[] = [];

  page.on('request', () => {
    requestCount += 1;
  });

  /** DNS, TLS, connection refused... */
  page.on('requestfailed', () => {
    requestFailureCount += 1;
  });

  page.on('response', (response) => {
    if (response.status() >= 400) {
      responseErrorCount += 1;
    }
  });

  page.on('console', (message) => {
    if (message.type() === 'error') {
      consoleErrors.push(message.text());
    }
  });

  page.on('pageerror', (error) => {
    pageErrors.push(error.message);
  });

  return {
    snapshot: () => ({
      requestCount,
      requestFailureCount,
      responseErrorCount,
      consoleErrors: [...consoleErrors],
      pageErrors: [...pageErrors]
    })
  };
}

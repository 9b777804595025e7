/**
 * @file browser-session.ts
 * @description The single browser the collector drives, as an explicitly owned and closed handle.
 *
 * Only one scenario can be live in the calculator's form at a time, so a run
 * owns exactly one page. `withBrowserSession()` is the only way the entry
 * script gets one: the browser is closed on every exit path, whether the work
 * finishes, is interrupted, or throws.
 */

import { chromium, type LaunchOptions, type Page } from '@playwright/test';
import { ACTION_TIMEOUT_MS, NAVIGATION_TIMEOUT_MS } from '../config/timing';

export interface BrowserSessionOptions {
  headless: boolean;
  viewport?: { width: number; height: number };
  actionTimeoutMs?: number;
  navigationTimeoutMs?: number;
}

export interface ClosableSession {
  close(): Promise<void>;
}

export interface BrowserSession extends ClosableSession {
  readonly page: Page;
}

const CHROMIUM_ARGS = ['--disable-gpu', '--no-sandbox', '--disable-dev-shm-usage'];

/**
 * Ctrl+C belongs to the collector, which stops between scenarios and saves a
 * partial file. Playwright's own SIGINT handler would close the browser and
 * exit with 130 first; `withSession` closes the browser instead.
 */
export function chromiumLaunchOptions(headless: boolean): LaunchOptions {
  return { headless, args: [...CHROMIUM_ARGS], handleSIGINT: false };
}

export async function openBrowserSession(options: BrowserSessionOptions): Promise<BrowserSession> {
  const browser = await chromium.launch(chromiumLaunchOptions(options.headless));
  try {
    const context = await browser.newContext({ viewport: options.viewport ?? { width: 1920, height: 1080 } });
    const page = await context.newPage();
    page.setDefaultTimeout(options.actionTimeoutMs ?? ACTION_TIMEOUT_MS);
    page.setDefaultNavigationTimeout(options.navigationTimeoutMs ?? NAVIGATION_TIMEOUT_MS);
    return {
      page,
      close: async () => {
        await browser.close();
      }
    };
  } catch (error) {
    await browser.close();
    throw error;
  }
}

/** Scoped acquisition: `work` runs with the session, which is closed afterwards no matter what. */
export async function withSession<S extends ClosableSession, T>(
  open: () => Promise<S>,
  work: (session: S) => Promise<T>
): Promise<T> {
  const session = await open();
  try {
    return await work(session);
  } finally {
    await session.close();
  }
}

export function withBrowserSession<T>(
  options: BrowserSessionOptions,
  work: (session: BrowserSession) => Promise<T>
): Promise<T> {
  return withSession(() => openBrowserSession(options), work);
}

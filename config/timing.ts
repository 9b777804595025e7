/**
 * @file timing.ts
 * @description Every delay and polling bound used against the calculator page.
 *
 * The host page updates asynchronously and exposes no "done" signal, so each
 * UI step waits out one of these values before the next one starts.
 */

/** Pause after each successful field change. */
export const OPERATION_DELAY_MS = 500;

/** Pause after navigation before looking for the form. */
export const PAGE_LOAD_DELAY_MS = 3_000;

/** Maximum wait for the model combo-box to appear after navigation. */
export const PAGE_READY_TIMEOUT_MS = 30_000;

/** Settle delay between applying a scenario and reading its results. */
export const RESULT_UPDATE_DELAY_MS = 1_500;

/** Pause between two scenarios. */
export const BETWEEN_SCENARIOS_DELAY_MS = 200;

// ---------------------------------------------------------------------------
//  Dropdown selection protocol
//  One attempt = type the label, then probe for the option
//  OPTION_POLL_ATTEMPTS times, OPTION_POLL_INTERVAL_MS apart (~1 s in total).
// ---------------------------------------------------------------------------

export const OPTION_POLL_INTERVAL_MS = 100;
export const OPTION_POLL_ATTEMPTS = 10;
export const DROPDOWN_MAX_RETRIES = 3;
export const DROPDOWN_RETRY_DELAY_MS = 300;

/** Playwright defaults for the live session. */
export const ACTION_TIMEOUT_MS = 10_000;
export const NAVIGATION_TIMEOUT_MS = 45_000;

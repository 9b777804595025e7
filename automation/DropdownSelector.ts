/**
 * @file DropdownSelector.ts
 * @description Selects a labelled option in a searchable combo-box whose option
 *              list only exists after the page has re-filtered it.
 *
 * ╔══════════════════════════════════════════════════════════════════════════╗
 * ║  ONE ATTEMPT                                                           ║
 * ║                                                                        ║
 * ║   type label ──► poll for option ──► click ──► operation delay ──► ✔   ║
 * ║        │               │ (pollAttempts × pollIntervalMs)               ║
 * ║        │               └── nothing rendered ──► retry delay ──► again  ║
 * ║        └── input missing ──► ✘ (no retry)                              ║
 * ║                                                                        ║
 * ║  After maxRetries attempts without a match ──► ✘                       ║
 * ╚══════════════════════════════════════════════════════════════════════════╝
 *
 * Options render asynchronously after the input changes, so a single query
 * right after typing races the page. Retrying the whole cycle, typing
 * included, also covers the case where the first insert was not picked up by
 * the page's listeners.
 *
 * Matching is by substring and the first option in document order wins. A
 * label that is contained in another option's text (e.g. "Qwen3-30B" inside
 * "Qwen3-30B-A3B") can select the wrong one; callers pass labels specific
 * enough to be unambiguous.
 */

import {
  DROPDOWN_MAX_RETRIES,
  DROPDOWN_RETRY_DELAY_MS,
  OPERATION_DELAY_MS,
  OPTION_POLL_ATTEMPTS,
  OPTION_POLL_INTERVAL_MS
} from '../config/timing';
import type { Logger } from '../observability/logger';
import { realSleep } from './sleep';
import type { ComboboxDriver, Sleep } from './types';

export interface DropdownTiming {
  pollIntervalMs: number;
  pollAttempts: number;
  maxRetries: number;
  retryDelayMs: number;
  /** Wait after a successful click before the next field is touched. */
  afterSelectDelayMs: number;
}

export const DEFAULT_DROPDOWN_TIMING: DropdownTiming = {
  pollIntervalMs: OPTION_POLL_INTERVAL_MS,
  pollAttempts: OPTION_POLL_ATTEMPTS,
  maxRetries: DROPDOWN_MAX_RETRIES,
  retryDelayMs: DROPDOWN_RETRY_DELAY_MS,
  afterSelectDelayMs: OPERATION_DELAY_MS
};

export type SelectionOutcome =
  | { status: 'selected'; label: string; attempts: number }
  | { status: 'input-missing' }
  | { status: 'not-found'; attempts: number };

export class DropdownSelector {
  private readonly timing: DropdownTiming;

  constructor(
    private readonly driver: ComboboxDriver,
    private readonly logger: Logger,
    timing: Partial<DropdownTiming> = {},
    private readonly sleep: Sleep = realSleep
  ) {
    this.timing = { ...DEFAULT_DROPDOWN_TIMING, ...timing };
    if (!Number.isInteger(this.timing.maxRetries) || this.timing.maxRetries < 1) {
      throw new RangeError(`maxRetries must be a positive integer, got ${this.timing.maxRetries}`);
    }
    if (!Number.isInteger(this.timing.pollAttempts) || this.timing.pollAttempts < 1) {
      throw new RangeError(`pollAttempts must be a positive integer, got ${this.timing.pollAttempts}`);
    }
  }

  async select(selector: string, label: string): Promise<boolean> {
    const outcome = await this.trySelect(selector, label);
    return outcome.status === 'selected';
  }

  async trySelect(selector: string, label: string): Promise<SelectionOutcome> {
    const { maxRetries, pollAttempts, pollIntervalMs, retryDelayMs, afterSelectDelayMs } = this.timing;

    for (let attempt = 1; attempt <= maxRetries; attempt += 1) {
      const typed = await this.driver.typeIntoCombobox(selector, label);
      if (typed === 'input-missing') {
        this.logger.warn(`Input not found: ${selector}`);
        return { status: 'input-missing' };
      }

      let optionCount = 0;
      for (let poll = 0; poll < pollAttempts; poll += 1) {
        await this.sleep(pollIntervalMs);
        const probe = await this.driver.clickMatchingOption(label);
        if (probe.matched) {
          await this.sleep(afterSelectDelayMs);
          return { status: 'selected', label: probe.label, attempts: attempt };
        }
        optionCount = probe.optionCount;
      }

      this.logger.warn(`Attempt ${attempt}: option '${label}' not found in dropdown (${optionCount} options rendered)`);
      if (attempt < maxRetries) {
        await this.sleep(retryDelayMs);
      }
    }

    this.logger.warn(`Failed to select '${label}' after ${maxRetries} attempts`);
    return { status: 'not-found', attempts: maxRetries };
  }
}

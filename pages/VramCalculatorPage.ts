/**
 * @file VramCalculatorPage.ts
 * @description Page Object Model (POM) class for the third-party VRAM calculator page.
 *
 * ╔══════════════════════════════════════════════════════════════════════════╗
 * ║  THIS IS THE ONLY FILE THAT KNOWS THE HOST PAGE'S MARKUP.              ║
 * ║                                                                        ║
 * ║  Selectors, option classes, the results heading and the in-page       ║
 * ║  scripts all live here. When the calculator changes its HTML, fix it   ║
 * ║  HERE; the automation in automation/ only sees CalculatorDriver.       ║
 * ╚══════════════════════════════════════════════════════════════════════════╝
 *
 * The form is a React/Mantine app. Setting `input.value` directly does not
 * reach React's state, so every write goes through `document.execCommand`
 * (`delete` then `insertText`), which the page treats as user typing, followed
 * by the `input` (and for plain fields `change`) events it listens for.
 *
 * @see {@link ../automation/types.ts} for the driver contract implemented here
 * @see {@link ../fixtures/fake-calculator.ts} for the in-memory stand-in used by tests
 */

import { errors, type Locator, type Page } from '@playwright/test';
import { PAGE_LOAD_DELAY_MS, PAGE_READY_TIMEOUT_MS } from '../config/timing';
import type { Logger } from '../observability/logger';
import type {
  AppliedConfiguration,
  CalculatorDriver,
  ModeToggleOutcome,
  OptionProbe,
  TypeOutcome,
  ValueWriteOutcome
} from '../automation/types';

/**
 * Placeholder-based selectors. Placeholders have stayed stable across
 * redesigns of the page, unlike its generated class names.
 */
export const CALCULATOR_SELECTORS = {
  model: 'input[placeholder="Choose a model"]',
  quantization: 'input[placeholder="Select quantization"]',
  kvCache: 'input[placeholder="Select KV cache precision"]',
  hardware: 'input[placeholder="Select Hardware"]',
  batchSize: 'input[placeholder="Enter batch size"]',
  sequenceLength: 'input[placeholder="Enter sequence length"]',
  concurrentUsers: 'input[placeholder="Enter number of concurrent users"]'
} as const;

/** Rendered combo-box options (Mantine class, plus the ARIA role as a fallback). */
export const OPTION_SELECTOR = '.mantine-Select-option, [role="option"]';

/** Exact text of the element heading the results panel. */
export const RESULTS_HEADING = 'Performance & Memory Results';

export type CalculatorSelectors = typeof CALCULATOR_SELECTORS;

/**
 * Runs inside the page, so it is declared at module level where it can be
 * tested on its own. Inner lookups stay inline: no named inner functions.
 */
export function readAppliedConfigurationInPage(selectors: CalculatorSelectors): AppliedConfiguration {
  const body = document.body.innerText;
  const batchMatch = body.match(/Batch:\s*(\d+)/);
  const usersMatch = body.match(/Users:\s*(\d+)/);
  return {
    model: document.querySelector<HTMLInputElement>(selectors.model)?.value ?? null,
    batchSize: document.querySelector<HTMLInputElement>(selectors.batchSize)?.value ?? null,
    sequenceLength: document.querySelector<HTMLInputElement>(selectors.sequenceLength)?.value ?? null,
    concurrentUsers: document.querySelector<HTMLInputElement>(selectors.concurrentUsers)?.value ?? null,
    displayedBatch: batchMatch ? Number.parseInt(batchMatch[1], 10) : null,
    displayedUsers: usersMatch ? Number.parseInt(usersMatch[1], 10) : null
  };
}

export interface VramCalculatorPageOptions {
  url: string;
  logger: Logger;
}

export class VramCalculatorPage implements CalculatorDriver {
  private readonly page: Page;
  private readonly url: string;
  private readonly logger: Logger;

  /** The model combo-box; its presence means the form has rendered. */
  readonly modelInput: Locator;

  constructor(page: Page, options: VramCalculatorPageOptions) {
    this.page = page;
    this.url = options.url;
    this.logger = options.logger;
    this.modelInput = page.locator(CALCULATOR_SELECTORS.model);
  }

  // -------------------------------------------------------------------------
  //  Navigation
  // -------------------------------------------------------------------------

  /**
   * Navigate to the calculator and wait for the form.
   * A form that never shows up is logged, not thrown: the first dropdown
   * selection reports the missing input with a clearer message.
   */
  async open(): Promise<void> {
    this.logger.info(`Navigating to ${this.url}...`);
    await this.page.goto(this.url, { waitUntil: 'domcontentloaded' });
    await this.page.waitForTimeout(PAGE_LOAD_DELAY_MS);

    try {
      await this.modelInput.waitFor({ state: 'attached', timeout: PAGE_READY_TIMEOUT_MS });
      this.logger.info('Page loaded successfully');
    } catch (error) {
      if (!(error instanceof errors.TimeoutError)) {
        throw error;
      }
      this.logger.warn('Page load timeout, continuing anyway');
    }
  }

  /** Flip the "Slider / Manual" toggle so numeric fields accept typed values. */
  async switchToManualMode(): Promise<ModeToggleOutcome> {
    const outcome = await this.page.evaluate((): ModeToggleOutcome => {
      const labels = Array.from(document.querySelectorAll('label'));
      const toggleLabel = labels.find((label) => {
        const text = label.textContent ?? '';
        return text.includes('Manual') || text.includes('Slider');
      });
      const input = toggleLabel?.querySelector('input');
      if (!input) {
        return 'toggle-missing';
      }
      if (input.checked) {
        return 'already-manual';
      }
      input.click();
      return 'switched';
    });
    this.logger.info(`Mode toggle: ${outcome}`);
    return outcome;
  }

  // -------------------------------------------------------------------------
  //  CalculatorDriver
  //  Each method is a single page.evaluate() round trip. Arguments travel as
  //  serialised values, never spliced into script source.
  //  Callbacks are shipped to the browser as source text: they must not
  //  declare named inner functions, since the tsx loader wraps those in a
  //  `__name()` helper that only exists in Node.
  // -------------------------------------------------------------------------

  async typeIntoCombobox(selector: string, text: string): Promise<TypeOutcome> {
    return this.page.evaluate(({ selector, text }): TypeOutcome => {
      const input = document.querySelector<HTMLInputElement>(selector);
      if (!input) {
        return 'input-missing';
      }
      input.click();
      input.focus();
      input.select();
      document.execCommand('delete');
      document.execCommand('insertText', false, text);
      input.dispatchEvent(new Event('input', { bubbles: true }));
      return 'typed';
    }, { selector, text });
  }

  async clickMatchingOption(text: string): Promise<OptionProbe> {
    return this.page.evaluate(({ text, optionSelector }): OptionProbe => {
      const options = Array.from(document.querySelectorAll<HTMLElement>(optionSelector));
      for (const option of options) {
        const label = (option.textContent ?? '').trim();
        if (label.includes(text)) {
          option.click();
          return { matched: true, label };
        }
      }
      return { matched: false, optionCount: options.length };
    }, { text, optionSelector: OPTION_SELECTOR });
  }

  async setInputValue(selector: string, value: string): Promise<ValueWriteOutcome> {
    return this.page.evaluate(({ selector, value }): ValueWriteOutcome => {
      const input = document.querySelector<HTMLInputElement>(selector);
      if (!input) {
        return { found: false };
      }
      input.focus();
      input.select();
      document.execCommand('delete');
      document.execCommand('insertText', false, value);
      // Some of the page's fields recompute on `input`, others only on `change`.
      input.dispatchEvent(new Event('input', { bubbles: true }));
      input.dispatchEvent(new Event('change', { bubbles: true }));
      input.blur();
      return { found: true, value: input.value };
    }, { selector, value });
  }

  /** innerText of the heading's parent container, or null when the heading is absent. */
  async readResultsText(): Promise<string | null> {
    return this.page.evaluate((heading) => {
      const candidates = Array.from(document.querySelectorAll<HTMLElement>('p, h1, h2, h3, h4, span, div'));
      const header = candidates.find((element) => (element.textContent ?? '').trim() === heading);
      const container = header?.parentElement;
      return container ? container.innerText : null;
    }, RESULTS_HEADING);
  }

  async readAppliedConfiguration(): Promise<AppliedConfiguration> {
    return this.page.evaluate(readAppliedConfigurationInPage, CALCULATOR_SELECTORS);
  }
}

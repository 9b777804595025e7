/**
 * @file types.ts
 * @description The seams between the automation logic and the calculator page.
 *
 * `pages/VramCalculatorPage.ts` implements these against a live Playwright page;
 * `fixtures/fake-calculator.ts` implements them in memory for the tests.
 */

/** Result of typing a label into a combo-box. */
export type TypeOutcome = 'typed' | 'input-missing';

/** One look at the rendered option list. A match has already been clicked. */
export type OptionProbe =
  | { matched: true; label: string }
  | { matched: false; optionCount: number };

export type ValueWriteOutcome =
  | { found: true; value: string }
  | { found: false };

export type ModeToggleOutcome = 'switched' | 'already-manual' | 'toggle-missing';

/** What the page currently shows, read back after a scenario is applied. */
export interface AppliedConfiguration {
  model: string | null;
  batchSize: string | null;
  sequenceLength: string | null;
  concurrentUsers: string | null;
  /** `Batch: N` from the page summary line. */
  displayedBatch: number | null;
  /** `Users: N` from the page summary line. */
  displayedUsers: number | null;
}

export interface ComboboxDriver {
  /** Clear the combo-box and insert `text` the way a typing user would. */
  typeIntoCombobox(selector: string, text: string): Promise<TypeOutcome>;
  /** Click the first rendered option whose text contains `text`, if any. */
  clickMatchingOption(text: string): Promise<OptionProbe>;
}

export interface FieldDriver {
  setInputValue(selector: string, value: string): Promise<ValueWriteOutcome>;
}

export interface CalculatorDriver extends ComboboxDriver, FieldDriver {
  /** Text of the results panel, or null when its heading is not on the page. */
  readResultsText(): Promise<string | null>;
  readAppliedConfiguration(): Promise<AppliedConfiguration>;
}

export type Sleep = (ms: number) => Promise<void>;

/**
 * @file fake-calculator.ts
 * @description In-memory stand-in for VramCalculatorPage, used by every test instead of a browser.
 *
 * It mimics the two behaviours the automation has to cope with:
 *
 *   • Asynchronous option rendering: after typing, the filtered option list
 *     only appears once `optionRenderDelay` probes have been made.
 *   • Dropped keystrokes: the first `ignoredTypings` typing calls do not
 *     register, so no options ever render for them.
 *
 * Results are derived from the current form values with a simple formula, so
 * changing the user count changes the VRAM figure the way the real page does.
 */

import type {
  AppliedConfiguration,
  CalculatorDriver,
  OptionProbe,
  TypeOutcome,
  ValueWriteOutcome
} from '../automation/types';
import { CALCULATOR_SELECTORS, RESULTS_HEADING } from '../pages/VramCalculatorPage';

export interface FakeCalculatorOptions {
  /** Option catalogue per combo-box selector. */
  options?: Partial<Record<string, string[]>>;
  /** Probes needed after typing before options show up. */
  optionRenderDelay?: number;
  /** Typing calls to drop before one registers. */
  ignoredTypings?: number;
  /** Selectors that are not on the page at all. */
  missingSelectors?: string[];
  /** Raw panel text to return instead of the computed one; null hides the panel. */
  resultsText?: string | null;
  /** Throw this from readResultsText() on the given 1-based read. */
  failOnResultsRead?: { read: number; error: Error };
  /** Plain inputs that silently keep their previous value. */
  readOnlySelectors?: string[];
}

export const DEFAULT_OPTIONS: Record<string, string[]> = {
  [CALCULATOR_SELECTORS.model]: ['Qwen3-32B', 'Qwen3-30B-A3B', 'Gemma 3 27B', 'Qwen2.5-14B'],
  [CALCULATOR_SELECTORS.quantization]: ['FP16', 'Q8', 'Q4_K_M'],
  [CALCULATOR_SELECTORS.kvCache]: ['FP16 / BF16 (Default)', 'FP8', 'INT4'],
  [CALCULATOR_SELECTORS.hardware]: ['H100 (80GB)', 'H200 (141GB)', 'RTX 4090 (24GB)']
};

/** Model weights in GB used by the computed results. */
const MODEL_WEIGHTS_GB: Record<string, number> = {
  'Qwen3-32B': 34,
  'Qwen3-30B-A3B': 32,
  'Gemma 3 27B': 54,
  'Qwen2.5-14B': 29.5
};

export class FakeCalculatorPage implements CalculatorDriver {
  readonly typings: Array<{ selector: string; text: string }> = [];
  probeCount = 0;
  resultsReads = 0;

  private readonly catalogue: Partial<Record<string, string[]>>;
  private readonly optionRenderDelay: number;
  private ignoredTypings: number;
  private readonly missing: Set<string>;
  private readonly readOnly: Set<string>;
  private readonly values = new Map<string, string>();
  private active: { selector: string; filter: string; probesSinceTyping: number } | null = null;

  constructor(private readonly config: FakeCalculatorOptions = {}) {
    this.catalogue = { ...DEFAULT_OPTIONS, ...config.options };
    this.optionRenderDelay = config.optionRenderDelay ?? 0;
    this.ignoredTypings = config.ignoredTypings ?? 0;
    this.missing = new Set(config.missingSelectors ?? []);
    this.readOnly = new Set(config.readOnlySelectors ?? []);
    for (const selector of Object.values(CALCULATOR_SELECTORS)) {
      this.values.set(selector, '');
    }
  }

  valueOf(selector: string): string | null {
    return this.missing.has(selector) ? null : this.values.get(selector) ?? null;
  }

  async typeIntoCombobox(selector: string, text: string): Promise<TypeOutcome> {
    if (this.missing.has(selector)) {
      return 'input-missing';
    }
    this.typings.push({ selector, text });
    this.values.set(selector, text);
    if (this.ignoredTypings > 0) {
      this.ignoredTypings -= 1;
      this.active = null;
      return 'typed';
    }
    this.active = { selector, filter: text, probesSinceTyping: 0 };
    return 'typed';
  }

  async clickMatchingOption(text: string): Promise<OptionProbe> {
    this.probeCount += 1;
    const active = this.active;
    if (!active) {
      return { matched: false, optionCount: 0 };
    }
    active.probesSinceTyping += 1;
    if (active.probesSinceTyping <= this.optionRenderDelay) {
      return { matched: false, optionCount: 0 };
    }

    const rendered = (this.catalogue[active.selector] ?? []).filter((option) =>
      option.toLowerCase().includes(active.filter.toLowerCase())
    );
    const match = rendered.find((option) => option.includes(text));
    if (!match) {
      return { matched: false, optionCount: rendered.length };
    }
    this.values.set(active.selector, match);
    this.active = null;
    return { matched: true, label: match };
  }

  async setInputValue(selector: string, value: string): Promise<ValueWriteOutcome> {
    if (this.missing.has(selector)) {
      return { found: false };
    }
    if (!this.readOnly.has(selector)) {
      this.values.set(selector, value);
    }
    return { found: true, value: this.values.get(selector) ?? '' };
  }

  async readResultsText(): Promise<string | null> {
    this.resultsReads += 1;
    const failure = this.config.failOnResultsRead;
    if (failure && failure.read === this.resultsReads) {
      throw failure.error;
    }
    if (this.config.resultsText !== undefined) {
      return this.config.resultsText;
    }
    return this.computeResultsText();
  }

  async readAppliedConfiguration(): Promise<AppliedConfiguration> {
    return {
      model: this.valueOf(CALCULATOR_SELECTORS.model),
      batchSize: this.valueOf(CALCULATOR_SELECTORS.batchSize),
      sequenceLength: this.valueOf(CALCULATOR_SELECTORS.sequenceLength),
      concurrentUsers: this.valueOf(CALCULATOR_SELECTORS.concurrentUsers),
      displayedBatch: this.numberAt(CALCULATOR_SELECTORS.batchSize),
      displayedUsers: this.numberAt(CALCULATOR_SELECTORS.concurrentUsers)
    };
  }

  private numberAt(selector: string): number | null {
    const raw = this.valueOf(selector);
    const value = raw ? Number.parseInt(raw, 10) : Number.NaN;
    return Number.isNaN(value) ? null : value;
  }

  /**
   * VRAM = weights + 0.25 GB per (batch × users × 1K tokens of context).
   * Per-user speed = 40 / batch, total = per-user × users.
   */
  private computeResultsText(): string {
    const weights = MODEL_WEIGHTS_GB[this.valueOf(CALCULATOR_SELECTORS.model) ?? ''] ?? 20;
    const batch = this.numberAt(CALCULATOR_SELECTORS.batchSize) ?? 1;
    const users = this.numberAt(CALCULATOR_SELECTORS.concurrentUsers) ?? 1;
    const tokens = this.numberAt(CALCULATOR_SELECTORS.sequenceLength) ?? 2048;

    const perUserGb = 0.25 * batch * (tokens / 1024);
    const vram = weights + perUserGb * users;
    const perUserSpeed = 40 / batch;

    return [
      RESULTS_HEADING,
      `Batch: ${batch} | Users: ${users}`,
      `${vram.toFixed(2)} GB of 141 GB VRAM`,
      `${weights.toFixed(2)} GB shared + ${perUserGb.toFixed(2)} GB per user`,
      `Generation Speed: ~${perUserSpeed.toFixed(1)} tok/s`,
      `Total Throughput: ~${(perUserSpeed * users).toFixed(1)} tok/s`
    ].join('\n');
  }
}

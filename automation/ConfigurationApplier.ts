/**
 * @file ConfigurationApplier.ts
 * @description Puts one Scenario into the calculator form, field by field.
 *
 * Order: model → quantization → KV cache → batch size → context length → users.
 * Changing the model resets dependent fields on the page, so it goes first.
 * A failed step is logged and recorded; the remaining steps still run and
 * nothing is rolled back.
 */

import { RESULT_UPDATE_DELAY_MS } from '../config/timing';
import { CALCULATOR_SELECTORS } from '../pages/VramCalculatorPage';
import type { Scenario } from '../collection/types';
import type { Logger } from '../observability/logger';
import type { DropdownSelector } from './DropdownSelector';
import { realSleep } from './sleep';
import type { Sleep } from './types';
import type { ValueSetter } from './ValueSetter';

export type ScenarioField =
  | 'model'
  | 'quantization'
  | 'kvCache'
  | 'batchSize'
  | 'contextLength'
  | 'concurrentUsers';

export interface ApplyStep {
  field: ScenarioField;
  ok: boolean;
}

export interface ApplyReport {
  steps: ApplyStep[];
  failedFields: ScenarioField[];
}

export interface ConfigurationApplierOptions {
  dropdowns: DropdownSelector;
  values: ValueSetter;
  logger: Logger;
  /** Label typed into the KV-cache combo-box for every scenario. */
  kvCacheLabel: string;
  settleDelayMs?: number;
  sleep?: Sleep;
}

export class ConfigurationApplier {
  private readonly dropdowns: DropdownSelector;
  private readonly values: ValueSetter;
  private readonly logger: Logger;
  private readonly kvCacheLabel: string;
  private readonly settleDelayMs: number;
  private readonly sleep: Sleep;

  constructor(options: ConfigurationApplierOptions) {
    this.dropdowns = options.dropdowns;
    this.values = options.values;
    this.logger = options.logger;
    this.kvCacheLabel = options.kvCacheLabel;
    this.settleDelayMs = options.settleDelayMs ?? RESULT_UPDATE_DELAY_MS;
    this.sleep = options.sleep ?? realSleep;
  }

  /** Hardware is chosen once per session, before the first scenario. */
  async applyHardware(label: string): Promise<boolean> {
    this.logger.info(`Selecting hardware: ${label}`);
    return this.dropdowns.select(CALCULATOR_SELECTORS.hardware, label);
  }

  async apply(scenario: Scenario): Promise<ApplyReport> {
    const { model, batchSize, contextLength, concurrentUsers } = scenario;
    const steps: ApplyStep[] = [];

    const record = (field: ScenarioField, ok: boolean): void => {
      steps.push({ field, ok });
      if (!ok) {
        this.logger.warn(`Step '${field}' failed; continuing with the remaining fields`);
      }
    };

    this.logger.info(`Selecting model: ${model.siteName}`);
    record('model', await this.dropdowns.select(CALCULATOR_SELECTORS.model, model.siteName));

    this.logger.info(`Selecting quantization: ${model.quantization}`);
    record('quantization', await this.dropdowns.select(CALCULATOR_SELECTORS.quantization, model.quantization));

    this.logger.info(`Selecting KV cache: ${this.kvCacheLabel}`);
    record('kvCache', await this.dropdowns.select(CALCULATOR_SELECTORS.kvCache, this.kvCacheLabel));

    record('batchSize', await this.values.set(CALCULATOR_SELECTORS.batchSize, batchSize, 'batch size'));
    record(
      'contextLength',
      await this.values.set(CALCULATOR_SELECTORS.sequenceLength, contextLength.tokens, 'sequence length')
    );
    record(
      'concurrentUsers',
      await this.values.set(CALCULATOR_SELECTORS.concurrentUsers, concurrentUsers, 'concurrent users')
    );

    await this.sleep(this.settleDelayMs);

    return {
      steps,
      failedFields: steps.filter((step) => !step.ok).map((step) => step.field)
    };
  }
}

/**
 * @file ValueSetter.ts
 * @description Writes an integer into a plain numeric input and confirms the page kept it.
 */

import { OPERATION_DELAY_MS } from '../config/timing';
import type { Logger } from '../observability/logger';
import { realSleep } from './sleep';
import type { FieldDriver, Sleep } from './types';

export class ValueSetter {
  constructor(
    private readonly driver: FieldDriver,
    private readonly logger: Logger,
    private readonly afterWriteDelayMs: number = OPERATION_DELAY_MS,
    private readonly sleep: Sleep = realSleep
  ) {}

  /**
   * Returns false when the input is missing or holds something other than
   * `value` afterwards. `fieldName` is only used in log lines.
   */
  async set(selector: string, value: number, fieldName: string): Promise<boolean> {
    if (!Number.isInteger(value)) {
      throw new RangeError(`${fieldName} must be an integer, got ${value}`);
    }

    const expected = String(value);
    const outcome = await this.driver.setInputValue(selector, expected);
    await this.sleep(this.afterWriteDelayMs);

    if (!outcome.found) {
      this.logger.warn(`Failed to set ${fieldName}: input not found (${selector})`);
      return false;
    }
    if (outcome.value !== expected) {
      this.logger.warn(`Failed to set ${fieldName}: expected '${expected}', input holds '${outcome.value}'`);
      return false;
    }
    return true;
  }
}

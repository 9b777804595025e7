/**
 * @file csv-exporter.ts
 * @description Writes result rows as a comma-separated file, one line per scenario.
 *
 * FILE NAMES (under the configured output directory):
 *   complete  →  vram_results_YYYYMMDD_HHMMSS.csv
 *   partial   →  vram_results_partial.csv   (run was interrupted)
 *   error     →  vram_results_error.csv     (session failed mid-run)
 */

import path from 'node:path';
import { promises as fs } from 'node:fs';
import type { Logger } from '../observability/logger';
import { RESULT_COLUMNS, type ResultExporter, type ResultRow, type RunOutcome } from './types';

function escapeCell(value: string | number | null): string {
  if (value === null) {
    return '';
  }
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: readonly ResultRow[]): string {
  const lines = [RESULT_COLUMNS.map(escapeCell).join(',')];
  for (const row of rows) {
    lines.push(RESULT_COLUMNS.map((column) => escapeCell(row[column])).join(','));
  }
  return lines.join('\n') + '\n';
}

/** Local time as YYYYMMDD_HHMMSS. */
export function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function exportFileName(outcome: RunOutcome, now: Date): string {
  switch (outcome) {
    case 'complete':
      return `vram_results_${formatTimestamp(now)}.csv`;
    case 'partial':
      return 'vram_results_partial.csv';
    case 'error':
      return 'vram_results_error.csv';
  }
}

export class CsvResultExporter implements ResultExporter {
  constructor(
    private readonly outputDir: string,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async export(rows: readonly ResultRow[], outcome: RunOutcome): Promise<string | null> {
    if (rows.length === 0) {
      this.logger.warn('No results to save');
      return null;
    }

    await fs.mkdir(this.outputDir, { recursive: true });
    const filePath = path.join(this.outputDir, exportFileName(outcome, this.now()));
    await fs.writeFile(filePath, toCsv(rows), 'utf-8');
    this.logger.info(`Results saved to ${filePath} (${rows.length} rows)`);
    return filePath;
  }
}

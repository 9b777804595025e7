/**
 * @file result-extractor.ts
 * @description Parses the results panel text into numbers.
 *
 * Pure: takes the panel's innerText (as captured by
 * VramCalculatorPage.readResultsText) so the patterns can be tested against
 * saved text without a browser. When the page rewords a label, the pattern
 * here is the only thing to update.
 */

import type { ExtractedResults } from '../collection/types';

const NUMBER = String.raw`(\d+(?:[.,]\d+)?)`;

/** "54.12 GB of 141 GB VRAM" */
const VRAM_PATTERN = /(\d+[.,]\d+)\s*GB\s*of/i;
const TOTAL_THROUGHPUT_PATTERN = new RegExp(String.raw`Total Throughput:\s*~?${NUMBER}\s*tok\/s`, 'i');
const PER_USER_PATTERNS = [
  new RegExp(String.raw`Per-User Speed:\s*~?${NUMBER}\s*tok\/s`, 'i'),
  new RegExp(String.raw`Generation Speed:\s*~?${NUMBER}\s*tok\/s`, 'i')
];
const BATCH_PATTERN = /Batch:\s*(\d+)/;
const USERS_PATTERN = /Users:\s*(\d+)/;
/** "52.40 GB shared + 0.43 GB per user" */
const BREAKDOWN_PATTERN = /(\d+[.,]\d+)\s*GB\s*shared\s*\+\s*(\d+[.,]\d+)\s*GB\s*per\s*user/i;

export const EMPTY_RESULTS: Readonly<ExtractedResults> = Object.freeze({
  vramGb: null,
  totalThroughput: null,
  perUserSpeed: null,
  verifiedBatch: null,
  verifiedUsers: null,
  sharedGb: null,
  perUserGb: null
});

/** The page renders some locales with a decimal comma. */
function toNumber(captured: string | undefined): number | null {
  if (captured === undefined) {
    return null;
  }
  const value = Number.parseFloat(captured.replace(',', '.'));
  return Number.isFinite(value) ? value : null;
}

function firstCapture(text: string, patterns: readonly RegExp[]): number | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) {
      return toNumber(match[1]);
    }
  }
  return null;
}

/** A null text (results heading not found) gives every field as null. */
export function extractResults(text: string | null): ExtractedResults {
  if (text === null) {
    return { ...EMPTY_RESULTS };
  }

  const breakdown = BREAKDOWN_PATTERN.exec(text);
  return {
    vramGb: firstCapture(text, [VRAM_PATTERN]),
    totalThroughput: firstCapture(text, [TOTAL_THROUGHPUT_PATTERN]),
    perUserSpeed: firstCapture(text, PER_USER_PATTERNS),
    verifiedBatch: firstCapture(text, [BATCH_PATTERN]),
    verifiedUsers: firstCapture(text, [USERS_PATTERN]),
    sharedGb: breakdown ? toNumber(breakdown[1]) : null,
    perUserGb: breakdown ? toNumber(breakdown[2]) : null
  };
}

export function hasMissingFields(results: Pick<ExtractedResults, 'vramGb' | 'totalThroughput' | 'perUserSpeed'>): boolean {
  return results.vramGb === null || results.totalThroughput === null || results.perUserSpeed === null;
}

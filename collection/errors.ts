import type { CollectionOutcome } from './CollectionRunner';

/**
 * Raised when the browser session fails mid-run (page crash, navigation
 * failure, closed target). The rows collected before the failure have
 * already been handed to the exporter; `outcome` describes them.
 */
export class SessionFailureError extends Error {
  constructor(
    readonly outcome: CollectionOutcome,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Collection aborted after ${outcome.rows.length} rows: ${reason}`, { cause });
    this.name = 'SessionFailureError';
  }
}

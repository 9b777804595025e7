/**
 * @file logger.ts
 * @description Console logging with a bracketed scope prefix, e.g. `[dropdown] Attempt 2: ...`.
 *
 * Components take a `Logger` instead of calling `console` directly so tests can
 * record what was logged.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export function createConsoleLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message, error) => {
      if (error === undefined) {
        console.error(`${prefix} ${message}`);
        return;
      }
      const detail = error instanceof Error ? error.stack ?? error.message : String(error);
      console.error(`${prefix} ${message}\n${detail}`);
    }
  };
}

import type { Sleep } from '../automation/types';
import type { Logger } from '../observability/logger';
import type { ResultExporter, ResultRow, RunOutcome } from '../collection/types';

/** Resolves immediately and remembers every requested delay. */
export class RecordingSleep {
  readonly calls: number[] = [];

  readonly sleep: Sleep = async (ms) => {
    this.calls.push(ms);
  };

  get totalMs(): number {
    return this.calls.reduce((sum, ms) => sum + ms, 0);
  }
}

export interface LogLine {
  level: 'info' | 'warn' | 'error';
  message: string;
}

export class RecordingLogger implements Logger {
  readonly lines: LogLine[] = [];

  info(message: string): void {
    this.lines.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.lines.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.lines.push({ level: 'error', message });
  }

  messages(level: LogLine['level']): string[] {
    return this.lines.filter((line) => line.level === level).map((line) => line.message);
  }
}

/** Keeps exported batches in memory; `path` is what export() reports back. */
export class MemoryExporter implements ResultExporter {
  readonly exports: Array<{ rows: ResultRow[]; outcome: RunOutcome }> = [];

  async export(rows: readonly ResultRow[], outcome: RunOutcome): Promise<string | null> {
    if (rows.length === 0) {
      return null;
    }
    this.exports.push({ rows: [...rows], outcome });
    return `memory://${outcome}`;
  }
}

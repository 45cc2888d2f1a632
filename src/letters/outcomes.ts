import chalk from 'chalk';

export type FileStatus = 'ok' | 'error' | 'skipped';

export interface FileOutcome {
  file: string;
  status: FileStatus;
  detail: string;
}

export type ProgressCallback = (done: number, total: number) => void;

export function summarizeOutcomes(outcomes: readonly FileOutcome[]): Record<FileStatus, number> {
  const counts: Record<FileStatus, number> = { ok: 0, error: 0, skipped: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status]++;
  }
  return counts;
}

const STATUS_STYLE: Record<FileStatus, (text: string) => string> = {
  ok: chalk.green,
  error: chalk.red,
  skipped: chalk.yellow,
};

/**
 * Per-file results as aligned table lines, one per outcome.
 */
export function formatOutcomeTable(outcomes: readonly FileOutcome[]): string[] {
  const width = Math.max(4, ...outcomes.map(o => o.file.length));
  return outcomes.map(o =>
    `${o.file.padEnd(width)}  ${STATUS_STYLE[o.status](o.status.padEnd(7))}  ${o.detail}`
  );
}

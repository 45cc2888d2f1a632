import chalk from 'chalk';
import { assertRepoConfigured, loadConfig, type LetterboxConfig } from '../config/config.js';
import { resolveToken } from '../config/credentials.js';
import { LetterboxError, errorMessage } from '../errors.js';
import { formatOutcomeTable, summarizeOutcomes, type FileOutcome } from '../letters/outcomes.js';
import { openGitStore, type GitTemplateStore } from '../repo/git-store.js';

export interface RepoContext {
  config: LetterboxConfig;
  store: GitTemplateStore;
}

/**
 * Load config, resolve the token and open the working copy.
 */
export async function openRepo(): Promise<RepoContext> {
  const config = await loadConfig();
  assertRepoConfigured(config);
  const token = await resolveToken(config);
  const store = await openGitStore(config, token);
  console.log(chalk.green(`  ✓ ${config.repo.owner}/${config.repo.name} on ${config.repo.branch}`));
  return { config, store };
}

export function progressLine(label: string): (done: number, total: number) => void {
  return (done, total) => {
    const pct = Math.round((done / Math.max(1, total)) * 100);
    console.log(chalk.dim(`  ${label} ${done}/${total} (${pct}%)`));
  };
}

/**
 * Print per-file results and push when anything was committed.
 * Sets a failing exit code if any file errored.
 */
export async function finishBatch(
  store: GitTemplateStore,
  outcomes: FileOutcome[],
  dryRun: boolean
): Promise<void> {
  if (outcomes.length === 0) {
    console.log(chalk.yellow('\n  No matching files found.\n'));
    return;
  }

  console.log(chalk.dim('\n  Results:'));
  for (const line of formatOutcomeTable(outcomes)) {
    console.log(`    ${line}`);
  }

  const counts = summarizeOutcomes(outcomes);

  if (!dryRun && counts.ok > 0) {
    console.log(chalk.dim('\n  Pushing commits...'));
    await store.publish();
    const head = await store.headCommit();
    console.log(chalk.green(`  ✓ Pushed ${counts.ok} update(s)${head ? ` (${head.slice(0, 7)})` : ''}`));
  }

  if (counts.error > 0) {
    console.log(chalk.red(`\n  ✗ ${counts.error} file(s) failed\n`));
    process.exitCode = 1;
  } else if (dryRun) {
    console.log(chalk.cyan(`\n  Dry run: ${counts.skipped} file(s) would be updated\n`));
  } else {
    console.log(chalk.cyan('\n  Done!\n'));
  }
}

/**
 * Wrap a command action so known failures print one line and exit 1.
 */
export function withErrors<A extends unknown[]>(
  action: (...args: A) => Promise<void>
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      if (error instanceof LetterboxError) {
        console.log(chalk.red(`\n  ✗ ${error.message}\n`));
      } else {
        console.log(chalk.red(`\n  ✗ Unexpected error: ${errorMessage(error)}\n`));
      }
      process.exit(1);
    }
  };
}

/**
 * Wording Command
 *
 * Inject a pasted paragraph into every base template and commit the
 * results to the letters folder.
 */

import { readFile } from 'fs/promises';
import chalk from 'chalk';
import { promptConfirm, promptMultiline } from '../cli/prompts.js';
import { InvalidParagraphError } from '../errors.js';
import { runWordingUpdate } from '../letters/wording-update.js';
import { finishBatch, openRepo, progressLine } from './shared.js';

interface WordingOptions {
  file?: string;
  yes?: boolean;
  dryRun?: boolean;
}

export async function wordingCommand(options: WordingOptions): Promise<void> {
  console.log(chalk.cyan('\n  Letterbox Wording Update\n'));

  const paragraph = options.file
    ? (await readFile(options.file, 'utf-8')).replace(/\r?\n$/, '')
    : await promptMultiline('Paste the block of text to insert into templates:');

  if (!paragraph.trim()) {
    throw new InvalidParagraphError();
  }

  const { config, store } = await openRepo();
  const { templates, letters } = config.folders;

  if (!options.yes && !options.dryRun) {
    const confirmed = await promptConfirm(
      `Inject this text into every .txt in ${templates}/ and commit to ${letters}/ (overwriting same names)?`
    );
    if (!confirmed) {
      console.log(chalk.yellow('\n  Cancelled.\n'));
      return;
    }
  }

  const outcomes = await runWordingUpdate(store, {
    paragraph,
    sourceFolder: templates,
    targetFolder: letters,
    startTag: config.wording.startTag,
    endTag: config.wording.endTag,
    dryRun: options.dryRun,
    onProgress: progressLine('Wording update'),
  });

  await finishBatch(store, outcomes, options.dryRun ?? false);
}

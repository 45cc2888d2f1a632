/**
 * Status Command
 *
 * File counts for the template and letter folders.
 */

import chalk from 'chalk';
import { isLiveLetter } from '../letters/signature-update.js';
import { listLocations } from '../config/config.js';
import { openRepo } from './shared.js';

export async function statusCommand(): Promise<void> {
  console.log(chalk.cyan('\n  Letterbox Status\n'));

  const { config, store } = await openRepo();
  const { templates, letters, liveSuffix } = config.folders;

  const templateFiles = await store.list(templates);
  const letterFiles = await store.list(letters);
  const liveFiles = letterFiles.filter(f => isLiveLetter(f, liveSuffix));

  console.log('');
  console.log(`    ${templates}/  ${templateFiles.length} template(s)`);
  console.log(`    ${letters}/  ${letterFiles.length} letter(s), ${liveFiles.length} live`);

  console.log('');
  console.log(chalk.dim('  Signature locations:'));
  for (const location of listLocations(config)) {
    console.log(chalk.dim(`    ${location.key} (${location.label}): ${location.startTag} … ${location.endTag}`));
  }

  const head = await store.headCommit();
  if (head) {
    console.log(chalk.dim(`\n  HEAD ${head.slice(0, 7)}`));
  }
  console.log('');
}

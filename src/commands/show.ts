/**
 * Show Command
 *
 * Print the current content of one region in one letter.
 */

import chalk from 'chalk';
import { getLocation } from '../config/config.js';
import { extractBetween } from '../regions/region-parser.js';
import { openRepo } from './shared.js';

interface ShowOptions {
  region: string;
}

export async function showCommand(path: string, options: ShowOptions): Promise<void> {
  const { config, store } = await openRepo();

  const markers = options.region.toLowerCase() === 'wording'
    ? config.wording
    : getLocation(config, options.region);

  const { text, version } = await store.read(path);
  const content = extractBetween(text, markers.startTag, markers.endTag);

  console.log(chalk.dim(`\n  ${path} @ ${version.slice(0, 7)}`));
  if (content === null) {
    console.log(chalk.yellow(`  ⚠ No ${markers.startTag} … ${markers.endTag} region\n`));
    process.exitCode = 1;
    return;
  }

  console.log(chalk.dim(`  ${markers.startTag}`));
  console.log(content.replace(/^\n|\n$/g, ''));
  console.log(chalk.dim(`  ${markers.endTag}\n`));
}

/**
 * Snippet Command
 *
 * Print the signature snippet for a set of signees without touching any letter.
 */

import chalk from 'chalk';
import { buildTierSnippet } from '../signatures/snippet-builder.js';
import { chooseLocation, collectTiers } from './signature.js';
import { openRepo } from './shared.js';

interface SnippetOptions {
  location?: string;
  signer?: string[];
}

export async function snippetCommand(options: SnippetOptions): Promise<void> {
  const { config, store } = await openRepo();
  const location = await chooseLocation(config, options.location);
  const tiers = await collectTiers(config, store, location, options.signer);

  console.log(chalk.dim(`\n  ${location.label} snippet:\n`));
  console.log(buildTierSnippet(tiers));
  console.log('');
}

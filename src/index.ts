#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { initCommand } from './commands/init.js';
import { statusCommand } from './commands/status.js';
import { wordingCommand } from './commands/wording.js';
import { signatureCommand } from './commands/signature.js';
import { snippetCommand } from './commands/snippet.js';
import { showCommand } from './commands/show.js';
import { withErrors } from './commands/shared.js';
import { closePrompts } from './cli/prompts.js';

const program = new Command();

program
  .name('letterbox')
  .description('Wording and signature updates for letter templates in a private repo')
  .version('0.1.0');

program
  .command('init')
  .description('Create .letterbox/config.yaml with default folders and markers')
  .option('-f, --force', 'Overwrite existing configuration')
  .option('--owner <owner>', 'Repo owner (user or org)')
  .option('--repo <name>', 'Repo name')
  .option('--branch <branch>', 'Branch to update')
  .action(withErrors(initCommand));

program
  .command('status')
  .description('Show template and letter file counts')
  .action(withErrors(statusCommand));

program
  .command('wording')
  .description('Inject a block of text into every base template')
  .option('--file <path>', 'Read the text from a file instead of pasting it')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .option('--dry-run', 'Show which files would change without committing')
  .action(withErrors(wordingCommand));

program
  .command('signature')
  .description('Regenerate the tiered signature block in every live letter')
  .option('-l, --location <key>', 'Signature location (e.g. denver, wslope)')
  .option('-s, --signer <name...>', 'Preconfigured signees to use (skips the interactive builder)')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .option('--dry-run', 'Show which files would change without committing')
  .action(withErrors(signatureCommand));

program
  .command('snippet')
  .description('Print the signature snippet without updating letters')
  .option('-l, --location <key>', 'Signature location')
  .option('-s, --signer <name...>', 'Preconfigured signees to use')
  .action(withErrors(snippetCommand));

program
  .command('show <path>')
  .description('Print one region of a letter')
  .requiredOption('-r, --region <region>', 'wording, or a signature location key')
  .action(withErrors(showCommand));

if (!process.argv.slice(2).length) {
  console.log(chalk.cyan('\n  Letterbox - letter template updates\n'));
  console.log(chalk.dim('  Injects wording and regenerates signature blocks in a private'));
  console.log(chalk.dim('  template repository, one commit per letter.\n'));
  program.outputHelp();
} else {
  try {
    await program.parseAsync();
  } finally {
    closePrompts();
  }
}

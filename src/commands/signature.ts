/**
 * Signature Command
 *
 * Build a tiered signee list for one location, generate the conditional
 * signature snippet, and splice it into every live letter.
 */

import chalk from 'chalk';
import { promptChoice, promptConfirm, promptInput, promptNumber, type Choice } from '../cli/prompts.js';
import { getLocation, listLocations, type LetterboxConfig } from '../config/config.js';
import { InputClosedError, LetterboxError } from '../errors.js';
import { runSignatureUpdate } from '../letters/signature-update.js';
import type { TemplateStore } from '../repo/types.js';
import { formatTier, loadCatalog } from '../signatures/catalog.js';
import { buildTierSnippet } from '../signatures/snippet-builder.js';
import { MAX_TIERS, TierSession } from '../signatures/tier-session.js';
import type { SignatureLocation, Tier } from '../signatures/types.js';
import { finishBatch, openRepo, progressLine } from './shared.js';

export interface SignatureOptions {
  location?: string;
  signer?: string[];
  yes?: boolean;
  dryRun?: boolean;
}

type MenuAction = 'preconfigured' | 'custom' | 'remove' | 'clear' | 'done';

export async function chooseLocation(config: LetterboxConfig, key?: string): Promise<SignatureLocation> {
  if (key) return getLocation(config, key);
  return promptChoice(
    'Location to update signatures for:',
    listLocations(config).map(l => ({ label: l.label, value: l }))
  );
}

/**
 * Build the session from --signer names, or interactively when none are given.
 */
export async function collectTiers(
  config: LetterboxConfig,
  store: TemplateStore,
  location: SignatureLocation,
  signers: string[] = []
): Promise<readonly Tier[]> {
  const catalog = await loadCatalog(store, config.signatures.configPath);
  const session = new TierSession(catalog[location.key] ?? []);

  if (signers.length > 0) {
    for (const name of signers) {
      session.addPreconfigured(name);
    }
  } else {
    await buildInteractively(session);
  }

  return session.snapshot();
}

async function buildInteractively(session: TierSession): Promise<void> {
  console.log(chalk.dim(`\n  Add up to ${MAX_TIERS} signees. They will be ordered highest min gift first.`));

  for (;;) {
    printTiers(session.snapshot());

    const actions: Array<Choice<MenuAction>> = [];
    if (session.size < MAX_TIERS) {
      if (session.available.length > 0) {
        actions.push({ label: 'Add preconfigured signee', value: 'preconfigured' });
      }
      actions.push({ label: 'Add custom signee', value: 'custom' });
    }
    if (session.size > 0) {
      actions.push({ label: 'Remove a signee', value: 'remove' });
      actions.push({ label: 'Start over', value: 'clear' });
      actions.push({ label: 'Done', value: 'done' });
    }

    const action = await promptChoice('What next?', actions);
    if (action === 'done') return;

    try {
      switch (action) {
        case 'preconfigured': {
          const name = await promptChoice(
            'Preconfigured signee:',
            session.available.map(t => ({ label: formatTier(t), value: t.name }))
          );
          session.addPreconfigured(name);
          break;
        }
        case 'custom': {
          const name = await promptInput('Name:');
          const title = await promptInput('Title:');
          const minGift = await promptNumber('Min gift (inclusive):', 0);
          const maxGift = await promptNumber('Max gift (0 for none):', 0);
          session.add({ name, title, minGift, maxGift });
          break;
        }
        case 'remove': {
          const index = await promptChoice(
            'Remove which signee?',
            session.snapshot().map((t, i) => ({ label: formatTier(t), value: i }))
          );
          session.remove(index);
          break;
        }
        case 'clear':
          session.clear();
          break;
      }
    } catch (error) {
      if (!(error instanceof LetterboxError) || error instanceof InputClosedError) throw error;
      console.log(chalk.yellow(`  ⚠ ${error.message}`));
    }
  }
}

function printTiers(tiers: readonly Tier[]): void {
  console.log('');
  if (tiers.length === 0) {
    console.log(chalk.dim('  No signees yet.'));
    return;
  }
  console.log(chalk.dim('  Current signees (highest first):'));
  tiers.forEach((t, i) => console.log(`    ${i + 1}. ${formatTier(t)}`));
}

export async function signatureCommand(options: SignatureOptions): Promise<void> {
  console.log(chalk.cyan('\n  Letterbox Signature Update\n'));

  const { config, store } = await openRepo();
  const location = await chooseLocation(config, options.location);
  console.log(chalk.dim(`  Location: ${location.label}`));

  const tiers = await collectTiers(config, store, location, options.signer);

  console.log(chalk.dim('\n  Final tiers (descending):'));
  tiers.forEach(t => console.log(`    - ${formatTier(t)}`));

  const snippet = buildTierSnippet(tiers);
  console.log(chalk.dim('\n  Snippet:'));
  console.log(snippet.split('\n').map(l => `    ${l}`).join('\n'));

  const { letters, liveSuffix } = config.folders;
  if (!options.yes && !options.dryRun) {
    const confirmed = await promptConfirm(
      `Replace the ${location.label} signature block in every *${liveSuffix} file in ${letters}/?`
    );
    if (!confirmed) {
      console.log(chalk.yellow('\n  Cancelled.\n'));
      return;
    }
  }

  const { outcomes } = await runSignatureUpdate(store, {
    tiers,
    location,
    folder: letters,
    liveSuffix,
    dryRun: options.dryRun,
    onProgress: progressLine('Signature update'),
  });

  await finishBatch(store, outcomes, options.dryRun ?? false);
}

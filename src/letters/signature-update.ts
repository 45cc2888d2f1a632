/**
 * Signature Update
 *
 * Regenerates the tiered signature block for one location and splices it
 * into every live letter, in place.
 */

import { InvalidTierError, errorMessage } from '../errors.js';
import { replaceBetween } from '../regions/region-parser.js';
import type { StoredFile, TemplateStore } from '../repo/types.js';
import { buildTierSnippet, sortTiers } from '../signatures/snippet-builder.js';
import type { SignatureLocation, Tier } from '../signatures/types.js';
import type { FileOutcome, ProgressCallback } from './outcomes.js';

export interface SignatureUpdateOptions {
  tiers: readonly Tier[];
  location: SignatureLocation;
  folder: string;
  liveSuffix: string;
  dryRun?: boolean;
  onProgress?: ProgressCallback;
}

export interface SignatureUpdateResult {
  snippet: string;
  outcomes: FileOutcome[];
}

export function isLiveLetter(file: StoredFile, liveSuffix: string): boolean {
  return file.name.toLowerCase().endsWith(liveSuffix.toLowerCase());
}

export async function runSignatureUpdate(
  store: TemplateStore,
  options: SignatureUpdateOptions
): Promise<SignatureUpdateResult> {
  const { tiers, location, folder, liveSuffix, dryRun = false, onProgress } = options;

  if (tiers.length === 0) {
    throw new InvalidTierError('No signees configured. Add preconfigured or custom signees');
  }

  const snippet = buildTierSnippet(sortTiers(tiers));
  const files = (await store.list(folder)).filter(f => isLiveLetter(f, liveSuffix));
  const outcomes: FileOutcome[] = [];

  for (const [i, file] of files.entries()) {
    try {
      const { text, version } = await store.read(file.path);
      const updated = replaceBetween(text, location.startTag, location.endTag, snippet);

      if (dryRun) {
        outcomes.push({ file: file.name, status: 'skipped', detail: `would write ${file.path}` });
      } else {
        const result = await store.write(
          file.path,
          updated,
          `Signature update (${location.label}) for ${file.name}`,
          version
        );
        outcomes.push({ file: file.name, status: 'ok', detail: `${result.action} ${result.path}` });
      }
    } catch (error) {
      outcomes.push({ file: file.name, status: 'error', detail: errorMessage(error) });
    }
    onProgress?.(i + 1, files.length);
  }

  return { snippet, outcomes };
}

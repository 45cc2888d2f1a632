/**
 * Preconfigured signees, read from the template repository's
 * signatures.json:
 *
 *   { "denver": [{ "name": "…", "title": "…", "min_gift": 10000, "max_gift": null }] }
 */

import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';
import type { TemplateStore } from '../repo/types.js';
import { createTier } from './tier-session.js';
import type { Tier } from './types.js';

const signeeSchema = z.object({
  name: z.string(),
  title: z.string().nullish(),
  min_gift: z.coerce.number().default(0),
  max_gift: z.coerce.number().nullish(),
});

const catalogSchema = z.record(z.array(signeeSchema));

export type SignatureCatalog = Record<string, Tier[]>;

export function parseCatalog(raw: unknown, source = 'signatures.json'): SignatureCatalog {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid ${source} at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }

  const catalog: SignatureCatalog = {};
  for (const [location, signees] of Object.entries(parsed.data)) {
    catalog[location.toLowerCase()] = signees.map(s =>
      createTier({
        name: s.name,
        title: s.title ?? '',
        minGift: s.min_gift,
        maxGift: s.max_gift ?? null,
      })
    );
  }
  return catalog;
}

export async function readJson(store: TemplateStore, path: string): Promise<unknown> {
  const { text } = await store.read(path);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Could not parse ${path}: ${errorMessage(error)}`);
  }
}

export async function loadCatalog(store: TemplateStore, path: string): Promise<SignatureCatalog> {
  let raw: unknown;
  try {
    raw = await readJson(store, path);
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(`Could not read ${path} from repo: ${errorMessage(error)}`);
  }
  return parseCatalog(raw, path);
}

export function formatTier(tier: Tier): string {
  const max = tier.maxGift === null ? 'no max' : `max $${tier.maxGift.toLocaleString('en-US')}`;
  const title = tier.title ? ` — ${tier.title}` : '';
  return `${tier.name}${title} — min $${tier.minGift.toLocaleString('en-US')}, ${max}`;
}

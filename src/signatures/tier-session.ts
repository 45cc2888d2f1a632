/**
 * Tier Session
 *
 * The signee list an operator builds up during one `letterbox signature`
 * run. Custom and preconfigured signees go through the same validation;
 * callers only ever hand a sorted snapshot to the snippet builder.
 */

import { z } from 'zod';
import { InvalidTierError } from '../errors.js';
import { assertSafeTierText, sortTiers } from './snippet-builder.js';
import type { Tier } from './types.js';

export const MAX_TIERS = 4;

// keeps thresholds in plain decimal notation when rendered
export const MAX_GIFT = 1e15;

export const tierInputSchema = z
  .object({
    name: z.string().trim().min(1, 'Name is required'),
    title: z.string().trim().default(''),
    minGift: z.number().finite().nonnegative().max(MAX_GIFT, `Min gift may not exceed ${MAX_GIFT}`),
    // 0 means "no maximum", matching how operators fill the form
    maxGift: z
      .number()
      .finite()
      .nonnegative()
      .nullish()
      .transform(v => (v ? v : null)),
  })
  .refine(t => t.maxGift === null || t.maxGift >= t.minGift, {
    message: 'Max gift must not be below min gift',
    path: ['maxGift'],
  });

export type TierInput = z.input<typeof tierInputSchema>;

export function createTier(input: TierInput): Tier {
  const parsed = tierInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidTierError(`Invalid signee ${issue.path.join('.') || 'entry'}: ${issue.message}`);
  }
  const tier: Tier = parsed.data;
  assertSafeTierText(tier);
  return tier;
}

export class TierSession {
  // kept sorted, highest min gift first
  private tiers: Tier[] = [];

  constructor(private readonly preconfigured: readonly Tier[] = []) {}

  get size(): number {
    return this.tiers.length;
  }

  get available(): readonly Tier[] {
    return this.preconfigured;
  }

  add(input: TierInput): Tier {
    if (this.tiers.length >= MAX_TIERS) {
      throw new InvalidTierError(`At most ${MAX_TIERS} signees can be combined`);
    }
    const tier = createTier(input);
    if (this.tiers.some(t => t.minGift === tier.minGift)) {
      throw new InvalidTierError(`A signee with min gift ${tier.minGift} is already listed`);
    }
    this.tiers = sortTiers([...this.tiers, tier]);
    return tier;
  }

  addPreconfigured(name: string): Tier {
    const match = this.preconfigured.find(p => p.name === name);
    if (!match) {
      throw new InvalidTierError(`Unknown preconfigured signee: ${name}`);
    }
    return this.add(match);
  }

  /**
   * Remove by position in snapshot order.
   */
  remove(index: number): Tier {
    if (index < 0 || index >= this.tiers.length) {
      throw new InvalidTierError(`No signee at position ${index + 1}`);
    }
    const [removed] = this.tiers.splice(index, 1);
    return removed;
  }

  clear(): void {
    this.tiers = [];
  }

  /**
   * Sorted, frozen copy for the snippet builder.
   */
  snapshot(): readonly Tier[] {
    return Object.freeze(this.tiers.map(t => Object.freeze({ ...t })));
  }
}

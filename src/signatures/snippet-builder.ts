/**
 * Snippet Builder
 *
 * Turns an ordered list of signee tiers into the nested Handlebars
 * conditional that picks a signature block by gift amount:
 *
 *   {{#if (compare Gift.amount.value ">" 9999.99)}}
 *   <p>…</p>
 *   {{else}}
 *   <p>…</p>
 *   {{/if}}
 */

import { InvalidTierOrderError, UnsafeTierTextError } from '../errors.js';
import type { Tier } from './types.js';

const AMOUNT_FIELD = 'Gift.amount.value';
const MARKER_SEQUENCE = /\{\{|\}\}/;

/**
 * The templating syntax only offers ">", so an inclusive minimum is written
 * one cent below. Amounts carry at most two decimals.
 */
export function formatThreshold(minGift: number): string {
  return (minGift - 0.01).toFixed(2);
}

/**
 * Highest minimum first. Stable, so tiers with equal minimums keep their order.
 */
export function sortTiers(tiers: readonly Tier[]): Tier[] {
  return [...tiers].sort((a, b) => b.minGift - a.minGift);
}

export function assertSafeTierText(tier: Pick<Tier, 'name' | 'title'>): void {
  if (MARKER_SEQUENCE.test(tier.name)) throw new UnsafeTierTextError('name', tier.name);
  if (MARKER_SEQUENCE.test(tier.title)) throw new UnsafeTierTextError('title', tier.title);
}

function assertDescending(tiers: readonly Tier[]): void {
  for (let i = 1; i < tiers.length; i++) {
    if (tiers[i].minGift >= tiers[i - 1].minGift) {
      throw new InvalidTierOrderError(i, tiers[i - 1].minGift, tiers[i].minGift);
    }
  }
}

function renderBlock(tier: Tier): string[] {
  return ['<p>', tier.name, '<br>', tier.title, '</p>'];
}

/**
 * Build the signature snippet. Every tier but the last is guarded by its
 * threshold; the last one is the fallback. Returns '' for no tiers.
 */
export function buildTierSnippet(tiers: readonly Tier[]): string {
  if (tiers.length === 0) return '';

  assertDescending(tiers);
  tiers.forEach(assertSafeTierText);

  const lines: string[] = [];
  const last = tiers.length - 1;

  tiers.forEach((tier, i) => {
    if (i < last) {
      lines.push(`{{#if (compare ${AMOUNT_FIELD} ">" ${formatThreshold(tier.minGift)})}}`);
      lines.push(...renderBlock(tier));
      lines.push('{{else}}');
    } else {
      lines.push(...renderBlock(tier));
    }
  });

  for (let i = 0; i < last; i++) {
    lines.push('{{/if}}');
  }

  return lines.join('\n');
}

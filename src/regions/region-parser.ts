import { DelimiterNotFoundError } from '../errors.js';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a matcher for the first `startTag ... endTag` span.
 * Case-insensitive, spans line breaks, shortest match wins.
 */
function regionPattern(startTag: string, endTag: string): RegExp {
  return new RegExp(`${escapeRegExp(startTag)}([\\s\\S]*?)${escapeRegExp(endTag)}`, 'i');
}

/**
 * Extract the raw text between the first pair of markers.
 * Returns null if markers are not present.
 */
export function extractBetween(doc: string, startTag: string, endTag: string): string | null {
  const match = regionPattern(startTag, endTag).exec(doc);
  return match ? match[1] : null;
}

/**
 * Replace the first marked region with new content.
 * Preserves everything outside the markers; the markers are written back
 * as the caller spelled them. Later regions with the same markers are left alone.
 */
export function replaceBetween(
  doc: string,
  startTag: string,
  endTag: string,
  newInner: string
): string {
  const match = regionPattern(startTag, endTag).exec(doc);
  if (!match) {
    throw new DelimiterNotFoundError(startTag, endTag);
  }
  const before = doc.substring(0, match.index);
  const after = doc.substring(match.index + match[0].length);
  return `${before}${startTag}\n${newInner}\n${endTag}${after}`;
}

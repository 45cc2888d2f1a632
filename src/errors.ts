/**
 * Letterbox errors
 *
 * Every failure the core or the batch runners raise carries a stable code,
 * so the CLI can report it without parsing messages.
 */

export type LetterboxErrorCode =
  | 'DELIMITER_NOT_FOUND'
  | 'INVALID_TIER_ORDER'
  | 'UNSAFE_TIER_TEXT'
  | 'INVALID_TIER'
  | 'EMPTY_PARAGRAPH'
  | 'CONFIG_INVALID'
  | 'MISSING_CREDENTIAL'
  | 'STALE_VERSION'
  | 'INPUT_CLOSED';

export class LetterboxError extends Error {
  readonly code: LetterboxErrorCode;

  constructor(code: LetterboxErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DelimiterNotFoundError extends LetterboxError {
  constructor(readonly startTag: string, readonly endTag: string) {
    super('DELIMITER_NOT_FOUND', `Tags not found: ${startTag} ... ${endTag}`);
  }
}

export class InvalidTierOrderError extends LetterboxError {
  constructor(readonly index: number, previous: number, current: number) {
    super(
      'INVALID_TIER_ORDER',
      `Tiers must be in strictly descending min gift order: tier ${index + 1} (${current}) follows ${previous}`
    );
  }
}

export class UnsafeTierTextError extends LetterboxError {
  constructor(readonly field: 'name' | 'title', readonly value: string) {
    super('UNSAFE_TIER_TEXT', `Signee ${field} may not contain "{{" or "}}": ${value}`);
  }
}

export class InvalidTierError extends LetterboxError {
  constructor(message: string) {
    super('INVALID_TIER', message);
  }
}

export class InvalidParagraphError extends LetterboxError {
  constructor() {
    super('EMPTY_PARAGRAPH', 'Please provide a non-empty block of text');
  }
}

export class ConfigError extends LetterboxError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export class MissingCredentialError extends LetterboxError {
  constructor(sources: string[]) {
    super('MISSING_CREDENTIAL', `No GitHub token found. Checked: ${sources.join(', ')}`);
  }
}

export class StaleVersionError extends LetterboxError {
  constructor(readonly path: string, expected: string, actual: string) {
    super('STALE_VERSION', `${path} changed since it was read (expected ${expected}, found ${actual})`);
  }
}

export class InputClosedError extends LetterboxError {
  constructor() {
    super('INPUT_CLOSED', 'Input ended before an answer was given');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

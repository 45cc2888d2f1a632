import { describe, it, expect } from 'vitest';
import { extractBetween, replaceBetween } from './region-parser.js';
import { DelimiterNotFoundError } from '../errors.js';

const START = '<!-- start here -->';
const END = '<!-- end here -->';

const SAMPLE_DOC = `Dear {{Donor.firstName}},

<!-- start here -->
Thank you for your support last year.
<!-- end here -->

Sincerely,
`;

describe('replaceBetween', () => {
  it('should replace content between markers and keep the rest', () => {
    const result = replaceBetween(SAMPLE_DOC, START, END, 'Your gift feeds families.');
    expect(result).toBe(`Dear {{Donor.firstName}},

<!-- start here -->
Your gift feeds families.
<!-- end here -->

Sincerely,
`);
  });

  it('should match markers case-insensitively', () => {
    const doc = 'a <!-- START HERE -->old<!-- End Here --> b';
    expect(replaceBetween(doc, START, END, 'new')).toBe(`a ${START}\nnew\n${END} b`);
  });

  it('should only replace the first region', () => {
    const doc = `${START}one${END}|${START}two${END}`;
    expect(replaceBetween(doc, START, END, 'x')).toBe(`${START}\nx\n${END}|${START}two${END}`);
  });

  it('should pick the shortest span', () => {
    const doc = `${START}a${END}b${END}`;
    expect(replaceBetween(doc, START, END, 'z')).toBe(`${START}\nz\n${END}b${END}`);
  });

  it('should insert replacement text verbatim', () => {
    const result = replaceBetween(`${START}${END}`, START, END, 'costs $& and $1');
    expect(result).toBe(`${START}\ncosts $& and $1\n${END}`);
  });

  it('should be stable across repeated runs', () => {
    const once = replaceBetween(SAMPLE_DOC, START, END, 'Same text.');
    expect(replaceBetween(once, START, END, 'Same text.')).toBe(once);
  });

  it('should throw DelimiterNotFoundError when the start marker is missing', () => {
    expect(() => replaceBetween(`body ${END}`, START, END, 'x')).toThrow(DelimiterNotFoundError);
  });

  it('should throw DelimiterNotFoundError when the end marker is missing', () => {
    let caught: unknown;
    try {
      replaceBetween(`${START} body`, START, END, 'x');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DelimiterNotFoundError);
    if (caught instanceof DelimiterNotFoundError) {
      expect(caught.message).toBe(`Tags not found: ${START} ... ${END}`);
      expect(caught.code).toBe('DELIMITER_NOT_FOUND');
      expect(caught.startTag).toBe(START);
    }
  });

  it('should not match when the end marker only precedes the start marker', () => {
    expect(() => replaceBetween(`${END} text ${START}`, START, END, 'x')).toThrow(DelimiterNotFoundError);
  });
});

describe('extractBetween', () => {
  it('should extract the raw content between markers', () => {
    expect(extractBetween(SAMPLE_DOC, START, END)).toBe('\nThank you for your support last year.\n');
  });

  it('should return null when no markers exist', () => {
    expect(extractBetween('# Just a letter', START, END)).toBeNull();
  });

  it('should return what replaceBetween inserted plus the surrounding newlines', () => {
    const updated = replaceBetween(SAMPLE_DOC, START, END, 'line one\nline two');
    expect(extractBetween(updated, START, END)).toBe('\nline one\nline two\n');
  });
});

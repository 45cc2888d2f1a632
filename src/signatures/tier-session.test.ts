import { describe, it, expect, beforeEach } from 'vitest';
import { TierSession, createTier, MAX_GIFT, MAX_TIERS } from './tier-session.js';
import { buildTierSnippet } from './snippet-builder.js';
import { InvalidTierError, UnsafeTierTextError } from '../errors.js';
import type { Tier } from './types.js';

const PRECONFIGURED: Tier[] = [
  { name: 'Alice Park', title: 'Board Chair', minGift: 10000, maxGift: null },
  { name: 'Bob Lee', title: 'Development Director', minGift: 500, maxGift: 9999.99 },
];

describe('createTier', () => {
  it('should trim text and default the title', () => {
    expect(createTier({ name: '  Dana  ', minGift: 250 })).toEqual({
      name: 'Dana',
      title: '',
      minGift: 250,
      maxGift: null,
    });
  });

  it('should treat a zero max gift as no maximum', () => {
    expect(createTier({ name: 'Dana', minGift: 0, maxGift: 0 }).maxGift).toBeNull();
  });

  it('should reject an empty name', () => {
    expect(() => createTier({ name: '   ', minGift: 1 })).toThrow('Invalid signee name: Name is required');
  });

  it('should reject a negative min gift', () => {
    expect(() => createTier({ name: 'Dana', minGift: -5 })).toThrow(InvalidTierError);
  });

  it('should reject a max gift below the min gift', () => {
    expect(() => createTier({ name: 'Dana', minGift: 500, maxGift: 100 })).toThrow(
      'Invalid signee maxGift: Max gift must not be below min gift'
    );
  });

  it('should reject a min gift too large to render as plain digits', () => {
    expect(() => createTier({ name: 'Dana', minGift: 1e21 })).toThrow(
      'Invalid signee minGift: Min gift may not exceed 1000000000000000'
    );
    expect(createTier({ name: 'Dana', minGift: MAX_GIFT }).minGift).toBe(MAX_GIFT);
  });

  it('should reject template markers in the title', () => {
    expect(() => createTier({ name: 'Dana', title: '{{else}}', minGift: 0 })).toThrow(UnsafeTierTextError);
  });
});

describe('TierSession', () => {
  let session: TierSession;

  beforeEach(() => {
    session = new TierSession(PRECONFIGURED);
  });

  it('should start empty', () => {
    expect(session.size).toBe(0);
    expect(session.snapshot()).toEqual([]);
  });

  it('should add preconfigured signees through the same validation', () => {
    session.addPreconfigured('Bob Lee');
    expect(session.snapshot()).toEqual([PRECONFIGURED[1]]);
  });

  it('should reject unknown preconfigured names', () => {
    expect(() => session.addPreconfigured('Nobody')).toThrow('Unknown preconfigured signee: Nobody');
  });

  it('should return snapshots sorted highest minimum first', () => {
    session.add({ name: 'Cara', minGift: 2500 });
    session.addPreconfigured('Bob Lee');
    session.addPreconfigured('Alice Park');
    expect(session.snapshot().map(t => t.name)).toEqual(['Alice Park', 'Cara', 'Bob Lee']);
  });

  it('should not let callers mutate the session through a snapshot', () => {
    session.add({ name: 'Cara', minGift: 2500 });
    const snapshot = session.snapshot();
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot[0])).toBe(true);
    session.add({ name: 'Dana', minGift: 0 });
    expect(snapshot).toHaveLength(1);
  });

  it('should cap the number of signees', () => {
    for (let i = 0; i < MAX_TIERS; i++) {
      session.add({ name: `Signee ${i}`, minGift: i * 100 });
    }
    expect(() => session.add({ name: 'One too many', minGift: 9999 })).toThrow(
      `At most ${MAX_TIERS} signees can be combined`
    );
  });

  it('should reject a second signee with the same min gift', () => {
    session.addPreconfigured('Bob Lee');
    expect(() => session.add({ name: 'Cara', minGift: 500 })).toThrow(
      'A signee with min gift 500 is already listed'
    );
    expect(session.snapshot().map(t => t.name)).toEqual(['Bob Lee']);
  });

  it('should reject the same preconfigured signee twice', () => {
    session.addPreconfigured('Alice Park');
    expect(() => session.addPreconfigured('Alice Park')).toThrow(InvalidTierError);
    session.add({ name: 'Bob', minGift: 500 });
    expect(session.size).toBe(2);
    expect(() => buildTierSnippet(session.snapshot())).not.toThrow();
  });

  it('should remove by index and clear', () => {
    session.add({ name: 'Cara', minGift: 2500 });
    session.add({ name: 'Dana', minGift: 0 });
    expect(session.remove(0).name).toBe('Cara');
    expect(() => session.remove(5)).toThrow('No signee at position 6');
    session.clear();
    expect(session.size).toBe(0);
  });
});

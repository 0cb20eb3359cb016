import { describe, expect, it } from 'vitest';

import { createRandom, sampleWithoutReplacement, shuffle } from '../../src/core/random.js';

describe('createRandom', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createRandom(42);
    const b = createRandom(42);
    const first = Array.from({ length: 5 }, () => a.next());
    const second = Array.from({ length: 5 }, () => b.next());
    expect(first).toEqual(second);
  });

  it('stays within its ranges', () => {
    const random = createRandom(7);
    for (let i = 0; i < 200; i++) {
      const x = random.next();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
      const n = random.int(5);
      expect(Number.isInteger(n)).toBe(true);
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThan(5);
    }
  });
});

describe('shuffle', () => {
  it('returns a permutation without touching the input', () => {
    const items = [1, 2, 3, 4, 5, 6];
    const shuffled = shuffle(createRandom(1), items);
    expect(items).toEqual([1, 2, 3, 4, 5, 6]);
    expect([...shuffled].sort((a, b) => a - b)).toEqual(items);
  });
});

describe('sampleWithoutReplacement', () => {
  it('returns nothing for k <= 0', () => {
    expect(sampleWithoutReplacement(createRandom(1), ['a', 'b'], 0)).toEqual([]);
  });

  it('returns everything in input order when k covers the input', () => {
    const random = createRandom(3);
    expect(sampleWithoutReplacement(random, ['a', 'b', 'c'], 5)).toEqual(['a', 'b', 'c']);
    // No randomness consumed.
    expect(random.next()).toBe(createRandom(3).next());
  });

  it('picks k distinct items from the input', () => {
    const items = ['a', 'b', 'c', 'd', 'e'];
    const picked = sampleWithoutReplacement(createRandom(9), items, 3);
    expect(picked).toHaveLength(3);
    expect(new Set(picked).size).toBe(3);
    for (const item of picked) {
      expect(items).toContain(item);
    }
  });
});

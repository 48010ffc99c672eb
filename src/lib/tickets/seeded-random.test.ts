import { describe, expect, it } from 'vitest';
import { createSeededRandom, randomIntInclusive } from './seeded-random';

describe('createSeededRandom', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const first = Array.from({ length: 5 }, () => a());
    expect(Array.from({ length: 5 }, () => b())).toEqual(first);
  });

  it('gives different sequences for different seeds', () => {
    const a = createSeededRandom(1);
    const b = createSeededRandom(2);
    expect(a()).not.toBe(b());
  });

  it('stays within [0, 1)', () => {
    const random = createSeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('randomIntInclusive', () => {
  it('draws both bounds and nothing outside them', () => {
    const random = createSeededRandom(11);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) seen.add(randomIntInclusive(random, 6, 7));
    expect([...seen].sort()).toEqual([6, 7]);
  });

  it('returns the bound for a fixed range', () => {
    const random = createSeededRandom(11);
    expect(randomIntInclusive(random, 4, 4)).toBe(4);
  });
});

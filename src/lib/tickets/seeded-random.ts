/**
 * Seeded PRNG (mulberry32) so ticket batches are reproducible.
 * Returns floats in [0, 1).
 */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Uniform integer in [min, max], both inclusive.
 */
export function randomIntInclusive(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Seed for callers at the outer boundary that did not pick one.
 */
export function randomSeed(): number {
  return Math.floor(Math.random() * 2 ** 31);
}

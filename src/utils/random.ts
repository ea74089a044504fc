export type RandomSource = () => number;

/**
 * Small seeded PRNG (mulberry32). Returns floats in [0, 1).
 * Used for backoff jitter so retry timing can be replayed from a seed.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? Math.random : seededRandom(seed);
}

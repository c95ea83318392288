/**
 * Source of uniform random numbers in [0, 1)
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Seeded xorshift32 generator for reproducible weight initialisation
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed | 0 || 1;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

export const MAX_SEED = 0xffffffff;

/**
 * Seeded pseudo-random generator (mulberry32)
 * Same seed, same sequence: sampling reproducibility depends on it.
 * The state is 32 bits wide, so seeds are limited to 0..MAX_SEED.
 */
export function mulberry32(seed: number): () => number {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new RangeError(`Seed must be an integer in 0..${MAX_SEED}, got ${seed}`);
  }
  let state = seed;

  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

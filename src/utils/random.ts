/** Uniform source in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

/**
 * Reproducible generator for allocator draws. String seeds are folded with a
 * 31-multiplier hash first, then fed to a mulberry32 stream.
 */
export function createSeededRandom(seed: number | string): RandomSource {
  let state = typeof seed === "number" ? seed >>> 0 : hashSeed(seed);

  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function hashSeed(seed: string) {
  let hash = 0;
  for (let i = 0; i < seed.length; i++) {
    hash = (Math.imul(31, hash) + seed.charCodeAt(i)) >>> 0;
  }
  return hash;
}

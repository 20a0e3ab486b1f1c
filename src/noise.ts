// --- Coherent 3-D noise ---
// simplex-noise rescaled from [-1, 1] into [0, 1].
// Seeded sources are deterministic; the returned function holds no mutable state.

import { createNoise3D } from 'simplex-noise';
import type { NoiseSource } from './types';

/** mulberry32: small seeded PRNG in [0, 1) for the permutation table */
export function createSeededRandom(seed: number): () => number {
  let state = Math.floor(seed) | 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createSimplexNoise(seed: number = 0): NoiseSource {
  const noise3D = createNoise3D(createSeededRandom(seed));
  return (x: number, y: number, z: number): number => (noise3D(x, y, z) + 1) * 0.5;
}

/** Shared default source used by the noise strategy when none is supplied */
export const defaultNoise: NoiseSource = createSimplexNoise(0);

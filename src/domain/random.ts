/**
 * Random Source
 *
 * Distribution breaks ties randomly so that repeated runs produce different
 * groupings. Passing a seed makes a run reproducible.
 */

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

/**
 * mulberry32: 32-bit state, full period, good enough for shuffling rosters
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

export const systemRandom: RandomSource = {
  next: () => Math.random(),
};

export function createRandom(seed?: number | null): RandomSource {
  return seed === undefined || seed === null ? systemRandom : createSeededRandom(seed);
}

export function randomIndex(random: RandomSource, length: number): number {
  return Math.min(length - 1, Math.floor(random.next() * length));
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomIndex(random, i + 1);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

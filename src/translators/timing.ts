/**
 * Randomness and waiting, injected into translators so pacing and jitter
 * can be tested deterministically.
 */

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

export type SleepFn = (ms: number) => Promise<void>;

export const defaultSleep: SleepFn = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Mulberry32: small seeded generator for reproducible runs
 */
export function createSeededRandom(seed: number): RandomSource {
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
 * Integer drawn uniformly from [min, max], both inclusive
 */
export function uniformInt(random: RandomSource, [min, max]: readonly [number, number]): number {
  if (max <= min) {
    return min;
  }
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Float drawn uniformly from [min, max]
 */
export function uniformFloat(random: RandomSource, [min, max]: readonly [number, number]): number {
  if (max <= min) {
    return min;
  }
  return min + random() * (max - min);
}

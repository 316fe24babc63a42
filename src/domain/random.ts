/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Deterministic source (mulberry32) for reproducible runs and tests.
 */
export function seededRandom(seed: number): RandomSource {
  let state: number = seed >>> 0;
  return (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t: number = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fisher–Yates shuffle over a copy of `items`.
 */
export function shuffle<T>(
  items: readonly T[],
  random: RandomSource = defaultRandom
): T[] {
  const out: T[] = [...items];
  for (let i: number = out.length - 1; i > 0; i--) {
    const j: number = Math.floor(random() * (i + 1));
    const tmp: T = out[i];
    out[i] = out[j];
    out[j] = tmp;
  }
  return out;
}

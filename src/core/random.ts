/**
 * Seeded randomness for dataset generation.
 *
 * Every sampling step in a run draws from one `RandomSource`, so a fixed seed
 * and a fixed input order reproduce the same output.
 */

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [0, maxExclusive). */
  int(maxExclusive: number): number;
}

/**
 * Mulberry32 PRNG.
 */
function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandom(seed: number): RandomSource {
  const next = mulberry32(Math.trunc(seed));
  return {
    next,
    int: (maxExclusive: number) => Math.floor(next() * maxExclusive),
  };
}

/**
 * Fisher-Yates shuffle. Returns a new array.
 */
export function shuffle<T>(random: RandomSource, items: readonly T[]): T[] {
  const a = items.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = random.int(i + 1);
    const tmp = a[i];
    a[i] = a[j];
    a[j] = tmp;
  }
  return a;
}

/**
 * Uniform sample of `k` distinct items. Asking for everything returns a copy in
 * input order without consuming randomness.
 */
export function sampleWithoutReplacement<T>(
  random: RandomSource,
  items: readonly T[],
  k: number
): T[] {
  if (k <= 0) return [];
  if (k >= items.length) return items.slice();

  const pool = items.slice();
  const picked: T[] = [];
  for (let i = 0; i < k; i++) {
    const j = i + random.int(pool.length - i);
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
    picked.push(pool[i]);
  }
  return picked;
}

/**
 * Seeded pseudo-random data for property tests and benchmarks
 */

/**
 * Deterministic random source
 */
export interface Random {
  /** Float in [0, 1) */
  next(): number;
  /** Integer in [min, max] */
  int(min: number, max: number): number;
}

/**
 * Create a mulberry32 generator; the same seed always yields the same sequence
 * @param seed - 32-bit seed (default: 42)
 */
export function createRandom(seed = 42): Random {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    next,
    int(min, max) {
      return min + Math.floor(next() * (max - min + 1));
    },
  };
}

/**
 * Array of `length` integers drawn from [min, max]; may repeat
 */
export function randomIntArray(
  random: Random,
  length: number,
  min = -1_000_000,
  max = 1_000_000
): number[] {
  const out: number[] = [];
  for (let i = 0; i < length; i++) {
    out.push(random.int(min, max));
  }
  return out;
}

/**
 * Array of `length` distinct integers in random order
 */
export function distinctIntArray(random: Random, length: number): number[] {
  const seen = new Set<number>();
  const span = Math.max(length * 10, 100);
  while (seen.size < length) {
    seen.add(random.int(-span, span));
  }
  return shuffle(random, Array.from(seen));
}

/**
 * Fisher-Yates shuffle in place; returns the same array
 */
export function shuffle<T>(random: Random, items: T[]): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = random.int(0, i);
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

/**
 * Array sizes worth covering in property tests: empty, single element,
 * sizes around the first growth steps, then random sizes up to `maxLength`
 */
export function sampleLengths(random: Random, runs: number, maxLength = 200): number[] {
  const fixed = [0, 1, 2, 3, 4, 5, 16, 17];
  const out = fixed.slice(0, Math.min(runs, fixed.length));
  while (out.length < runs) {
    out.push(random.int(0, maxLength));
  }
  return out;
}

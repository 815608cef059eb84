export type RandomSource = () => number;

/**
 * Mulberry32. Every draw made by the wave composer and the spawn allocator goes
 * through a source like this one so a seed reproduces a whole run.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let result = Math.imul(state ^ (state >>> 15), 1 | state);
    result ^= result + Math.imul(result ^ (result >>> 7), 61 | result);
    return ((result ^ (result >>> 14)) >>> 0) / 0x1_0000_0000;
  };
}

export function createRandomSeed(): number {
  return (Date.now() ^ Math.floor(Math.random() * 0x7fffffff)) >>> 0;
}

/** Index in `[0, length)`; a source that returns exactly 1 still lands on the last slot. */
export function pickIndex(length: number, random: RandomSource): number {
  if (length <= 0) {
    throw new RangeError('Cannot pick from an empty collection');
  }
  const roll = random();
  const numeric = Number.isFinite(roll) ? roll : 0;
  return Math.min(length - 1, Math.max(0, Math.floor(numeric * length)));
}

export function pickUniform<T>(items: readonly T[], random: RandomSource): T {
  return items[pickIndex(items.length, random)];
}

export function randomRange(min: number, max: number, random: RandomSource): number {
  if (max <= min) {
    return min;
  }
  return min + random() * (max - min);
}

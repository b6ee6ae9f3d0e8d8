export type RandomFn = () => number;

export function randInRange(random: RandomFn, min: number, max: number): number {
  return min + random() * (max - min);
}

export function randInt(random: RandomFn, minInclusive: number, maxInclusive: number): number {
  return Math.min(maxInclusive, Math.floor(randInRange(random, minInclusive, maxInclusive + 1)));
}

export function pickRandom<T>(random: RandomFn, list: readonly T[]): T {
  const index = Math.min(list.length - 1, Math.floor(random() * list.length));
  return list[index];
}

// LCG, returns values in [0, 1).
export function createSeededRandom(seed: number): RandomFn {
  let state = seed >>> 0;
  return () => {
    state = (1664525 * state + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

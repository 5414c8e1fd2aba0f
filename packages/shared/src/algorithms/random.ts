import seedrandom from 'seedrandom';

/** Source of uniform numbers in [0, 1). */
export type RandomSource = {
  next: () => number;
};

export const mathRandomSource: RandomSource = {
  next: () => Math.random(),
};

export const createSeededRandom = (seed: string): RandomSource => {
  const prng = seedrandom(seed);
  return { next: () => prng() };
};

export const pickIndex = (random: RandomSource, length: number): number => {
  if (length <= 0) {
    throw new RangeError('Cannot pick from an empty list');
  }

  const index = Math.floor(random.next() * length);
  return Math.min(length - 1, Math.max(0, index));
};

/** Fisher-Yates over a copy. */
export const shuffle = <T>(items: readonly T[], random: RandomSource): T[] => {
  const copy = [...items];

  for (let index = copy.length - 1; index > 0; index -= 1) {
    const swapIndex = pickIndex(random, index + 1);
    const current = copy[index];
    const other = copy[swapIndex];
    if (current === undefined || other === undefined) continue;
    copy[index] = other;
    copy[swapIndex] = current;
  }

  return copy;
};

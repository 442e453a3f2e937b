/**
 * Randomness sources for fault and delay injection.
 */

export interface RandomSource {
  /** Uniform value in [0, 1) */
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Seeded random number generator for reproducible injection runs.
 * Linear congruential generator with the Numerical Recipes constants.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (Math.imul(this.state, 1664525) + 1013904223) >>> 0;
    return this.state / 4294967296;
  }
}

/**
 * Uniform integer in [min, max). Returns min when the range is empty.
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return Math.floor(random.next() * (max - min)) + min;
}

export function createRandomSource(seed: number | null): RandomSource {
  return seed === null ? mathRandom : new SeededRandom(seed);
}

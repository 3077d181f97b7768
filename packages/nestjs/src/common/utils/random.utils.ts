import { Inject } from "@nestjs/common";

export const RANDOM_SOURCE = Symbol("random-source");

/**
 * Returns a float in [0, 1)
 */
export type RandomSource = () => number;

export const InjectRandomSource = () => Inject(RANDOM_SOURCE);

/**
 * Seedable generator (mulberry32). The same seed always yields the same
 * sequence.
 */
export const createSeededRandom = (seed: number): RandomSource => {
  let state = seed >>> 0;

  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export const createRandomSource = (seed?: number): RandomSource =>
  seed === undefined ? Math.random : createSeededRandom(seed);

export const pickOne = <T>(items: readonly T[], random: RandomSource): T => {
  if (items.length === 0) {
    throw new RangeError("cannot pick from an empty list");
  }

  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
};

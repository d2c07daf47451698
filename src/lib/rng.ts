// Returns a float in [0, 1), same contract as Math.random.
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

function hashSeed(seed: string) {
  let h = 2166136261;
  for (let i = 0; i < seed.length; i += 1) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/**
 * Deterministic xorshift32 stream keyed by a string seed. Used by tests and
 * the verify script to replay rounds.
 */
export function createSeededRandom(seed: string): RandomSource {
  // xorshift32 never leaves the zero state
  let h = hashSeed(seed) || 0x9e3779b9;
  return () => {
    h ^= h << 13;
    h >>>= 0;
    h ^= h >>> 17;
    h ^= h << 5;
    h >>>= 0;
    return h / 4294967296;
  };
}

export function pickIndex(random: RandomSource, length: number) {
  if (!Number.isInteger(length) || length < 1) {
    throw new Error(`Cannot pick from ${length} items`);
  }
  const index = Math.floor(random() * length);
  return Math.min(length - 1, Math.max(0, index));
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  const item = items[pickIndex(random, items.length)];
  if (item === undefined) throw new Error('Picked an empty slot');
  return item;
}

export const randomInRange = (random: RandomSource, min: number, max: number) => min + random() * (max - min);

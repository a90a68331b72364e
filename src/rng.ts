/** Deterministic RNG helpers for food placement and seeded sessions. */

/** Random source returning a float in [0, 1). */
export type RandomSource = () => number;

/** FNV-1a 32-bit offset basis. */
const FNV_OFFSET_BASIS = 0x811c9dc5;
/** FNV-1a 32-bit prime. */
const FNV_PRIME = 0x01000193;

/**
 * Normalize a number into an unsigned 32-bit integer.
 * @param value - Input value to normalize.
 * @returns Unsigned 32-bit integer.
 */
export function toUint32(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return (Math.floor(value) >>> 0);
}

/**
 * Hash one or more numeric inputs into a 32-bit seed.
 * @param values - Numeric inputs to mix into the hash.
 * @returns Unsigned 32-bit hash.
 */
export function hashSeed(...values: number[]): number {
  let hash = FNV_OFFSET_BASIS;
  for (const value of values) {
    hash ^= toUint32(value);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Create a deterministic xorshift32 source from a seed.
 * @param seed - Seed value; zero is remapped since xorshift would stall on it.
 */
export function createRng(seed: number): RandomSource {
  let state = toUint32(seed) || 1;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

/**
 * Source that cycles through fixed values. Used to script food placement.
 * @param values - Values in [0, 1) returned in order, then repeated.
 */
export function sequenceRng(values: readonly number[]): RandomSource {
  if (!values.length) throw new RangeError('sequenceRng needs at least one value');
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index += 1;
    return value;
  };
}

/**
 * Returns a random integer in [0, n).
 * @param rng - Source to draw from.
 * @param n - Exclusive upper bound, at least 1.
 */
export function randomInt(rng: RandomSource, n: number): number {
  const bound = Math.max(1, Math.floor(n));
  const value = Math.floor(rng() * bound);
  // A source returning exactly 1 would land on the bound itself.
  return Math.max(0, Math.min(bound - 1, value));
}

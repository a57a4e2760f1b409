/**
 * Deterministic integer hashing for value functions.
 * Pure 32-bit arithmetic; identical results on every call and worker.
 */

/** Murmur3 finalizer over an unsigned 32-bit word */
export function fmix32(word: number): number {
  let h = word >>> 0;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

/**
 * Hash a cycle (any safe integer; fractions are truncated) to [0, 2^32).
 * Both 32-bit halves contribute, so cycles beyond 2^32 stay distinct.
 */
export function hashCycle(value: number): number {
  const whole = Math.trunc(value);
  const lo = whole >>> 0;
  const hi = Math.floor(whole / 0x100000000) >>> 0;
  return fmix32(lo ^ fmix32(hi + 0x9e3779b9));
}

/** Map a hash into [0, 1) */
export function toUnitInterval(hash: number): number {
  return (hash >>> 0) / 0x100000000;
}

/**
 * Xorshift32 sequence seeded from a hash.
 * Returns a generator function; each call advances the sequence.
 */
export function xorshift32(seed: number): () => number {
  let state = seed >>> 0 || 0x9e3779b9;
  return () => {
    state ^= state << 13;
    state >>>= 0;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    return state;
  };
}

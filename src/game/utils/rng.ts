/**
 * Injectable random source. Returns a value in [0, 1), matching the
 * `Math.random()` contract, so callers can pass either `Math.random`
 * (production) or a seeded instance (tests, replays).
 */
export type Rng = () => number;

/**
 * Create a deterministic RNG function from an integer seed.
 *
 * Mulberry32: a fast, well-distributed 32-bit PRNG. The same seed always
 * yields the same sequence.
 */
export function createSeededRng(seed: number): Rng {
  let state = seed | 0; // coerce to 32-bit int
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Pick an index in [0, length) using `rng`. `length` must be positive. */
export function pickIndex(rng: Rng, length: number): number {
  const value = rng();
  // A broken rng (NaN, Infinity) falls back to the first index.
  if (!Number.isFinite(value)) return 0;
  const index = Math.floor(value * length);
  // Guard against rng implementations that return exactly 1.
  return Math.min(length - 1, Math.max(0, index));
}

/** Largest value returned by a {@link createRand} generator. */
export const RAND_MAX = 0x7fff;

/**
 * Seeded linear congruential generator producing integers in [0, RAND_MAX].
 *
 * State update is `s = s * 214013 + 2531011 (mod 2^32)`, output is bits
 * 16..30 of the new state. Same seed, same sequence.
 */
export function createRand(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 214013) + 2531011) >>> 0;
    return (state >>> 16) & RAND_MAX;
  };
}

/**
 * Random Sources
 *
 * The search engines never call Math.random directly. They take a
 * RandomSource so tests can run them under a fixed seed.
 */

export interface RandomSource {
  /** Uniform integer in [0, n). n must be a positive integer. */
  nextInt(n: number): number
}

/**
 * Deterministic xorshift32 generator.
 *
 * @param seed - Any integer; 0 is remapped since xorshift never leaves the zero state
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0 || 0x9e3779b9

  const next = (): number => {
    state ^= state << 13
    state >>>= 0
    state ^= state >>> 17
    state ^= state << 5
    state >>>= 0
    return state
  }

  return {
    nextInt(n: number): number {
      if (!Number.isInteger(n) || n <= 0) {
        throw new RangeError(`nextInt bound must be a positive integer, got ${n}`)
      }
      // 2^32 scaling keeps the result uniform for the small bounds used here
      return Math.floor((next() / 0x100000000) * n)
    },
  }
}

// Seeded once per process
export const defaultRandom: RandomSource = createSeededRandom(Date.now())

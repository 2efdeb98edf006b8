/**
 * Seeded Pseudo-Random Number Generator
 *
 * Deterministic random numbers for reproducible synthetic series.
 * Uses a Linear Congruential Generator (LCG) algorithm.
 *
 * Usage:
 *   const rng = createSeededRandom(42)
 *   const u = rng.random()    // uniform in [0, 1)
 *   const z = rng.gaussian()  // standard normal
 */

export interface SeededRandom {
  /** Next uniform number in [0, 1) */
  random(): number
  /** Next standard normal deviate (Box-Muller) */
  gaussian(): number
  /** Current state (useful for debugging) */
  getState(): number
}

export function createSeededRandom(seed: number): SeededRandom {
  let state = seed | 0
  let spare: number | null = null

  function random(): number {
    // LCG parameters (same as glibc)
    state = (state * 1664525 + 1013904223) | 0
    return (state >>> 0) / 0x100000000
  }

  function gaussian(): number {
    if (spare !== null) {
      const z = spare
      spare = null
      return z
    }
    // 1 - u keeps the logarithm finite
    const u1 = 1 - random()
    const u2 = random()
    const radius = Math.sqrt(-2 * Math.log(u1))
    spare = radius * Math.sin(2 * Math.PI * u2)
    return radius * Math.cos(2 * Math.PI * u2)
  }

  return {
    random,
    gaussian,
    getState: () => state,
  }
}

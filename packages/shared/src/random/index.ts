/**
 * Swappable randomness.
 *
 * Everything that samples, shuffles or picks takes a `RandomSource` so that
 * callers (and tests) decide between `Math.random` and a seeded stream.
 */

export interface RandomSource {
  /** A float in [0, 1). */
  next(): number
}

export const defaultRandom: RandomSource = {
  next: () => Math.random(),
}

/**
 * Deterministic generator (mulberry32). Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0
      let t = state
      t = Math.imul(t ^ (t >>> 15), t | 1)
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    },
  }
}

/** Uniform integer in [0, maxExclusive). */
export function randomInt(random: RandomSource, maxExclusive: number): number {
  return Math.floor(random.next() * maxExclusive)
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  const item = items[randomInt(random, items.length)]
  if (item === undefined) {
    throw new Error("Cannot pick from an empty list")
  }
  return item
}

/** Fisher–Yates shuffle into a new array. */
export function shuffle<T>(random: RandomSource, items: readonly T[]): T[] {
  const out = [...items]
  for (let i = out.length - 1; i > 0; i--) {
    const j = randomInt(random, i + 1)
    const a = out[i]
    const b = out[j]
    if (a === undefined || b === undefined) continue
    out[i] = b
    out[j] = a
  }
  return out
}

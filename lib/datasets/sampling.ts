/**
 * @fileoverview Seeded sampling
 *
 * Dataset runs must be reproducible: the same seed picks the same papers
 * and the same replacements every time.
 *
 * @module lib/datasets/sampling
 */

export type RandomSource = () => number

/**
 * Deterministic PRNG (mulberry32) returning floats in [0, 1).
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Pick `count` items without replacement (partial Fisher-Yates).
 * The input array is not modified.
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: RandomSource
): T[] {
  const pool = [...items]
  const n = Math.min(Math.max(0, count), pool.length)
  for (let i = 0; i < n; i++) {
    const j = i + Math.floor(random() * (pool.length - i))
    const picked = pool[j]
    pool[j] = pool[i]
    pool[i] = picked
  }
  return pool.slice(0, n)
}

/**
 * Number of items a sampling ratio asks for: at least one.
 */
export function targetCount(total: number, ratio: number): number {
  return Math.max(1, Math.floor(total * ratio))
}

/**
 * Sample `max(1, floor(n * ratio))` items with a fixed seed.
 */
export function samplePapers<T>(items: readonly T[], ratio: number, seed: number): T[] {
  return sampleWithoutReplacement(items, targetCount(items.length, ratio), createSeededRandom(seed))
}

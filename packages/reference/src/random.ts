// =============================================================================
// LSE-PE - Operand Sampling
// =============================================================================
// Mulberry32 over a 32-bit seed. Random reference operands are drawn here so
// a vector set is reproducible from (seed, count, range) alone.

import { assertIntegerInRange } from '@lsepe/arith'

/** Largest accepted seed: the generator state is one unsigned 32-bit word. */
export const MAX_SEED = 2 ** 32 - 1

/** Draws a float in [0, 1). */
export type RandomSource = () => number

export function mulberry32(seed: number): RandomSource {
  assertIntegerInRange('seed', seed, 0, MAX_SEED)
  let state = seed
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = Math.imul(state ^ (state >>> 15), state | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 2 ** 32
  }
}

/**
 * Samples `count` operand pairs uniformly from [low, high), A before B.
 */
export function sampleOperandPairs(
  random: RandomSource,
  count: number,
  [low, high]: readonly [number, number]
): Array<[number, number]> {
  const draw = (): number => low + random() * (high - low)
  const pairs: Array<[number, number]> = []
  for (let i = 0; i < count; i++) {
    const a = draw()
    pairs.push([a, draw()])
  }
  return pairs
}

// =============================================================================
// LSE-PE - Adaptive Parameters
// =============================================================================

import { MAX_WIDTH, MIN_WIDTH } from './constants'
import { assertIntegerInRange } from './errors'
import { asFixedPointCode } from './types'
import type { AdaptiveParameters } from './types'

const cache = new Map<number, AdaptiveParameters>()

/**
 * Derive the adaptive constants for operand width `width`.
 *
 * @example
 * adaptiveParameters(12)
 * // { width: 12, smallCorrection: 1, diffThreshold: -256, maxVal: 0xFFF, negInf: 0x800 }
 */
export function adaptiveParameters(width: number): AdaptiveParameters {
  const cached = cache.get(width)
  if (cached) return cached

  assertIntegerInRange('width', width, MIN_WIDTH, MAX_WIDTH)

  const params: AdaptiveParameters = Object.freeze({
    width,
    smallCorrection: Math.floor(width / 8),
    diffThreshold: -(2 ** (width - 4)),
    maxVal: 2 ** width - 1,
    negInf: asFixedPointCode(2 ** (width - 1)),
  })
  cache.set(width, params)
  return params
}

/**
 * Reduce a non-negative integer to its low `width` bits.
 * Arithmetic rather than `&`, which would go negative at width 32.
 */
export function maskToWidth(value: number, width: number): number {
  return value % 2 ** width
}

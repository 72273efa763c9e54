// =============================================================================
// LSE-PE - Reference Fixed-Point Format
// =============================================================================
// Unsigned Q14.10 over the base-2 log domain, matching the 24-bit lse_add
// datapath. Independent of the adaptive engine's operand width.

import { invalidOperand } from '@lsepe/arith'

/** Total code width in bits */
export const WIDTH = 24

/** Fractional bits */
export const FRAC_BITS = 10

/** 2^FRAC_BITS: codes per unit of log2 magnitude */
export const SCALE = 2 ** FRAC_BITS

/** Largest code: 0xFFFFFF */
export const MAX_VAL = 2 ** WIDTH - 1

/** Negative-infinity sentinel: 0x800000 */
export const NEG_INF_CODE = 2 ** (WIDTH - 1)

/**
 * Round to nearest, ties to even.
 */
export function roundHalfEven(value: number): number {
  if (!Number.isFinite(value)) return value
  const floor = Math.floor(value)
  const fraction = value - floor
  if (fraction > 0.5) return floor + 1
  if (fraction < 0.5) return floor
  return floor % 2 === 0 ? floor : floor + 1
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max)
}

/**
 * Convert a base-2 logarithmic real value to an unsigned fixed-point code.
 * Out-of-range values clamp to [0, MAX_VAL]; -Infinity maps to 0.
 */
export function realToFixed(value: number): number {
  if (Number.isNaN(value)) {
    throw invalidOperand('value', value)
  }
  return clamp(roundHalfEven(value * SCALE), 0, MAX_VAL)
}

export function fixedToReal(code: number): number {
  return code / SCALE
}

/**
 * Zero-padded uppercase hex, `digits` wide (default: one 24-bit code).
 *
 * @example
 * toHex(0x101) // '0x000101'
 */
export function toHex(value: number, digits: number = 6): string {
  return `0x${value.toString(16).toUpperCase().padStart(digits, '0')}`
}

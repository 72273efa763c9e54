// =============================================================================
// LSE-PE - Correction Look-Up Table (CLUT)
// =============================================================================
// The hardware approximates f(x) = log2(1 + 2^x) on [0, 1) by x. The CLUT
// stores the residual e(x) = f(x) - x at `entries` uniform sample points,
// quantized to `bitWidth` bits against the largest sampled error. A consumer
// recovers the additive correction as quantized[i] * scale, where
// scale = maxError / (2^bitWidth - 1).

import { assertIntegerInRange, invalidConfiguration } from '@lsepe/arith'
import { clamp, roundHalfEven } from './fixed-point'

export const DEFAULT_CLUT_ENTRIES = 16
export const DEFAULT_CLUT_BIT_WIDTH = 10

/** Largest table the builder accepts (20-bit address) */
export const MAX_CLUT_ENTRIES = 1 << 20
export const MAX_CLUT_BIT_WIDTH = 32

export interface ClutTable {
  readonly entries: number
  readonly bitWidth: number
  /** log2(entries) */
  readonly addressWidth: number
  /** Table contents in address order */
  readonly quantized: readonly number[]
  readonly samplePoints: readonly number[]
  readonly exactErrors: readonly number[]
  /** Quantization reference; travels with the table */
  readonly maxError: number
  /** maxError / (2^bitWidth - 1) */
  readonly scale: number
}

export interface ClutAnalysis {
  readonly scale: number
  readonly dequantized: readonly number[]
  readonly reconstructionErrors: readonly number[]
  readonly maxReconstructionError: number
}

/** f(x) = log2(1 + 2^x) */
export function exactCorrection(x: number): number {
  return Math.log2(1 + 2 ** x)
}

/** First-order hardware approximation: f(x) ≈ x */
export function approximateCorrection(x: number): number {
  return x
}

/** e(x) = f(x) - approx(x) */
export function correctionError(x: number): number {
  return exactCorrection(x) - approximateCorrection(x)
}

export function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && (value & (value - 1)) === 0
}

/**
 * Build the quantized correction table.
 *
 * @example
 * buildClut(16, 10).quantized.slice(0, 3) // [1023, 991, 960]
 */
export function buildClut(
  entries: number = DEFAULT_CLUT_ENTRIES,
  bitWidth: number = DEFAULT_CLUT_BIT_WIDTH
): ClutTable {
  assertIntegerInRange('entries', entries, 1, MAX_CLUT_ENTRIES)
  if (!isPowerOfTwo(entries)) {
    throw invalidConfiguration('entries', entries, 'Must be a power of two.')
  }
  assertIntegerInRange('bitWidth', bitWidth, 1, MAX_CLUT_BIT_WIDTH)

  const samplePoints: number[] = []
  const exactErrors: number[] = []
  let maxError = -Infinity
  for (let i = 0; i < entries; i++) {
    const x = i / entries
    const err = correctionError(x)
    samplePoints.push(x)
    exactErrors.push(err)
    if (err > maxError) maxError = err
  }

  const maxInt = 2 ** bitWidth - 1
  const quantized = exactErrors.map((err) => clamp(roundHalfEven((err / maxError) * maxInt), 0, maxInt))

  return Object.freeze({
    entries,
    bitWidth,
    addressWidth: 31 - Math.clz32(entries),
    quantized: Object.freeze(quantized),
    samplePoints: Object.freeze(samplePoints),
    exactErrors: Object.freeze(exactErrors),
    maxError,
    scale: maxError / maxInt,
  })
}

/**
 * Rescaled additive correction stored at `address`.
 */
export function lookupCorrection(table: ClutTable, address: number): number {
  assertIntegerInRange('address', address, 0, table.entries - 1)
  return table.quantized[address] * table.scale
}

/**
 * Quantization statistics of a built table.
 */
export function analyzeClut(table: ClutTable): ClutAnalysis {
  const dequantized = table.quantized.map((q) => q * table.scale)
  const reconstructionErrors = dequantized.map((value, i) => Math.abs(table.exactErrors[i] - value))
  return {
    scale: table.scale,
    dequantized,
    reconstructionErrors,
    maxReconstructionError: reconstructionErrors.reduce((max, err) => Math.max(max, err), 0),
  }
}

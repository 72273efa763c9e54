/**
 * LSE-PE - Fixed-Point Types
 * Branded types keep raw integers, codes and packed words apart.
 */

/**
 * An unsigned W-bit code over the base-2 logarithmic domain.
 * MUST be created via asFixedPointCode() or an engine operation.
 */
export type FixedPointCode = number & { readonly __brand: 'FixedPointCode' }

/**
 * A wide word holding several lanes side by side (lane 0 in the low bits).
 */
export type PackedWord = number & { readonly __brand: 'PackedWord' }

/**
 * Decoded view of a code: negative infinity, or a finite magnitude.
 */
export type LogValue =
  | { readonly kind: 'neg-inf' }
  | { readonly kind: 'finite'; readonly code: FixedPointCode }

/**
 * Width-derived constants of the adaptive approximation.
 * Derived once per width by adaptiveParameters().
 */
export interface AdaptiveParameters {
  /** Operand width W in bits */
  readonly width: number
  /** Correction quantum added when the smaller operand matters: floor(W / 8) */
  readonly smallCorrection: number
  /** Cutoff on (smaller - larger): -2^(W-4), fractional below W = 4 */
  readonly diffThreshold: number
  /** Largest representable code: 2^W - 1 */
  readonly maxVal: number
  /** Sentinel for negative infinity: 2^(W-1) */
  readonly negInf: FixedPointCode
}

/**
 * Which step of the approximation produced a result.
 */
export type LseBranch = 'identity' | 'correct' | 'saturate' | 'passthrough'

export interface LseTrace {
  readonly result: FixedPointCode
  readonly branch: LseBranch
  /** smaller - larger; 0 for the identity branch */
  readonly diff: number
}

/**
 * Split of an N-bit word into equal W-bit lanes.
 */
export interface LaneLayout {
  readonly totalWidth: number
  readonly laneWidth: number
  readonly laneCount: number
}

/**
 * Brand a number as a FixedPointCode without range checks.
 */
export function asFixedPointCode(value: number): FixedPointCode {
  return value as FixedPointCode
}

/**
 * Brand a number as a PackedWord without range checks.
 */
export function asPackedWord(value: number): PackedWord {
  return value as PackedWord
}

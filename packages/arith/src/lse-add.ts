// =============================================================================
// LSE-PE - Adaptive LSE Adder
// =============================================================================
// Bit-exact model of the width-adaptive, saturating log-sum-exp adder.
//
//   lse(a, b) = max(a, b) + log(1 + exp(min - max))
//
// is approximated by a single correction quantum: when the smaller operand
// lies within DIFF_THRESHOLD of the larger one, SMALL_CORRECTION is added to
// the larger operand (saturating at MAX_VAL); otherwise the larger operand
// passes through. The residual error is compensated downstream by the CLUT.

import { invalidOperand } from './errors'
import { adaptiveParameters, maskToWidth } from './params'
import { asFixedPointCode } from './types'
import type { AdaptiveParameters, FixedPointCode, LogValue, LseTrace } from './types'

// ============================================================================
// SENTINEL ENCODING
// ============================================================================

export function isNegInf(code: number, params: AdaptiveParameters): boolean {
  return code === params.negInf
}

/**
 * Decode a raw code into its tagged form.
 */
export function decodeCode(code: number, params: AdaptiveParameters): LogValue {
  const masked = toOperand(code, params, 'code')
  if (masked === params.negInf) return { kind: 'neg-inf' }
  return { kind: 'finite', code: masked }
}

/**
 * Encode a tagged value back to the raw bit pattern.
 */
export function encodeValue(value: LogValue, params: AdaptiveParameters): FixedPointCode {
  if (value.kind === 'neg-inf') return params.negInf
  return asFixedPointCode(maskToWidth(value.code, params.width))
}

function toOperand(value: number, params: AdaptiveParameters, name: string): FixedPointCode {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw invalidOperand(name, value)
  }
  return asFixedPointCode(maskToWidth(value, params.width))
}

// ============================================================================
// ADDITION
// ============================================================================

/**
 * LSE addition with a report of the branch taken.
 *
 * Operands are truncated to `params.width` bits on entry.
 */
export function lseAddTraced(a: number, b: number, params: AdaptiveParameters): LseTrace {
  const lhs = decodeCode(toOperand(a, params, 'a'), params)
  const rhs = decodeCode(toOperand(b, params, 'b'), params)

  // -inf is the additive identity
  if (lhs.kind === 'neg-inf') {
    return { result: encodeValue(rhs, params), branch: 'identity', diff: 0 }
  }
  if (rhs.kind === 'neg-inf') {
    return { result: lhs.code, branch: 'identity', diff: 0 }
  }

  const larger = Math.max(lhs.code, rhs.code)
  const smaller = Math.min(lhs.code, rhs.code)
  const diff = smaller - larger // always <= 0

  // Strict comparison: diff === diffThreshold takes the passthrough branch
  if (diff > params.diffThreshold) {
    if (larger > params.maxVal - params.smallCorrection) {
      return { result: asFixedPointCode(params.maxVal), branch: 'saturate', diff }
    }
    const corrected = maskToWidth(larger + params.smallCorrection, params.width)
    return { result: asFixedPointCode(corrected), branch: 'correct', diff }
  }

  return { result: asFixedPointCode(maskToWidth(larger, params.width)), branch: 'passthrough', diff }
}

/**
 * LSE addition of two W-bit codes.
 *
 * @example
 * lseAdd(0x100, 0x050, adaptiveParameters(12)) // 0x101
 */
export function lseAdd(a: number, b: number, params: AdaptiveParameters): FixedPointCode {
  return lseAddTraced(a, b, params).result
}

/**
 * Width-level convenience over lseAdd().
 */
export function lseAddAdaptive(a: number, b: number, width: number): FixedPointCode {
  return lseAdd(a, b, adaptiveParameters(width))
}

/**
 * Accumulate a sequence of codes, starting from -inf.
 */
export function lseReduce(codes: readonly number[], params: AdaptiveParameters): FixedPointCode {
  let acc: FixedPointCode = params.negInf
  for (let i = 0; i < codes.length; i++) {
    acc = lseAdd(acc, codes[i], params)
  }
  return acc
}

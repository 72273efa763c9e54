// =============================================================================
// LSE-PE - SIMD Test Cases
// =============================================================================
// Expected results for the SIMD testbenches, derived by running curated
// operand words through the lane packer and the adaptive adder.

import {
  SIMD_MODE,
  adaptiveParameters,
  applySimd,
  invalidConfiguration,
  lseAdd,
  pack,
  simdLayout,
  unpack,
} from '@lsepe/arith'
import type { SimdMode } from '@lsepe/arith'

export interface SimdCaseInput {
  readonly name: string
  readonly mode: SimdMode
  /** Packed operand words, lane 0 in the low bits */
  readonly operandA: number
  readonly operandB: number
}

export interface SimdLaneResult {
  readonly a: number
  readonly b: number
  readonly expected: number
}

export interface SimdTestCase extends SimdCaseInput {
  readonly laneWidth: number
  readonly expected: number
  readonly lanes: readonly SimdLaneResult[]
}

function lanesToWord(parameter: string, lanes: readonly number[], laneWidth: number, laneCount: number): number {
  if (lanes.length !== laneCount) {
    throw invalidConfiguration(parameter, `[${lanes.join(', ')}]`, `Must list exactly ${laneCount} lanes.`)
  }
  lanes.forEach((lane, i) => {
    if (!Number.isSafeInteger(lane) || lane < 0 || lane >= 2 ** laneWidth) {
      throw invalidConfiguration(`${parameter}[${i}]`, lane, `Must be a ${laneWidth}-bit lane code.`)
    }
  })
  return pack(lanes, laneWidth)
}

/**
 * Describe a case by its per-lane operands (lane 0 first) instead of packed
 * words. Each list must hold one `laneWidth`-bit code per lane of the mode.
 */
export function laneCase(name: string, mode: SimdMode, lanesA: readonly number[], lanesB: readonly number[]): SimdCaseInput {
  const { laneWidth, laneCount } = simdLayout(mode)
  return {
    name,
    mode,
    operandA: lanesToWord('lanesA', lanesA, laneWidth, laneCount),
    operandB: lanesToWord('lanesB', lanesB, laneWidth, laneCount),
  }
}

/** 2×12b testbench: [lane0, lane1] */
export const DUAL_12_CASES: readonly SimdCaseInput[] = [
  laneCase('Basic dual-channel LSE', SIMD_MODE.DUAL_12, [0x100, 0x200], [0x050, 0x100]),
  laneCase('Zero inputs both channels', SIMD_MODE.DUAL_12, [0x000, 0x000], [0x000, 0x000]),
  laneCase('Maximum value saturation', SIMD_MODE.DUAL_12, [0xfff, 0xfff], [0x001, 0x001]),
  laneCase('Asymmetric channel values', SIMD_MODE.DUAL_12, [0x800, 0x100], [0x200, 0x800]),
  laneCase('Sequential test 0', SIMD_MODE.DUAL_12, [0x100, 0x200], [0x050, 0x100]),
  laneCase('Sequential test 1', SIMD_MODE.DUAL_12, [0x110, 0x220], [0x058, 0x110]),
  laneCase('Sequential test 2', SIMD_MODE.DUAL_12, [0x120, 0x240], [0x060, 0x120]),
  laneCase('Sequential test 3', SIMD_MODE.DUAL_12, [0x130, 0x260], [0x068, 0x130]),
]

/** 4×6b testbench: [lane0 .. lane3] */
export const QUAD_6_CASES: readonly SimdCaseInput[] = [
  laneCase('Basic quad-channel LSE', SIMD_MODE.QUAD_6, [0x05, 0x0a, 0x15, 0x20], [0x03, 0x08, 0x12, 0x18]),
  laneCase('Zero inputs all channels', SIMD_MODE.QUAD_6, [0x00, 0x00, 0x00, 0x00], [0x00, 0x00, 0x00, 0x00]),
  laneCase('Maximum 6-bit saturation', SIMD_MODE.QUAD_6, [0x3f, 0x3f, 0x3f, 0x3f], [0x01, 0x01, 0x01, 0x01]),
  laneCase('Channel independence test', SIMD_MODE.QUAD_6, [0x10, 0x20, 0x30, 0x08], [0x08, 0x10, 0x18, 0x30]),
  laneCase('Equal channels test', SIMD_MODE.QUAD_6, [0x02, 0x04, 0x08, 0x10], [0x02, 0x04, 0x08, 0x10]),
]

/** Unified datapath: one case per mode */
export const UNIFIED_CASES: readonly SimdCaseInput[] = [
  { name: '24-bit mode', mode: SIMD_MODE.FULL_24, operandA: 0x100050, operandB: 0x100050 },
  { name: '2x12b mode', mode: SIMD_MODE.DUAL_12, operandA: 0x200100, operandB: 0x100050 },
  { name: '4x6b mode', mode: SIMD_MODE.QUAD_6, operandA: 0x041044, operandB: 0x041044 },
]

/**
 * Compute expected words and per-lane breakdowns.
 */
export function deriveSimdCases(inputs: readonly SimdCaseInput[]): SimdTestCase[] {
  return inputs.map((input) => {
    const { laneWidth, laneCount } = simdLayout(input.mode)
    const params = adaptiveParameters(laneWidth)
    const lanesA = unpack(input.operandA, laneWidth, laneCount)
    const lanesB = unpack(input.operandB, laneWidth, laneCount)
    const lanes = lanesA.map((a, i) => ({ a, b: lanesB[i], expected: lseAdd(a, lanesB[i], params) }))

    return {
      ...input,
      laneWidth,
      expected: applySimd(input.operandA, input.operandB, input.mode),
      lanes,
    }
  })
}

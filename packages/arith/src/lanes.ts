// =============================================================================
// LSE-PE - SIMD Lane Packing
// =============================================================================
// A wide word is split into equal lanes, lane 0 in the least-significant bits:
//
//   4 × 6b:  [ lane3 | lane2 | lane1 | lane0 ]
//             23..18  17..12  11..6   5..0
//
// Each lane is an independent W-bit code; no carry or sentinel crosses a lane
// boundary.

import { DATAPATH_WIDTH, MAX_WIDTH, MAX_WORD_WIDTH, SIMD_LANE_WIDTH, SIMD_MODE } from './constants'
import type { SimdMode } from './constants'
import { assertIntegerInRange, invalidConfiguration, invalidOperand } from './errors'
import { lseAdd } from './lse-add'
import { adaptiveParameters, maskToWidth } from './params'
import { asFixedPointCode, asPackedWord } from './types'
import type { FixedPointCode, LaneLayout, PackedWord } from './types'

/**
 * Validate and describe the split of a `totalWidth`-bit word into
 * `laneWidth`-bit lanes.
 */
export function laneLayout(totalWidth: number, laneWidth: number): LaneLayout {
  assertIntegerInRange('totalWidth', totalWidth, 1, MAX_WORD_WIDTH)
  assertIntegerInRange('laneWidth', laneWidth, 1, MAX_WIDTH)
  if (totalWidth % laneWidth !== 0) {
    throw invalidConfiguration(
      'laneWidth',
      laneWidth,
      `Must divide the total width ${totalWidth}.`
    )
  }
  return Object.freeze({ totalWidth, laneWidth, laneCount: totalWidth / laneWidth })
}

/**
 * Resolve a `pe_mode` selector to its lane layout.
 */
export function simdLayout(mode: number): LaneLayout {
  if (!isSimdMode(mode)) {
    throw invalidConfiguration('mode', mode, 'Supported modes: 0 (1x24), 1 (2x12), 2 (4x6).')
  }
  return laneLayout(DATAPATH_WIDTH, SIMD_LANE_WIDTH[mode])
}

export function isSimdMode(mode: number): mode is SimdMode {
  return mode === SIMD_MODE.FULL_24 || mode === SIMD_MODE.DUAL_12 || mode === SIMD_MODE.QUAD_6
}

// ============================================================================
// PACK / UNPACK
// ============================================================================

/**
 * Packs lane codes into one word, lane `i` at bit offset `i * laneWidth`.
 * Each lane is truncated to `laneWidth` bits.
 *
 * @example
 * pack([0x101, 0x200], 12) // 0x200101
 */
export function pack(lanes: readonly number[], laneWidth: number): PackedWord {
  const layout = laneLayout(laneWidth * Math.max(lanes.length, 1), laneWidth)
  const span = 2 ** layout.laneWidth
  let word = 0
  let weight = 1

  for (let i = 0; i < lanes.length; i++) {
    const lane = lanes[i]
    if (!Number.isSafeInteger(lane) || lane < 0) {
      throw invalidOperand(`lanes[${i}]`, lane)
    }
    word += maskToWidth(lane, layout.laneWidth) * weight
    weight *= span
  }

  return asPackedWord(word)
}

/**
 * Unpacks `laneCount` lanes of `laneWidth` bits, lane 0 first.
 * Bits above `laneCount * laneWidth` are ignored.
 */
export function unpack(word: number, laneWidth: number, laneCount: number): FixedPointCode[] {
  const layout = laneLayout(laneWidth * laneCount, laneWidth)
  if (!Number.isSafeInteger(word) || word < 0) {
    throw invalidOperand('word', word)
  }
  const span = 2 ** layout.laneWidth
  const lanes: FixedPointCode[] = []
  let remaining = word

  for (let i = 0; i < layout.laneCount; i++) {
    lanes.push(asFixedPointCode(remaining % span))
    remaining = Math.floor(remaining / span)
  }

  return lanes
}

// ============================================================================
// LANE-WISE LSE
// ============================================================================

/**
 * Apply the adaptive LSE adder to each lane pair of two words.
 */
export function applyLanes(wordA: number, wordB: number, layout: LaneLayout): PackedWord {
  const params = adaptiveParameters(layout.laneWidth)
  const lanesA = unpack(wordA, layout.laneWidth, layout.laneCount)
  const lanesB = unpack(wordB, layout.laneWidth, layout.laneCount)
  const results: FixedPointCode[] = []

  for (let i = 0; i < layout.laneCount; i++) {
    results.push(lseAdd(lanesA[i], lanesB[i], params))
  }

  return pack(results, layout.laneWidth)
}

/**
 * Apply the adaptive LSE adder in the given SIMD mode.
 *
 * @example
 * applySimd(0x200100, 0x100050, SIMD_MODE.DUAL_12) // 0x200101
 */
export function applySimd(wordA: number, wordB: number, mode: number): PackedWord {
  return applyLanes(wordA, wordB, simdLayout(mode))
}

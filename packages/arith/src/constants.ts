// =============================================================================
// LSE-PE - Arithmetic Constants
// =============================================================================
// Width limits, SIMD mode selectors and error codes shared by the engine and
// the lane packer.

/**
 * Narrowest operand width the adaptive engine accepts.
 */
export const MIN_WIDTH = 1

/**
 * Widest operand width the adaptive engine accepts.
 * Codes stay well inside the safe-integer range of a JS number.
 */
export const MAX_WIDTH = 32

/**
 * Widest packed word the lane packer accepts (lanes are combined with
 * multiplication, so the word must remain an exact integer).
 */
export const MAX_WORD_WIDTH = 48

/**
 * Total width of the processing element's data path.
 */
export const DATAPATH_WIDTH = 24

// =============================================================================
// SIMD MODES
// =============================================================================
/**
 * 2-bit `pe_mode` selector of the SIMD datapath.
 *
 * ┌──────┬─────────┬────────────┬────────────┐
 * │ Mode │ Layout  │ Lane width │ Lane count │
 * ├──────┼─────────┼────────────┼────────────┤
 * │ 0b00 │ 1 × 24  │ 24         │ 1          │
 * │ 0b01 │ 2 × 12  │ 12         │ 2          │
 * │ 0b10 │ 4 × 6   │ 6          │ 4          │
 * │ 0b11 │ reserved                          │
 * └──────┴───────────────────────────────────┘
 */
export const SIMD_MODE = {
  FULL_24: 0,
  DUAL_12: 1,
  QUAD_6: 2,
} as const

/**
 * Lane width selected by each SIMD mode.
 */
export const SIMD_LANE_WIDTH = {
  [SIMD_MODE.FULL_24]: 24,
  [SIMD_MODE.DUAL_12]: 12,
  [SIMD_MODE.QUAD_6]: 6,
} as const

// =============================================================================
// ERROR CODES
// =============================================================================
export const ERROR = {
  /** Width, entry count or lane layout rejected before any computation */
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
  /** Operand is not a non-negative safe integer */
  INVALID_OPERAND: 'INVALID_OPERAND',
} as const

export type SimdMode = (typeof SIMD_MODE)[keyof typeof SIMD_MODE]
export type ErrorCode = (typeof ERROR)[keyof typeof ERROR]

// =============================================================================
// LSE-PE - Arithmetic Module
// =============================================================================
// Width-adaptive LSE adder and SIMD lane packing.

// Constants
export {
  MIN_WIDTH,
  MAX_WIDTH,
  MAX_WORD_WIDTH,
  DATAPATH_WIDTH,
  SIMD_MODE,
  SIMD_LANE_WIDTH,
  ERROR,
} from './constants'
export type { SimdMode, ErrorCode } from './constants'

// Types
export type {
  FixedPointCode,
  PackedWord,
  LogValue,
  AdaptiveParameters,
  LseBranch,
  LseTrace,
  LaneLayout,
} from './types'
export { asFixedPointCode, asPackedWord } from './types'

// Errors
export { LseConfigError, invalidConfiguration, invalidOperand, assertIntegerInRange } from './errors'

// Engine
export { adaptiveParameters, maskToWidth } from './params'
export {
  isNegInf,
  decodeCode,
  encodeValue,
  lseAdd,
  lseAddTraced,
  lseAddAdaptive,
  lseReduce,
} from './lse-add'

// Lanes
export { laneLayout, simdLayout, isSimdMode, pack, unpack, applyLanes, applySimd } from './lanes'

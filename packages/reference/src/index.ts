// =============================================================================
// LSE-PE - Reference Generators
// =============================================================================
// CLUT builder, exact reference vectors and SIMD test cases. Every function
// returns structured data; serialization lives in @lsepe/codegen.

// Fixed-point format
export {
  WIDTH,
  FRAC_BITS,
  SCALE,
  MAX_VAL,
  NEG_INF_CODE,
  roundHalfEven,
  clamp,
  realToFixed,
  fixedToReal,
  toHex,
} from './fixed-point'

// PRNG
export { MAX_SEED, mulberry32, sampleOperandPairs } from './random'
export type { RandomSource } from './random'

// CLUT
export {
  DEFAULT_CLUT_ENTRIES,
  DEFAULT_CLUT_BIT_WIDTH,
  MAX_CLUT_ENTRIES,
  MAX_CLUT_BIT_WIDTH,
  exactCorrection,
  approximateCorrection,
  correctionError,
  isPowerOfTwo,
  buildClut,
  lookupCorrection,
  analyzeClut,
} from './clut'
export type { ClutTable, ClutAnalysis } from './clut'

// Reference vectors
export {
  BASE_CASES,
  DEFAULT_VECTOR_OPTIONS,
  computeExactLse,
  createReferenceVector,
  buildReferenceVectors,
} from './vectors'
export type { BaseCase, ReferenceVector, ReferenceVectorOptions } from './vectors'

// SIMD cases
export { DUAL_12_CASES, QUAD_6_CASES, UNIFIED_CASES, laneCase, deriveSimdCases } from './simd-cases'
export type { SimdCaseInput, SimdLaneResult, SimdTestCase } from './simd-cases'

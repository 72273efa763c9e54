// =============================================================================
// LSE-PE - Reference Vector Generator
// =============================================================================
// Exact base-2 log-sum-exp results for the 24-bit lse_add datapath, quantized
// to Q14.10 with a symmetric tolerance band for the verification harness.

import { assertIntegerInRange, invalidConfiguration } from '@lsepe/arith'
import { MAX_VAL, SCALE, realToFixed } from './fixed-point'
import { MAX_SEED, mulberry32, sampleOperandPairs } from './random'

export interface BaseCase {
  readonly label: string
  /** Operand A as a real log2 magnitude */
  readonly a: number
  /** Operand B as a real log2 magnitude */
  readonly b: number
}

export interface ReferenceVector {
  readonly label: string
  readonly operandA: number
  readonly operandB: number
  readonly expected: number
  readonly minExpected: number
  readonly maxExpected: number
  /** Exact real-valued result before quantization */
  readonly exactValue: number
  /** toleranceLsb expressed in log2 units */
  readonly errorTolerance: number
}

export interface ReferenceVectorOptions {
  baseCases?: readonly BaseCase[]
  /** Additional uniformly drawn cases (default: 16) */
  randomCount?: number
  /** PRNG seed, 0 to 2^32 - 1 (default: 2025) */
  seed?: number
  /** Symmetric tolerance around the expected code, in LSBs (default: 64) */
  toleranceLsb?: number
  /** Range of random operands, in log2 units (default: [0, 12]) */
  valueRange?: readonly [number, number]
}

/**
 * Curated cases always present in a vector set.
 */
export const BASE_CASES: readonly BaseCase[] = Object.freeze([
  { label: 'equal_5', a: 5.0, b: 5.0 },
  { label: 'close_delta_0p5', a: 5.0, b: 4.5 },
  { label: 'close_delta_1', a: 3.0, b: 2.0 },
  { label: 'medium_delta_4', a: 8.0, b: 4.0 },
  { label: 'medium_delta_5', a: 10.0, b: 5.0 },
  { label: 'large_delta_18', a: 20.0, b: 2.0 },
  { label: 'zero_zero', a: 0.0, b: 0.0 },
  { label: 'zero_vs_4', a: 0.0, b: 4.0 },
  { label: 'four_vs_zero', a: 4.0, b: 0.0 },
  { label: 'fractional_0p25', a: 0.25, b: -0.75 },
  { label: 'fractional_1p5', a: 1.5, b: 0.0 },
  { label: 'fractional_2p75', a: 2.75, b: 1.125 },
])

export const DEFAULT_VECTOR_OPTIONS: Required<ReferenceVectorOptions> = {
  baseCases: BASE_CASES,
  randomCount: 16,
  seed: 2025,
  toleranceLsb: 64,
  valueRange: [0.0, 12.0],
}

/**
 * log2(2^a + 2^b), evaluated as max + log2(1 + 2^(min - max)) through log1p.
 */
export function computeExactLse(a: number, b: number): number {
  const max = Math.max(a, b)
  const min = Math.min(a, b)
  if (max === Infinity || max === -Infinity) return max
  return max + Math.log1p(2 ** (min - max)) / Math.LN2
}

/**
 * Build one vector from real operands.
 */
export function createReferenceVector(
  label: string,
  a: number,
  b: number,
  toleranceLsb: number
): ReferenceVector {
  const exactValue = computeExactLse(a, b)
  const expected = realToFixed(exactValue)
  return Object.freeze({
    label,
    operandA: realToFixed(a),
    operandB: realToFixed(b),
    expected,
    minExpected: Math.max(expected - toleranceLsb, 0),
    maxExpected: Math.min(expected + toleranceLsb, MAX_VAL),
    exactValue,
    errorTolerance: toleranceLsb / SCALE,
  })
}

function validateOptions(cfg: Required<ReferenceVectorOptions>): void {
  assertIntegerInRange('randomCount', cfg.randomCount, 0, 99999)
  assertIntegerInRange('toleranceLsb', cfg.toleranceLsb, 0, MAX_VAL)
  assertIntegerInRange('seed', cfg.seed, 0, MAX_SEED)

  const [low, high] = cfg.valueRange
  if (!Number.isFinite(low) || !Number.isFinite(high) || low > high) {
    throw invalidConfiguration('valueRange', `[${low}, ${high}]`, 'Must be finite with min <= max.')
  }

  for (const base of cfg.baseCases) {
    if (Number.isNaN(base.a) || Number.isNaN(base.b)) {
      throw invalidConfiguration('baseCases', base.label, 'Operands must not be NaN.')
    }
  }
}

/** Options left out or set to `undefined` take their default. */
function withDefaults(options: ReferenceVectorOptions = {}): Required<ReferenceVectorOptions> {
  return {
    baseCases: options.baseCases ?? DEFAULT_VECTOR_OPTIONS.baseCases,
    randomCount: options.randomCount ?? DEFAULT_VECTOR_OPTIONS.randomCount,
    seed: options.seed ?? DEFAULT_VECTOR_OPTIONS.seed,
    toleranceLsb: options.toleranceLsb ?? DEFAULT_VECTOR_OPTIONS.toleranceLsb,
    valueRange: options.valueRange ?? DEFAULT_VECTOR_OPTIONS.valueRange,
  }
}

function byLabel(x: ReferenceVector, y: ReferenceVector): number {
  if (x.label < y.label) return -1
  if (x.label > y.label) return 1
  return 0
}

/**
 * Generate the reference vector set: base cases plus `randomCount` seeded
 * random cases labelled `random_NNN`, sorted by label.
 *
 * The same options always produce the same sequence.
 */
export function buildReferenceVectors(options?: ReferenceVectorOptions): ReferenceVector[] {
  const cfg = withDefaults(options)
  validateOptions(cfg)

  const vectors: ReferenceVector[] = []
  for (const base of cfg.baseCases) {
    vectors.push(createReferenceVector(base.label, base.a, base.b, cfg.toleranceLsb))
  }

  const pairs = sampleOperandPairs(mulberry32(cfg.seed), cfg.randomCount, cfg.valueRange)
  pairs.forEach(([a, b], i) => {
    vectors.push(createReferenceVector(`random_${String(i).padStart(3, '0')}`, a, b, cfg.toleranceLsb))
  })

  return vectors.sort(byLabel)
}

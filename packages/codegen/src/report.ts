/**
 * LSE-PE - JSON Reports
 * Plain objects ready for JSON.stringify. Keys are snake_case: these files
 * are read by the verification harness.
 */

import { FRAC_BITS, WIDTH, analyzeClut, toHex } from '@lsepe/reference'
import type { ClutTable, ReferenceVector, SimdTestCase } from '@lsepe/reference'
import { formatClutRom } from './systemverilog'

export interface ClutReport {
  parameters: {
    entries: number
    bit_width: number
    max_correction: number
    scale: number
  }
  sample_points: number[]
  exact_corrections: number[]
  quantized_values: number[]
  max_reconstruction_error: number
  systemverilog_code: string
}

export interface VectorReportEntry {
  label: string
  operand_a: number
  operand_b: number
  expected: number
  min_expected: number
  max_expected: number
  exact_value: number
  error_tolerance: number
  operand_a_hex: string
  operand_b_hex: string
  expected_hex: string
  min_expected_hex: string
  max_expected_hex: string
}

export interface VectorReport {
  width: number
  frac_bits: number
  tolerance_lsb: number
  vectors: VectorReportEntry[]
}

export interface SimdReport {
  cases: Array<{
    name: string
    mode: number
    lane_width: number
    operand_a_hex: string
    operand_b_hex: string
    expected_hex: string
    lanes: Array<{ a: number; b: number; expected: number }>
  }>
}

export function clutReport(table: ClutTable): ClutReport {
  const analysis = analyzeClut(table)
  return {
    parameters: {
      entries: table.entries,
      bit_width: table.bitWidth,
      max_correction: table.maxError,
      scale: table.scale,
    },
    sample_points: [...table.samplePoints],
    exact_corrections: [...table.exactErrors],
    quantized_values: [...table.quantized],
    max_reconstruction_error: analysis.maxReconstructionError,
    systemverilog_code: formatClutRom(table),
  }
}

export function vectorReport(vectors: readonly ReferenceVector[], toleranceLsb: number): VectorReport {
  return {
    width: WIDTH,
    frac_bits: FRAC_BITS,
    tolerance_lsb: toleranceLsb,
    vectors: vectors.map((v) => ({
      label: v.label,
      operand_a: v.operandA,
      operand_b: v.operandB,
      expected: v.expected,
      min_expected: v.minExpected,
      max_expected: v.maxExpected,
      exact_value: v.exactValue,
      error_tolerance: v.errorTolerance,
      operand_a_hex: toHex(v.operandA),
      operand_b_hex: toHex(v.operandB),
      expected_hex: toHex(v.expected),
      min_expected_hex: toHex(v.minExpected),
      max_expected_hex: toHex(v.maxExpected),
    })),
  }
}

export function simdReport(cases: readonly SimdTestCase[]): SimdReport {
  return {
    cases: cases.map((c) => ({
      name: c.name,
      mode: c.mode,
      lane_width: c.laneWidth,
      operand_a_hex: toHex(c.operandA),
      operand_b_hex: toHex(c.operandB),
      expected_hex: toHex(c.expected),
      lanes: c.lanes.map((lane) => ({ a: lane.a, b: lane.b, expected: lane.expected })),
    })),
  }
}

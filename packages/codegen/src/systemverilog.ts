// =============================================================================
// LSE-PE - SystemVerilog Emitters
// =============================================================================
// Render generated tables and vectors as SystemVerilog source. Pure string
// builders: callers decide where the text goes.

import { FRAC_BITS, SCALE, WIDTH } from '@lsepe/reference'
import type { ClutTable, ReferenceVector, SimdLaneResult, SimdTestCase } from '@lsepe/reference'

/**
 * `<bits>'h<HEX>` literal, zero-padded to the bit width.
 */
export function svHex(value: number, bits: number): string {
  const digits = Math.ceil(bits / 4)
  return `${bits}'h${value.toString(16).toUpperCase().padStart(digits, '0')}`
}

/**
 * Fixed-point decimal text with exact ties rounded to even, where
 * `Number.prototype.toFixed` rounds them away from zero.
 *
 * @example
 * formatDecimal(0.03125, 4) // '0.0312'
 */
export function formatDecimal(value: number, digits: number): string {
  const rounded = value.toFixed(digits)
  const exact = value.toFixed(100)
  const point = exact.indexOf('.')
  if (!/^50*$/.test(exact.slice(point + 1 + digits))) return rounded
  if (Number(rounded[rounded.length - 1]) % 2 === 0) return rounded
  return exact.slice(0, digits === 0 ? point : point + 1 + digits)
}

export function svBinary(value: number, bits: number): string {
  return `${bits}'b${value.toString(2).padStart(bits, '0')}`
}

/**
 * ROM initializer for the CLUT, one entry per address.
 *
 * @example
 * // CLUT ROM Data - 16 entries x 10 bits
 * logic [9:0] lut_rom [16] = '{
 *     10'h3FF,    // Entry  0: f(0.0000) correction
 *     ...
 * };
 */
export function formatClutRom(table: ClutTable): string {
  const { bitWidth, quantized } = table
  const lines = [
    `// CLUT ROM Data - ${quantized.length} entries x ${bitWidth} bits`,
    `logic [${bitWidth - 1}:0] lut_rom [${quantized.length}] = '{`,
  ]

  quantized.forEach((value, i) => {
    const separator = i === quantized.length - 1 ? ' ' : ','
    const x = formatDecimal(i / quantized.length, 4)
    const entry = String(i).padStart(2, ' ')
    lines.push(`    ${svHex(value, bitWidth)}${separator}    // Entry ${entry}: f(${x}) correction`)
  })

  lines.push('};', '')
  return lines.join('\n')
}

export interface VectorIncludeMeta {
  readonly toleranceLsb: number
}

function svReal(value: number): string {
  return formatDecimal(value, 12)
}

/**
 * Include file exposing the reference vectors to the lse_add testbench.
 */
export function formatVectorInclude(vectors: readonly ReferenceVector[], meta: VectorIncludeMeta): string {
  const msb = WIDTH - 1
  const lines = [
    '`ifndef LSE_ADD_REFERENCE_VECTORS_SVH',
    '`define LSE_ADD_REFERENCE_VECTORS_SVH',
    '',
    '// Auto-generated file. Do not edit manually.',
    '// Generated by lsepe-gen vectors',
    `// Format: unsigned Q${WIDTH - FRAC_BITS}.${FRAC_BITS}, base-2 log domain`,
    '',
    'typedef struct {',
    `    logic [${msb}:0] operand_a;`,
    `    logic [${msb}:0] operand_b;`,
    `    logic [${msb}:0] expected;`,
    `    logic [${msb}:0] min_expected;`,
    `    logic [${msb}:0] max_expected;`,
    '    real exact_value;',
    '    real error_tolerance;',
    '    string label;',
    '} lse_add_reference_vector_t;',
    '',
    `localparam int LSE_ADD_REFERENCE_VECTOR_COUNT = ${vectors.length};`,
    `localparam real LSE_ADD_REFERENCE_DEFAULT_TOLERANCE = ${formatDecimal(meta.toleranceLsb / SCALE, 6)};`,
    '',
  ]

  const declaration = 'lse_add_reference_vector_t LSE_ADD_REFERENCE_VECTORS [0:LSE_ADD_REFERENCE_VECTOR_COUNT-1]'
  if (vectors.length === 0) {
    lines.push(`${declaration};`, '')
  } else {
    lines.push(`${declaration} = '{`)
    vectors.forEach((v, i) => {
      const comma = i < vectors.length - 1 ? ',' : ''
      const fields = [
        svHex(v.operandA, WIDTH),
        svHex(v.operandB, WIDTH),
        svHex(v.expected, WIDTH),
        svHex(v.minExpected, WIDTH),
        svHex(v.maxExpected, WIDTH),
        svReal(v.exactValue),
        svReal(v.errorTolerance),
        JSON.stringify(v.label),
      ]
      lines.push(`    '{${fields.join(', ')}}${comma}`)
    })
    lines.push('};', '')
  }

  lines.push('`endif // LSE_ADD_REFERENCE_VECTORS_SVH', '')
  return lines.join('\n')
}

/**
 * `test_mode(...)` calls for the unified SIMD testbench.
 */
export function formatSimdCases(cases: readonly SimdTestCase[], title: string): string {
  const lines = [`// ${title}`, '// Generated by lsepe-gen simd', '']

  cases.forEach((c, i) => {
    const args = [
      svBinary(c.mode, 2),
      svHex(c.operandA, WIDTH),
      svHex(c.operandB, WIDTH),
      svHex(c.expected, WIDTH),
      JSON.stringify(c.name),
    ]
    lines.push(`        // Test ${i + 1}: ${c.name}`)
    lines.push(`        test_mode(${args.join(', ')});`)
    lines.push('')
  })

  return lines.join('\n')
}

function laneNames(prefix: string, count: number): string {
  if (count > 2) return `${prefix} channels`
  return Array.from({ length: count }, (_, i) => `${prefix}_ch${i}`).join(', ')
}

/**
 * Per-channel `apply_test_vector(...)` calls for the 2x12b and 4x6b
 * testbenches, each lane at its own width.
 *
 * @example
 *         // Test 1: Basic dual-channel LSE
 *         apply_test_vector(
 *             12'h100, 12'h200,  // x_ch0, x_ch1
 *             12'h050, 12'h100,  // y_ch0, y_ch1
 *             2'b01,  // pe_mode
 *             12'h101, 12'h200,  // expected
 *             "Basic dual-channel LSE"
 *         );
 */
export function formatLaneCases(cases: readonly SimdTestCase[], title: string): string {
  const lines = [`// ${title}`, '// Generated by lsepe-gen simd', '']

  cases.forEach((c, i) => {
    const field = (pick: (lane: SimdLaneResult) => number): string =>
      c.lanes.map((lane) => svHex(pick(lane), c.laneWidth)).join(', ')

    lines.push(
      `        // Test ${i + 1}: ${c.name}`,
      '        apply_test_vector(',
      `            ${field((lane) => lane.a)},  // ${laneNames('x', c.lanes.length)}`,
      `            ${field((lane) => lane.b)},  // ${laneNames('y', c.lanes.length)}`,
      `            ${svBinary(c.mode, 2)},  // pe_mode`,
      `            ${field((lane) => lane.expected)},  // expected`,
      `            ${JSON.stringify(c.name)}`,
      '        );',
      ''
    )
  })

  return lines.join('\n')
}

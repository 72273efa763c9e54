// =============================================================================
// LSE-PE - Artifact Generation
// =============================================================================

import { mkdirSync, writeFileSync } from 'fs'
import { dirname, resolve } from 'path'
import {
  DUAL_12_CASES,
  QUAD_6_CASES,
  UNIFIED_CASES,
  buildClut,
  buildReferenceVectors,
  deriveSimdCases,
} from '@lsepe/reference'
import type { GeneratorConfig } from './config'
import { clutReport, simdReport, vectorReport } from './report'
import { formatClutRom, formatLaneCases, formatSimdCases, formatVectorInclude } from './systemverilog'

export const COMMANDS = ['clut', 'vectors', 'simd', 'all'] as const
export type Command = (typeof COMMANDS)[number]

export function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value)
}

export interface Artifact {
  /** Path relative to the output directory */
  readonly path: string
  readonly contents: string
}

function json(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`
}

export function clutArtifacts(config: GeneratorConfig): Artifact[] {
  const table = buildClut(config.clut.entries, config.clut.bitWidth)
  return [
    { path: 'clut_rom.sv', contents: formatClutRom(table) },
    { path: 'clut_report.json', contents: json(clutReport(table)) },
  ]
}

export function vectorArtifacts(config: GeneratorConfig): Artifact[] {
  const { toleranceLsb } = config.vectors
  const vectors = buildReferenceVectors(config.vectors)
  return [
    { path: 'lse_add_reference_vectors.svh', contents: formatVectorInclude(vectors, { toleranceLsb }) },
    { path: 'lse_add_reference_vectors.json', contents: json(vectorReport(vectors, toleranceLsb)) },
  ]
}

export function simdArtifacts(): Artifact[] {
  const dual = deriveSimdCases(DUAL_12_CASES)
  const quad = deriveSimdCases(QUAD_6_CASES)
  const unified = deriveSimdCases(UNIFIED_CASES)
  return [
    { path: 'simd_2x12b_tests.sv', contents: formatLaneCases(dual, 'SIMD 2x12b test cases') },
    { path: 'simd_4x6b_tests.sv', contents: formatLaneCases(quad, 'SIMD 4x6b test cases') },
    { path: 'simd_unified_tests.sv', contents: formatSimdCases(unified, 'SIMD unified test cases') },
    { path: 'simd_cases.json', contents: json(simdReport([...dual, ...quad, ...unified])) },
  ]
}

/**
 * Build every artifact a command produces, without touching the filesystem.
 */
export function generateArtifacts(command: Command, config: GeneratorConfig): Artifact[] {
  switch (command) {
    case 'clut':
      return clutArtifacts(config)
    case 'vectors':
      return vectorArtifacts(config)
    case 'simd':
      return simdArtifacts()
    case 'all':
      return [...clutArtifacts(config), ...vectorArtifacts(config), ...simdArtifacts()]
  }
}

/**
 * Write artifacts under `outDir`; returns the absolute paths written.
 */
export function writeArtifacts(artifacts: readonly Artifact[], outDir: string): string[] {
  return artifacts.map((artifact) => {
    const target = resolve(outDir, artifact.path)
    mkdirSync(dirname(target), { recursive: true })
    writeFileSync(target, artifact.contents, 'utf8')
    return target
  })
}

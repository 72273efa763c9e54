// =============================================================================
// LSE-PE - Generator Configuration
// =============================================================================
// Layered as: schema defaults < JSON config file < command-line flags.

import { readFileSync } from 'fs'
import { z } from 'zod'
import { invalidConfiguration } from '@lsepe/arith'
import {
  DEFAULT_CLUT_BIT_WIDTH,
  DEFAULT_CLUT_ENTRIES,
  DEFAULT_VECTOR_OPTIONS,
  MAX_CLUT_BIT_WIDTH,
  MAX_SEED,
} from '@lsepe/reference'

export const ClutConfigSchema = z.object({
  entries: z.number().int().positive().default(DEFAULT_CLUT_ENTRIES),
  bitWidth: z.number().int().min(1).max(MAX_CLUT_BIT_WIDTH).default(DEFAULT_CLUT_BIT_WIDTH),
})

export const VectorConfigSchema = z.object({
  toleranceLsb: z.number().int().nonnegative().default(DEFAULT_VECTOR_OPTIONS.toleranceLsb),
  randomCount: z.number().int().nonnegative().default(DEFAULT_VECTOR_OPTIONS.randomCount),
  seed: z.number().int().min(0).max(MAX_SEED).default(DEFAULT_VECTOR_OPTIONS.seed),
  valueRange: z.tuple([z.number(), z.number()]).default([...DEFAULT_VECTOR_OPTIONS.valueRange]),
})

export const GeneratorConfigSchema = z.object({
  outDir: z.string().min(1).default('generated'),
  clut: ClutConfigSchema.default({}),
  vectors: VectorConfigSchema.default({}),
})

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>

/**
 * Settings given on the command line; absent keys leave lower layers intact.
 */
export interface ConfigOverrides {
  outDir?: string
  clut?: Partial<GeneratorConfig['clut']>
  vectors?: Partial<GeneratorConfig['vectors']>
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key]
  if (value === undefined) return {}
  if (!isRecord(value)) {
    throw invalidConfiguration(key, JSON.stringify(value), 'Must be an object.')
  }
  return value
}

/**
 * Read a JSON config file.
 */
export function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'))
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw invalidConfiguration('config', path, `Could not read JSON: ${reason}`)
  }
  if (!isRecord(parsed)) {
    throw invalidConfiguration('config', path, 'Top level must be an object.')
  }
  return parsed
}

/**
 * Merge layers and validate. The first schema issue is reported with its
 * dotted path as the offending parameter.
 */
export function resolveConfig(fileConfig: Record<string, unknown>, overrides: ConfigOverrides = {}): GeneratorConfig {
  const merged = {
    ...fileConfig,
    ...(overrides.outDir !== undefined ? { outDir: overrides.outDir } : {}),
    clut: { ...section(fileConfig, 'clut'), ...overrides.clut },
    vectors: { ...section(fileConfig, 'vectors'), ...overrides.vectors },
  }

  const result = GeneratorConfigSchema.safeParse(merged)
  if (!result.success) {
    const [issue] = result.error.issues
    const parameter = issue.path.join('.') || 'config'
    throw invalidConfiguration(parameter, JSON.stringify(valueAt(merged, issue.path)), issue.message)
  }
  return result.data
}

function valueAt(root: unknown, path: ReadonlyArray<string | number>): unknown {
  let node = root
  for (const key of path) {
    if (isRecord(node)) node = node[String(key)]
    else if (Array.isArray(node) && typeof key === 'number') node = node[key]
    else return undefined
  }
  return node
}

export function loadConfig(configPath: string | undefined, overrides: ConfigOverrides = {}): GeneratorConfig {
  return resolveConfig(configPath ? readConfigFile(configPath) : {}, overrides)
}

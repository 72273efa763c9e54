// =============================================================================
// LSE-PE - Generator CLI
// =============================================================================
// lsepe-gen [clut|vectors|simd|all] [options]

import { LseConfigError, invalidConfiguration } from '@lsepe/arith'
import { SCALE } from '@lsepe/reference'
import { loadConfig } from './config'
import type { ConfigOverrides } from './config'
import { generateArtifacts, isCommand, writeArtifacts } from './generate'
import type { Command } from './generate'
import { createLogger } from './logger'

export const USAGE = `Usage: lsepe-gen [clut|vectors|simd|all] [options]

Options:
  --config <path>          JSON config file
  --out <dir>              Output directory (default: generated)
  --entries <n>            CLUT entries, power of two (default: 16)
  --bits <n>               CLUT bits per entry (default: 10)
  --tolerance-lsb <n>      Reference tolerance in LSBs (default: 64)
  --random <n>             Additional random vectors (default: 16)
  --seed <n>               PRNG seed (default: 2025)
  --range <min> <max>      Random operand range, log2 units (default: 0 12)
  --verbose                Debug logging
  --help                   Show this message`

export interface CliArgs {
  command: Command
  configPath?: string
  overrides: ConfigOverrides
  verbose: boolean
  help: boolean
}

function toNumber(flag: string, raw: string | undefined): number {
  if (raw === undefined) {
    throw invalidConfiguration(flag, raw, 'Missing value.')
  }
  const value = Number(raw)
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw invalidConfiguration(flag, raw, 'Must be a number.')
  }
  return value
}

/**
 * Parse argv (without the node and script entries). Accepts `--flag value`
 * and `--flag=value`.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { command: 'all', overrides: {}, verbose: false, help: false }
  const clut: NonNullable<ConfigOverrides['clut']> = {}
  const vectors: NonNullable<ConfigOverrides['vectors']> = {}
  let commandSeen = false

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    const eq = token.startsWith('--') ? token.indexOf('=') : -1
    const flag = eq === -1 ? token : token.slice(0, eq)
    const inline = eq === -1 ? undefined : token.slice(eq + 1)
    const next = (): string | undefined => {
      if (inline !== undefined) return inline
      i += 1
      return argv[i]
    }

    switch (flag) {
      case '--help':
      case '-h':
        args.help = true
        break
      case '--verbose':
        args.verbose = true
        break
      case '--config':
        args.configPath = next()
        if (!args.configPath) throw invalidConfiguration('--config', args.configPath, 'Missing value.')
        break
      case '--out': {
        const outDir = next()
        if (!outDir) throw invalidConfiguration('--out', outDir, 'Missing value.')
        args.overrides.outDir = outDir
        break
      }
      case '--entries':
        clut.entries = toNumber(flag, next())
        break
      case '--bits':
        clut.bitWidth = toNumber(flag, next())
        break
      case '--tolerance-lsb':
        vectors.toleranceLsb = toNumber(flag, next())
        break
      case '--random':
        vectors.randomCount = toNumber(flag, next())
        break
      case '--seed':
        vectors.seed = toNumber(flag, next())
        break
      case '--range': {
        if (inline !== undefined) throw invalidConfiguration(flag, inline, 'Expected two values: --range <min> <max>.')
        const low = toNumber(flag, argv[i + 1])
        const high = toNumber(flag, argv[i + 2])
        vectors.valueRange = [low, high]
        i += 2
        break
      }
      default:
        if (flag.startsWith('-')) {
          throw invalidConfiguration('option', flag, 'Unknown option.')
        }
        if (commandSeen || !isCommand(flag)) {
          throw invalidConfiguration('command', flag, 'Expected one of clut, vectors, simd, all.')
        }
        args.command = flag
        commandSeen = true
    }
  }

  if (Object.keys(clut).length > 0) args.overrides.clut = clut
  if (Object.keys(vectors).length > 0) args.overrides.vectors = vectors
  return args
}

/**
 * Run the generator and return the process exit code.
 */
export function main(argv: readonly string[]): number {
  let args: CliArgs
  try {
    args = parseCliArgs(argv)
  } catch (err) {
    const log = createLogger('lsepe-gen')
    log.error(err instanceof Error ? err.message : String(err))
    log.info(USAGE)
    return 1
  }

  const log = createLogger('lsepe-gen', { verbose: args.verbose })
  if (args.help) {
    log.info(USAGE)
    return 0
  }

  try {
    const config = loadConfig(args.configPath, args.overrides)
    log.debug('Resolved config:', JSON.stringify(config))
    const withVectors = args.command === 'vectors' || args.command === 'all'
    if (withVectors && config.vectors.valueRange[0] < 0) {
      log.warn('valueRange starts below 0; negative operands quantize to code 0')
    }

    const artifacts = generateArtifacts(args.command, config)
    const written = writeArtifacts(artifacts, config.outDir)

    if (args.command === 'clut' || args.command === 'all') {
      log.info(`CLUT: ${config.clut.entries} entries x ${config.clut.bitWidth} bits`)
    }
    if (withVectors) {
      const { toleranceLsb, randomCount } = config.vectors
      log.info(
        `Reference vectors: ${randomCount} random, tolerance ±${toleranceLsb} LSB (${(toleranceLsb / SCALE).toFixed(6)})`
      )
    }
    for (const path of written) {
      log.info(`Written: ${path}`)
    }
    return 0
  } catch (err) {
    if (err instanceof LseConfigError) {
      log.error(`${err.message} (parameter: ${err.parameter})`)
      return 1
    }
    throw err
  }
}

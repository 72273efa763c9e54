// =============================================================================
// LSE-PE - Code Generation
// =============================================================================
// Serialization of generated tables and vectors, plus the lsepe-gen CLI.

export {
  svHex,
  svBinary,
  formatDecimal,
  formatClutRom,
  formatVectorInclude,
  formatSimdCases,
  formatLaneCases,
} from './systemverilog'
export type { VectorIncludeMeta } from './systemverilog'

export { clutReport, vectorReport, simdReport } from './report'
export type { ClutReport, VectorReport, VectorReportEntry, SimdReport } from './report'

export {
  ClutConfigSchema,
  VectorConfigSchema,
  GeneratorConfigSchema,
  readConfigFile,
  resolveConfig,
  loadConfig,
} from './config'
export type { GeneratorConfig, ConfigOverrides } from './config'

export {
  COMMANDS,
  isCommand,
  clutArtifacts,
  vectorArtifacts,
  simdArtifacts,
  generateArtifacts,
  writeArtifacts,
} from './generate'
export type { Command, Artifact } from './generate'

export { createLogger } from './logger'
export type { Logger, LoggerOptions } from './logger'

export { USAGE, parseCliArgs, main } from './cli'
export type { CliArgs } from './cli'

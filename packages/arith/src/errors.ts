import { ERROR } from './constants'
import type { ErrorCode } from './constants'

/**
 * Raised when a width, table size or lane layout is rejected, or an operand
 * is not an integer code. Carries the offending parameter so callers can
 * report it.
 */
export class LseConfigError extends Error {
  readonly code: ErrorCode
  readonly parameter: string
  readonly value: unknown

  constructor(code: ErrorCode, parameter: string, value: unknown, detail: string) {
    super(`Invalid ${parameter}: ${String(value)}. ${detail}`)
    this.name = 'LseConfigError'
    this.code = code
    this.parameter = parameter
    this.value = value
  }
}

export function invalidConfiguration(parameter: string, value: unknown, detail: string): LseConfigError {
  return new LseConfigError(ERROR.INVALID_CONFIGURATION, parameter, value, detail)
}

export function invalidOperand(parameter: string, value: unknown): LseConfigError {
  return new LseConfigError(
    ERROR.INVALID_OPERAND,
    parameter,
    value,
    'Must be a non-negative safe integer.'
  )
}

/**
 * Throws unless `value` is an integer in [min, max].
 */
export function assertIntegerInRange(parameter: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw invalidConfiguration(parameter, value, `Must be integer ${min}-${max}.`)
  }
}

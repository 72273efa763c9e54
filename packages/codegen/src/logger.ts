/**
 * Console logger with a `[scope]` prefix. Debug output is enabled by the
 * `verbose` option or `LSEPE_DEBUG=1`.
 */
export interface Logger {
  debug(...args: unknown[]): void
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}

export interface LoggerOptions {
  verbose?: boolean
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[${scope}]`
  const verbose = options.verbose ?? process.env.LSEPE_DEBUG === '1'

  return {
    debug: (...args) => {
      if (verbose) console.debug(prefix, ...args)
    },
    info: (...args) => console.log(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  }
}

/**
 * Minimal logging surface used across the library. Anything with `debug` and `warn`
 * (console, pino, winston) can be passed in.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
}

export interface LoggingOptions {
  /** Custom logger. Takes precedence over `debug`. */
  logger?: Logger
  /** Print debug output to the console. Defaults to false. */
  debug?: boolean
}

const noop = (): void => undefined

/**
 * Console-backed logger. Debug output is dropped unless enabled.
 */
export function createLogger(options: { debug?: boolean } = {}): Logger {
  return {
    debug: options.debug ? (message, ...details) => console.debug(`[Interleaved] ${message}`, ...details) : noop,
    warn: (message, ...details) => console.warn(`[Interleaved] ${message}`, ...details),
  }
}

export function resolveLogger(options: LoggingOptions = {}): Logger {
  return options.logger ?? createLogger({ debug: options.debug })
}

/**
 * Logger configuration.
 *
 * Users can inject their own logger implementation to control logging behavior. Modules inside the engine obtain a
 * named logger through {@link createLogger}, which always forwards to the logger configured at call time.
 */

import type { Logger, LogLevel } from './types.js'

/**
 * Default logger implementation.
 *
 * Only logs warnings and errors to console. Debug and info are no-ops.
 */
const defaultLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: (...args: unknown[]) => console.warn(...args),
  error: (...args: unknown[]) => console.error(...args),
}

/**
 * Global logger instance.
 */
export let logger: Logger = defaultLogger

/**
 * Configures the global logger.
 *
 * @param customLogger - The logger implementation to use
 *
 * @example
 * ```typescript
 * import pino from 'pino'
 * import { configureLogging } from 'dialog-pipelines'
 *
 * const logger = pino({ level: 'debug' })
 * configureLogging(logger)
 * ```
 */
export function configureLogging(customLogger: Logger): void {
  logger = customLogger
}

/**
 * Creates a logger whose messages are prefixed with the module name.
 *
 * @param module - Short name of the calling module, e.g. `executor`
 * @returns A logger delegating to the global logger
 */
export function createLogger(module: string): Logger {
  const prefix = `[${module}]`
  const forward =
    (level: LogLevel) =>
    (...args: unknown[]): void =>
      logger[level](prefix, ...args)
  return {
    debug: forward('debug'),
    info: forward('info'),
    warn: forward('warn'),
    error: forward('error'),
  }
}

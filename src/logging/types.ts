/**
 * Sink for the engine's diagnostics.
 *
 * Calls arrive as the module prefix, a short message and a context object, e.g.
 * `warn('[executor]', 'node failed', { nodeId, error, message })`. A Pino or Winston instance fits as-is.
 */
export interface Logger {
  /** Flow-control signals, checkpoint writes and tool failures the model is told about. */
  debug(...args: unknown[]): void

  /** `console.log` and `console.info` from code nodes. */
  info(...args: unknown[]): void

  /** Failed nodes, fallback replies and malformed data read back from the store. */
  warn(...args: unknown[]): void

  /** `console.error` from code nodes. */
  error(...args: unknown[]): void
}

export type LogLevel = keyof Logger

/**
 * Flow-control signals.
 *
 * Nodes throw these to change how traversal proceeds. The executor recognises them before any error handling, so
 * they are never logged as failures and never retried.
 */

/**
 * Base class of every flow-control signal.
 */
export abstract class FlowControlSignal extends Error {
  abstract readonly kind: 'abort' | 'wait' | 'requireOutputs'
}

/**
 * Stops the whole run. No further node executes on any branch.
 *
 * @example
 * ```typescript
 * throw new AbortPipelineSignal("Sorry, I can't help with that", 'policy')
 * ```
 */
export class AbortPipelineSignal extends FlowControlSignal {
  readonly kind = 'abort' as const

  /**
   * Optional tag the caller attaches to the final reply.
   */
  readonly tag: string | undefined

  constructor(message: string, tag?: string) {
    super(message)
    this.name = 'AbortPipelineSignal'
    this.tag = tag
  }
}

/**
 * Ends the run at the current state without failing it. The caller invokes the pipeline again with the same session
 * when the next user message arrives.
 */
export class WaitForNextInputSignal extends FlowControlSignal {
  readonly kind = 'wait' as const

  constructor(message: string = 'Waiting for the next input') {
    super(message)
    this.name = 'WaitForNextInputSignal'
  }
}

/**
 * Raised when a node needs outputs from upstream nodes that have not produced any.
 *
 * The executor reports it as a node build failure.
 */
export class RequiredOutputsMissingSignal extends FlowControlSignal {
  readonly kind = 'requireOutputs' as const
  readonly missing: readonly string[]

  constructor(missing: readonly string[]) {
    super(`Required outputs are missing from: ${missing.join(', ')}`)
    this.name = 'RequiredOutputsMissingSignal'
    this.missing = missing
  }
}

/**
 * Type guard for flow-control signals.
 *
 * @param error - Any thrown value
 * @returns True when the value is a {@link FlowControlSignal}
 */
export function isFlowControlSignal(error: unknown): error is FlowControlSignal {
  return error instanceof FlowControlSignal
}

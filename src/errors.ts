/**
 * Error types for the pipeline engine.
 *
 * Build errors signal a misconfigured graph or node and are always fatal to the run. Run errors wrap failures of
 * the external calls a node makes. Flow-control signals live in `flow-control.ts`; they are not errors even
 * though they are thrown.
 */

/**
 * Raised by every lookup-by-id operation of a {@link PipelineRepository} when the entity does not exist.
 *
 * Nodes catch it and convert it into a {@link PipelineNodeBuildError} carrying a domain message.
 */
export class RepositoryLookupError extends Error {
  /**
   * Kind of entity that was looked up, e.g. `Collection`.
   */
  readonly entity: string

  /**
   * Identifier that did not resolve.
   */
  readonly entityId: string | number

  constructor(entity: string, entityId: string | number, message?: string) {
    super(message ?? `${entity} with id ${entityId} not found`)
    this.name = 'RepositoryLookupError'
    this.entity = entity
    this.entityId = entityId
  }
}

/**
 * Raised when a pipeline definition cannot be compiled into an executable graph.
 */
export class PipelineBuildError extends Error {
  /**
   * Node or edge the problem is attached to, when there is one.
   */
  readonly elementId: string | undefined

  constructor(message: string, elementId?: string) {
    super(message)
    this.name = 'PipelineBuildError'
    this.elementId = elementId
  }
}

/**
 * Raised when a single node's configuration cannot be satisfied, either while compiling or at first use.
 */
export class PipelineNodeBuildError extends Error {
  readonly nodeId: string

  constructor(nodeId: string, message: string) {
    super(message)
    this.name = 'PipelineNodeBuildError'
    this.nodeId = nodeId
  }
}

/**
 * Raised when a node fails while running, typically because an external call failed.
 */
export class PipelineNodeRunError extends Error {
  readonly nodeId: string

  constructor(nodeId: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PipelineNodeRunError'
    this.nodeId = nodeId
  }
}

/**
 * Raised when user code inside a code node throws.
 */
export class CodeNodeRunError extends PipelineNodeRunError {
  constructor(nodeId: string, message: string, options?: { cause?: unknown }) {
    super(nodeId, message, options)
    this.name = 'CodeNodeRunError'
  }
}

/**
 * Raised by an {@link LlmService} when the provider call fails or the service cannot be configured.
 */
export class LlmServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LlmServiceError'
  }
}

/**
 * Normalizes an unknown error value to an Error instance.
 *
 * @param error - The error value to normalize
 * @returns An Error instance
 */
export function normalizeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

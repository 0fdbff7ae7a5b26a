/**
 * Base class of every pipeline node.
 *
 * Uses the template method pattern: {@link PipelineNode.process} builds the node context, converts repository lookup
 * failures into build errors and delegates to {@link PipelineNode.handle} for node-specific logic.
 */

import type { EngineConfig } from '../config.js'
import { PipelineNodeBuildError, RepositoryLookupError } from '../errors.js'
import type { NodeOutput, PipelineState, StateUpdate } from '../pipeline/state.js'
import type { ValidationCache } from '../pipeline/validation-cache.js'
import type { PipelineRepository } from '../repository/pipeline-repository.js'
import type { NodeKind } from './params.js'

/**
 * Handle of the single output of a non-router node.
 */
export const DEFAULT_OUTPUT_HANDLE = 'output'

/**
 * Everything a node sees while it runs.
 */
export interface NodeContext {
  /** Snapshot of the state; writes to it are discarded. */
  state: PipelineState
  config: EngineConfig
  /** Output of the predecessor that completed last, or the user input for the start node. */
  input: string
  /** Outputs of all predecessors that produced one. */
  inputs: NodeOutput[]
  incomingNodeIds: readonly string[]
  outgoingNodeIds: readonly string[]
}

export abstract class PipelineNode<TParams = unknown> {
  abstract readonly kind: NodeKind

  /** Unique identifier for this node within the pipeline. */
  readonly id: string
  /** Name user code addresses the node's output by. Defaults to the id. */
  readonly name: string
  readonly params: TParams
  private _repository: PipelineRepository | undefined

  constructor(id: string, name: string, params: TParams) {
    this.id = id
    this.name = name
    this.params = params
  }

  /**
   * Handles this node can route to. Non-router nodes have the single default handle.
   */
  get outputHandles(): readonly string[] {
    return [DEFAULT_OUTPUT_HANDLE]
  }

  /**
   * Router nodes select exactly one of their handles per execution.
   */
  get isRouter(): boolean {
    return false
  }

  /**
   * Handle a router falls back to. Must have an outgoing edge.
   */
  get defaultHandle(): string | undefined {
    return undefined
  }

  /**
   * Injects the repository for the current run. Called by the executor before {@link process}.
   */
  attachRepository(repository: PipelineRepository): void {
    this._repository = repository
  }

  /**
   * The injected repository.
   *
   * @throws Error when accessed before injection
   */
  protected get repository(): PipelineRepository {
    if (!this._repository) {
      throw new Error(`Node '${this.id}' accessed the repository before one was attached`)
    }
    return this._repository
  }

  /**
   * Compile-time validation beyond the parameter schema.
   *
   * @throws PipelineNodeBuildError when the configuration cannot be satisfied
   */
  validate(_cache: ValidationCache): void {}

  /**
   * Runs the node against a state snapshot.
   *
   * @param state - Snapshot of the pipeline state
   * @param config - Engine configuration
   * @param incomingNodeIds - Predecessors with an active edge into this node
   * @param outgoingNodeIds - Successors of this node
   * @returns The update for the executor to apply
   * @throws FlowControlSignal to abort, suspend or report missing outputs
   * @throws PipelineNodeBuildError when the node is misconfigured
   */
  async process(
    state: PipelineState,
    config: EngineConfig,
    incomingNodeIds: readonly string[],
    outgoingNodeIds: readonly string[]
  ): Promise<StateUpdate> {
    const inputs = incomingNodeIds.flatMap((nodeId) => {
      const output = state.outputs.get(nodeId)
      return output ? [output] : []
    })
    const latest = [...inputs].sort((a, b) => state.path.lastIndexOf(b.nodeId) - state.path.lastIndexOf(a.nodeId))[0]
    const context: NodeContext = {
      state,
      config,
      input: latest?.output ?? state.input,
      inputs,
      incomingNodeIds,
      outgoingNodeIds,
    }

    try {
      return await this.handle(context)
    } catch (error) {
      if (error instanceof RepositoryLookupError) {
        throw new PipelineNodeBuildError(this.id, error.message)
      }
      throw error
    }
  }

  /**
   * Node-specific execution logic implemented by subclasses.
   */
  protected abstract handle(context: NodeContext): Promise<StateUpdate>
}

/**
 * Runs a compiled pipeline against a repository.
 *
 * Execution proceeds in steps. Every node whose incoming edges are all resolved, with at least one active, runs in
 * the same step against its own snapshot of the state; the updates are applied in topological order once the whole
 * step has finished. A node whose incoming edges are all inactive is skipped, and so are its successors unless
 * another branch activates them. The run goes on until no node is ready, so branches still pending when the end
 * node finishes run as well.
 */

import type { Span } from '@opentelemetry/api'
import { createEngineConfig, type EngineConfig, type EngineConfigInput } from '../config.js'
import { normalizeError } from '../errors.js'
import {
  AbortPipelineSignal,
  RequiredOutputsMissingSignal,
  WaitForNextInputSignal,
  isFlowControlSignal,
} from '../flow-control.js'
import { createLogger } from '../logging/logger.js'
import type { PipelineNode } from '../nodes/node.js'
import type { PipelineRepository } from '../repository/pipeline-repository.js'
import { getTracer } from '../telemetry/tracer.js'
import type { PipelineDefinition } from './definition.js'
import { compilePipeline, type CompiledPipeline } from './graph.js'
import { RunStatus, type PipelineRunResult } from './result.js'
import { PipelineState, type PipelineStateInit, type StateUpdate } from './state.js'
import type { ValidationCache } from './validation-cache.js'

const log = createLogger('executor')

type EdgeStatus = 'pending' | 'active' | 'inactive'

interface NodeFailure {
  nodeId: string
  error: unknown
}

type NodeOutcome = { nodeId: string; update: StateUpdate } | NodeFailure

export interface ExecutorOptions {
  config?: EngineConfig | EngineConfigInput
  /** Cache reused across compilations. */
  cache?: ValidationCache
}

export class PipelineExecutor {
  private readonly _repository: PipelineRepository
  private readonly _config: EngineConfig
  private readonly _cache: ValidationCache | undefined

  constructor(repository: PipelineRepository, options: ExecutorOptions = {}) {
    this._repository = repository
    this._config = createEngineConfig(options.config ?? {})
    this._cache = options.cache
  }

  get config(): EngineConfig {
    return this._config
  }

  /**
   * Compiles and runs a definition for one inbound message. Never throws: every outcome is a result.
   */
  async run(definition: PipelineDefinition, init: PipelineStateInit): Promise<PipelineRunResult> {
    let pipeline: CompiledPipeline
    let state: PipelineState
    try {
      pipeline = compilePipeline(definition, this._cache ? { cache: this._cache } : {})
      const participantData = init.participantData ?? (await this._repository.getParticipantGlobalData(init.session))
      state = PipelineState.create({ ...init, participantData })
    } catch (error) {
      return this._toResult(undefined, error, undefined)
    }

    for (const node of pipeline.nodes.values()) {
      node.attachRepository(this._repository)
    }

    const tracer = getTracer()
    const span = tracer.startRunSpan({
      sessionId: state.session.id,
      teamId: state.session.teamId,
      nodeCount: pipeline.nodes.size,
    })
    const result = await this._execute(pipeline, state, span)
    const error = result.status === RunStatus.FAILED ? result.cause : undefined
    tracer.endSpan(span, { 'pipeline.status': result.status }, error)
    return result
  }

  private async _execute(pipeline: CompiledPipeline, state: PipelineState, span: Span): Promise<PipelineRunResult> {
    const edgeStatus = new Map<string, EdgeStatus>(pipeline.edges.map((edge) => [edge.id, 'pending']))
    const finished = new Set<string>()
    let lastOutput = state.input

    const setOutgoing = (nodeId: string, active: (handle: string) => boolean): void => {
      for (const edge of pipeline.outgoing.get(nodeId) ?? []) {
        edgeStatus.set(edge.id, active(edge.sourceHandle) ? 'active' : 'inactive')
      }
    }

    for (;;) {
      const ready = this._readyNodes(pipeline, edgeStatus, finished, setOutgoing)
      if (ready.length === 0) break

      const outcomes = await this._runStep(pipeline, state, ready, edgeStatus, span)

      let failure: NodeFailure | undefined
      for (const outcome of outcomes) {
        if (!('update' in outcome)) {
          failure ??= outcome
          continue
        }
        const node = this._node(pipeline, outcome.nodeId)
        const { update } = outcome
        state.apply(node.id, node.name, update)
        finished.add(node.id)
        lastOutput = update.output
        setOutgoing(node.id, (handle) => !node.isRouter || handle === update.route)
      }
      if (failure) {
        return this._toResult(state, failure.error, failure.nodeId)
      }
    }

    const end = state.outputs.get(pipeline.endId)
    return {
      status: RunStatus.COMPLETED,
      state,
      output: end ? end.output : lastOutput,
      lastAssistantMessage: state.lastAssistantMessage(),
    }
  }

  /**
   * Marks skipped nodes as finished and returns the nodes that can run now, in topological order.
   */
  private _readyNodes(
    pipeline: CompiledPipeline,
    edgeStatus: Map<string, EdgeStatus>,
    finished: Set<string>,
    setOutgoing: (nodeId: string, active: (handle: string) => boolean) => void
  ): string[] {
    for (;;) {
      const ready: string[] = []
      let skipped = false
      for (const id of pipeline.order) {
        if (finished.has(id)) continue
        if (id === pipeline.startId) {
          ready.push(id)
          continue
        }
        const statuses = (pipeline.incoming.get(id) ?? []).map((edge) => edgeStatus.get(edge.id) ?? 'pending')
        if (statuses.includes('pending')) continue
        if (statuses.includes('active')) {
          ready.push(id)
        } else {
          finished.add(id)
          setOutgoing(id, () => false)
          skipped = true
        }
      }
      if (!skipped) return ready
    }
  }

  private async _runStep(
    pipeline: CompiledPipeline,
    state: PipelineState,
    ready: readonly string[],
    edgeStatus: ReadonlyMap<string, EdgeStatus>,
    span: Span
  ): Promise<NodeOutcome[]> {
    const base = state.snapshot()
    const chunkSize = this._config.maxParallelNodes ?? ready.length
    const outcomes: NodeOutcome[] = []
    for (let offset = 0; offset < ready.length; offset += chunkSize) {
      const chunk = ready.slice(offset, offset + chunkSize)
      const results = await Promise.all(
        chunk.map((id) => this._runNode(pipeline, this._node(pipeline, id), base.snapshot(), edgeStatus, span))
      )
      outcomes.push(...results)
    }
    return outcomes
  }

  private async _runNode(
    pipeline: CompiledPipeline,
    node: PipelineNode,
    snapshot: PipelineState,
    edgeStatus: ReadonlyMap<string, EdgeStatus>,
    parentSpan: Span
  ): Promise<NodeOutcome> {
    const incoming = (pipeline.incoming.get(node.id) ?? [])
      .filter((edge) => edgeStatus.get(edge.id) === 'active')
      .map((edge) => edge.source)
    const outgoing = (pipeline.outgoing.get(node.id) ?? []).map((edge) => edge.target)

    const tracer = getTracer()
    const span = tracer.startNodeSpan({ parentSpan, nodeId: node.id, nodeType: node.kind, nodeName: node.name })
    try {
      const update = await node.process(snapshot, this._config, incoming, outgoing)
      tracer.endSpan(span, { 'pipeline.node.status': 'completed' })
      return { nodeId: node.id, update }
    } catch (error) {
      if (isFlowControlSignal(error)) {
        log.debug('node raised a flow-control signal', { nodeId: node.id, signal: error.name, message: error.message })
        tracer.endSpan(span, { 'pipeline.node.status': error.kind })
      } else {
        const cause = normalizeError(error)
        log.warn('node failed', { nodeId: node.id, error: cause.name, message: cause.message })
        tracer.endSpan(span, { 'pipeline.node.status': 'failed' }, cause)
      }
      return { nodeId: node.id, error }
    }
  }

  private _node(pipeline: CompiledPipeline, id: string): PipelineNode {
    const node = pipeline.nodes.get(id)
    if (!node) {
      throw new Error(`Node '${id}' is not part of the compiled pipeline`)
    }
    return node
  }

  private _toResult(state: PipelineState | undefined, error: unknown, nodeId: string | undefined): PipelineRunResult {
    if (state && nodeId !== undefined) {
      if (error instanceof AbortPipelineSignal) {
        return { status: RunStatus.ABORTED, state, message: error.message, tag: error.tag, nodeId }
      }
      if (error instanceof WaitForNextInputSignal) {
        return { status: RunStatus.SUSPENDED, state, message: error.message, nodeId }
      }
      if (error instanceof RequiredOutputsMissingSignal) {
        return {
          status: RunStatus.FAILED,
          state,
          error: { errorName: 'PipelineNodeBuildError', message: error.message, nodeId },
          cause: error,
        }
      }
    }
    const cause = normalizeError(error)
    if (!state) {
      log.warn('pipeline could not start', { error: cause.name, message: cause.message })
    }
    return {
      status: RunStatus.FAILED,
      state,
      error: { errorName: cause.name, message: cause.message, nodeId: errorNodeId(cause) ?? nodeId },
      cause,
    }
  }
}

function errorNodeId(error: Error): string | undefined {
  if ('nodeId' in error && typeof error.nodeId === 'string') return error.nodeId
  if ('elementId' in error && typeof error.elementId === 'string') return error.elementId
  return undefined
}

/**
 * Compiles and runs a definition once.
 *
 * @param definition - Pipeline definition
 * @param initialState - The inbound message and its session
 * @param repository - Port every side effect goes through
 * @param options - Engine configuration and validation cache
 * @returns How the run ended
 */
export async function runPipeline(
  definition: PipelineDefinition,
  initialState: PipelineStateInit,
  repository: PipelineRepository,
  options: ExecutorOptions = {}
): Promise<PipelineRunResult> {
  return new PipelineExecutor(repository, options).run(definition, initialState)
}

/**
 * Builders for pipeline definitions, sessions and a seeded repository.
 */

import { createEngineConfig, type EngineConfigInput } from '../config.js'
import { createNode } from '../nodes/factory.js'
import type { PipelineNode } from '../nodes/node.js'
import type { PipelineDefinition } from '../pipeline/definition.js'
import { PipelineState, type PipelineStateInit, type StateUpdate } from '../pipeline/state.js'
import { ValidationCache } from '../pipeline/validation-cache.js'
import { InMemoryRepository } from '../repository/in-memory-repository.js'
import type { PipelineRepository } from '../repository/pipeline-repository.js'
import type { SessionRef } from '../types/session.js'
import { MockChatModel, MockLlmService } from './mock-chat-model.js'

export const PROVIDER_ID = 1
export const PROVIDER_MODEL_ID = 10

export function createSession(overrides: Partial<SessionRef> = {}): SessionRef {
  return { id: 'session-1', teamId: 'team-1', participantId: 'participant-1', ...overrides }
}

/**
 * Repository seeded with one provider backed by a scripted model.
 */
export function createRepository(model: MockChatModel = new MockChatModel()): {
  repository: InMemoryRepository
  model: MockChatModel
  service: MockLlmService
} {
  const service = new MockLlmService(model)
  const repository = new InMemoryRepository()
    .addLlmProvider({ id: PROVIDER_ID, type: 'openai', name: 'Test provider', config: {} }, service)
    .addLlmProviderModel({ id: PROVIDER_MODEL_ID, type: 'openai', name: 'test-model', maxTokenLimit: 8192 })
  return { repository, model, service }
}

export interface NodeSpec {
  id: string
  type: string
  params?: Record<string, unknown>
  name?: string
}

export type EdgeSpec = [source: string, target: string, sourceHandle?: string]

/**
 * Builds a definition from compact node and edge lists.
 */
export function buildDefinition(nodes: NodeSpec[], edges: EdgeSpec[]): PipelineDefinition {
  return {
    nodes: nodes.map((node) => ({
      id: node.id,
      type: 'pipelineNode',
      position: { x: 0, y: 0 },
      data: {
        type: node.type,
        ...(node.name !== undefined ? { name: node.name } : {}),
        params: node.params ?? {},
      },
    })),
    edges: edges.map(([source, target, sourceHandle], index) => ({
      id: `e${index}`,
      source,
      target,
      sourceHandle: sourceHandle ?? 'output',
    })),
  }
}

/**
 * Params for a response node bound to the seeded provider.
 */
export function llmParams(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    llmProviderId: PROVIDER_ID,
    llmProviderModelId: PROVIDER_MODEL_ID,
    prompt: 'You are a helpful assistant.',
    ...overrides,
  }
}

/**
 * State for a run of the test session with empty participant data.
 */
export function createState(init: Partial<PipelineStateInit> = {}): PipelineState {
  return PipelineState.create({ session: createSession(), input: 'hello', participantData: {}, ...init })
}

/**
 * Creates and validates a single node, bound to a repository.
 */
export function createTestNode(spec: NodeSpec, repository: PipelineRepository): PipelineNode {
  const node = createNode({
    id: spec.id,
    data: { type: spec.type, params: spec.params ?? {}, ...(spec.name !== undefined ? { name: spec.name } : {}) },
  })
  node.validate(new ValidationCache())
  node.attachRepository(repository)
  return node
}

/**
 * Runs a node outside a pipeline with the given predecessors.
 */
export function runNode(
  node: PipelineNode,
  state: PipelineState,
  options: { config?: EngineConfigInput; incoming?: string[]; outgoing?: string[] } = {}
): Promise<StateUpdate> {
  return node.process(state, createEngineConfig(options.config ?? {}), options.incoming ?? [], options.outgoing ?? [])
}

/**
 * Model service types.
 *
 * A {@link LlmService} is built from a provider record and hands out {@link ChatModel}s for a model name. Nodes
 * only ever talk to these interfaces, so tests can script replies without a network.
 */

import type { JSONValue } from '../types/json.js'

/**
 * Providers the engine can build services for.
 */
export type LlmProviderType = 'openai' | 'anthropic'

/**
 * Tool description sent to the model.
 */
export interface ToolSpec {
  name: string
  description: string
  inputSchema: Record<string, unknown>
}

/**
 * A tool invocation requested by the model.
 */
export interface ToolCall {
  id: string
  name: string
  input: JSONValue
}

/**
 * A message in a model request.
 */
export type ModelMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
  | { role: 'tool'; toolCallId: string; toolName: string; content: string }

/**
 * Why the model stopped generating.
 */
export type StopReason = 'endTurn' | 'toolUse' | 'maxTokens' | 'other'

/**
 * Token usage reported by the provider.
 */
export interface Usage {
  inputTokens: number
  outputTokens: number
}

export interface ChatRequest {
  systemPrompt?: string
  messages: ModelMessage[]
  tools?: ToolSpec[]
}

export interface ChatResponse {
  text: string
  toolCalls: ToolCall[]
  stopReason: StopReason
  usage?: Usage
}

/**
 * Sampling parameters accepted by every provider.
 */
export interface ModelParameters {
  temperature?: number
  maxTokens?: number
  topP?: number
}

/**
 * A model bound to its sampling parameters.
 */
export interface ChatModel {
  readonly modelName: string

  /**
   * Sends one request and returns the complete reply.
   *
   * @throws LlmServiceError when the provider call fails
   */
  invoke(request: ChatRequest): Promise<ChatResponse>
}

/**
 * Entry point to a provider, configured with its credentials.
 */
export interface LlmService {
  readonly providerType: LlmProviderType

  /**
   * @param modelName - Provider specific model name
   * @param parameters - Sampling parameters
   */
  getChatModel(modelName: string, parameters?: ModelParameters): ChatModel
}

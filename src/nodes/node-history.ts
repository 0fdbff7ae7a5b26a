import type { EngineConfig } from '../config.js'
import { HistoryService } from '../history/history-service.js'
import { countTextTokens } from '../history/token-count.js'
import type { PipelineState } from '../pipeline/state.js'
import type { PipelineRepository } from '../repository/pipeline-repository.js'
import type { LlmProviderModel } from '../repository/types.js'
import type { ChatMessage } from '../types/messages.js'
import type { HistoryParams } from './params.js'

const MIN_HISTORY_TOKENS = 100

export function createHistoryService(
  repository: PipelineRepository,
  nodeId: string,
  params: HistoryParams
): HistoryService {
  return new HistoryService(repository, nodeId, {
    type: params.historyType,
    mode: params.historyMode,
    maxHistoryLength: params.maxHistoryLength,
    ...(params.historyName !== undefined ? { name: params.historyName } : {}),
  })
}

/**
 * Tokens left for history once the prompt and the input are accounted for.
 *
 * The budget is the node's own limit, else the provider model's, else the engine default when the model has none.
 */
export function historyTokenLimit(
  params: Pick<HistoryParams, 'userMaxTokenLimit'>,
  providerModel: LlmProviderModel,
  config: EngineConfig,
  ...texts: string[]
): number {
  const budget = params.userMaxTokenLimit ?? modelTokenLimit(providerModel, config)
  const used = texts.reduce((total, text) => total + countTextTokens(text), 0)
  return Math.max(budget - used, MIN_HISTORY_TOKENS)
}

/**
 * The provider model's context size, or the engine default when the model has none.
 */
export function modelTokenLimit(providerModel: LlmProviderModel, config: EngineConfig): number {
  return providerModel.maxTokenLimit > 0 ? providerModel.maxTokenLimit : config.defaultTokenLimit
}

/**
 * Assistant messages earlier nodes of this run produced.
 */
export function ephemeralMessages(state: PipelineState): ChatMessage[] {
  return state.messages
    .filter((message) => message.role === 'assistant')
    .map((message) => ({ role: message.role, content: message.content }))
}

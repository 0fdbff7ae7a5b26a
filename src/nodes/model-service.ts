/**
 * Resolves the chat model a node calls.
 *
 * Nodes that call a model hold one of these instead of inheriting model access, so every lookup it makes goes
 * through the node's repository.
 */

import { LlmServiceError, PipelineNodeBuildError } from '../errors.js'
import type { ChatModel, LlmService } from '../llm/types.js'
import type { PipelineRepository } from '../repository/pipeline-repository.js'
import type { LlmProviderModel } from '../repository/types.js'
import type { LlmSettings } from './params.js'

export interface ResolvedModel {
  model: ChatModel
  providerModel: LlmProviderModel
}

export class ModelServiceResolver {
  private readonly _repository: PipelineRepository
  private readonly _nodeId: string
  private readonly _settings: LlmSettings

  constructor(repository: PipelineRepository, nodeId: string, settings: LlmSettings) {
    this._repository = repository
    this._nodeId = nodeId
    this._settings = settings
  }

  /**
   * @throws RepositoryLookupError when the provider or model does not exist
   * @throws PipelineNodeBuildError when the provider cannot be configured or does not serve the model
   */
  async resolve(): Promise<ResolvedModel> {
    const { llmProviderId, llmProviderModelId, llmModelParameters } = this._settings
    const providerModel = await this._repository.getLlmProviderModel(llmProviderModelId)

    let service: LlmService
    try {
      service = await this._repository.getLlmService(llmProviderId)
    } catch (error) {
      if (error instanceof LlmServiceError) {
        throw new PipelineNodeBuildError(
          this._nodeId,
          `LLM provider with id ${llmProviderId} could not be configured: ${error.message}`
        )
      }
      throw error
    }

    if (service.providerType !== providerModel.type) {
      throw new PipelineNodeBuildError(
        this._nodeId,
        `Model '${providerModel.name}' belongs to provider type '${providerModel.type}', not '${service.providerType}'`
      )
    }

    const parameters = {
      ...(llmModelParameters.temperature !== undefined ? { temperature: llmModelParameters.temperature } : {}),
      ...(llmModelParameters.maxTokens !== undefined ? { maxTokens: llmModelParameters.maxTokens } : {}),
      ...(llmModelParameters.topP !== undefined ? { topP: llmModelParameters.topP } : {}),
    }
    return { model: service.getChatModel(providerModel.name, parameters), providerModel }
  }
}

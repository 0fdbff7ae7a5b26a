/**
 * Variables available to prompts of model-calling nodes.
 */

import { PipelineNodeBuildError } from '../errors.js'
import type { PipelineState } from '../pipeline/state.js'
import type { PipelineRepository } from '../repository/pipeline-repository.js'
import { extractPromptVariables, formatPrompt } from '../utils/template.js'

export const PROMPT_VARIABLES = [
  'input',
  'source_material',
  'participant_data',
  'current_datetime',
  'temp_state',
  'session_state',
  'collection_index_summaries',
  'media',
] as const

export type PromptVariable = (typeof PROMPT_VARIABLES)[number]

const SUPPORTED: ReadonlySet<string> = new Set(PROMPT_VARIABLES)

/**
 * Resources a prompt can draw on.
 */
export interface PromptResources {
  sourceMaterialId?: number | undefined
  collectionId?: number | undefined
  collectionIndexIds?: readonly number[]
}

/**
 * Checks that every variable in a prompt is supported and has the resource it needs.
 *
 * @throws PipelineNodeBuildError naming the first offending variable
 */
export function validatePromptVariables(nodeId: string, prompt: string, resources: PromptResources): void {
  for (const variable of extractPromptVariables(prompt)) {
    if (!SUPPORTED.has(variable)) {
      throw new PipelineNodeBuildError(nodeId, `Prompt variable {${variable}} is not supported`)
    }
    if (variable === 'source_material' && resources.sourceMaterialId === undefined) {
      throw new PipelineNodeBuildError(nodeId, 'The prompt uses {source_material} but no source material is selected')
    }
    if (variable === 'media' && resources.collectionId === undefined) {
      throw new PipelineNodeBuildError(nodeId, 'The prompt uses {media} but no collection is selected')
    }
    if (variable === 'collection_index_summaries' && (resources.collectionIndexIds ?? []).length === 0) {
      throw new PipelineNodeBuildError(
        nodeId,
        'The prompt uses {collection_index_summaries} but no indexed collection is selected'
      )
    }
  }
}

/**
 * Resolves the variables a prompt uses, each through the repository at most once.
 */
export class PromptContext {
  private readonly _repository: PipelineRepository
  private readonly _state: PipelineState
  private readonly _resources: PromptResources
  private readonly _now: () => Date

  constructor(
    repository: PipelineRepository,
    state: PipelineState,
    resources: PromptResources,
    now: () => Date = () => new Date()
  ) {
    this._repository = repository
    this._state = state
    this._resources = resources
    this._now = now
  }

  /**
   * Formats a prompt, resolving only the variables it refers to.
   *
   * @throws RepositoryLookupError when a referenced resource does not exist
   */
  async format(prompt: string, input: string): Promise<string> {
    const values: Record<string, string> = {}
    for (const variable of extractPromptVariables(prompt)) {
      if (SUPPORTED.has(variable)) {
        values[variable] = await this._resolve(variable, input)
      }
    }
    return formatPrompt(prompt, values)
  }

  private async _resolve(variable: string, input: string): Promise<string> {
    const { sourceMaterialId, collectionId, collectionIndexIds = [] } = this._resources
    switch (variable) {
      case 'input':
        return input
      case 'source_material':
        return sourceMaterialId === undefined
          ? ''
          : (await this._repository.getSourceMaterial(sourceMaterialId)).material
      case 'participant_data':
        return JSON.stringify(this._state.participantData)
      case 'current_datetime':
        return this._now().toISOString()
      case 'temp_state':
        return JSON.stringify(this._state.tempStateView())
      case 'session_state':
        return JSON.stringify(this._state.sessionState)
      case 'collection_index_summaries': {
        const summaries = await this._repository.getCollectionIndexSummaries(collectionIndexIds)
        return summaries.map((summary) => `* ${summary.name} (id ${summary.id}): ${summary.summary}`).join('\n')
      }
      case 'media': {
        if (collectionId === undefined) return ''
        const collection = await this._repository.getCollection(collectionId)
        const files = await this._repository.getCollectionFileInfo(collection.id)
        return files.map((file) => `* File (id=${file.id}, content_type=${file.contentType}): ${file.summary}`).join('\n')
      }
      default:
        return ''
    }
  }
}

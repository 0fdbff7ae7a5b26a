/**
 * Node that answers through a stored assistant: its instructions, provider and model.
 *
 * @deprecated Use an `LLMResponseWithPrompt` node.
 */

import { PipelineNodeRunError, normalizeError } from '../errors.js'
import { isFlowControlSignal } from '../flow-control.js'
import { HistoryService } from '../history/history-service.js'
import { createModelSummarizer } from '../history/summarizer.js'
import { createLogger } from '../logging/logger.js'
import type { Assistant } from '../repository/types.js'
import { StateDraft, type StateUpdate } from '../pipeline/state.js'
import { createCollectionSearchTool } from '../tools/collection-search.js'
import type { PipelineTool } from '../tools/tool.js'
import { assistantMessage, userMessage } from '../types/messages.js'
import { formatPrompt } from '../utils/template.js'
import { ModelServiceResolver } from './model-service.js'
import { PipelineNode, type NodeContext } from './node.js'
import { ephemeralMessages, historyTokenLimit } from './node-history.js'
import { NodeKind, type AssistantParams } from './params.js'
import { runToolLoop } from './tool-loop.js'

const log = createLogger('assistant')

const HISTORY_LENGTH = 10

export class AssistantNode extends PipelineNode<AssistantParams> {
  readonly kind = NodeKind.ASSISTANT

  protected async handle(context: NodeContext): Promise<StateUpdate> {
    const { state, config } = context
    const assistant = await this.repository.getAssistant(this.params.assistantId)
    const { model, providerModel } = await new ModelServiceResolver(this.repository, this.id, {
      llmProviderId: assistant.llmProviderId,
      llmProviderModelId: assistant.llmProviderModelId,
      llmModelParameters: { temperature: assistant.temperature },
    }).resolve()

    const input = this.params.inputFormatter
      ? formatPrompt(this.params.inputFormatter, { input: context.input })
      : context.input

    const history = new HistoryService(this.repository, this.id, {
      type: 'global',
      mode: 'summarize',
      maxHistoryLength: HISTORY_LENGTH,
    })
    const messages = await history.load({
      session: state.session,
      tokenLimit: historyTokenLimit({}, providerModel, config, assistant.instructions, input),
      summarize: createModelSummarizer(model),
      ephemeral: ephemeralMessages(state),
      ...(state.inputMessageId !== undefined ? { inputMessageId: state.inputMessageId } : {}),
    })

    const draft = new StateDraft(state)
    const tools = await this._tools(assistant)
    let text: string
    try {
      text = await runToolLoop({
        model,
        systemPrompt: assistant.instructions,
        messages: [...messages, userMessage(input)],
        tools,
        toolContext: { draft, repository: this.repository, session: state.session },
        maxIterations: config.maxToolIterations,
      })
    } catch (error) {
      if (isFlowControlSignal(error)) throw error
      const cause = normalizeError(error)
      if (!config.replyOnLlmError) {
        throw new PipelineNodeRunError(this.id, `Assistant '${assistant.name}' failed: ${cause.message}`, { cause })
      }
      log.warn('assistant call failed, replying with the fallback message', { nodeId: this.id, message: cause.message })
      return { output: config.llmErrorReply, message: assistantMessage(config.llmErrorReply), ...draft.toUpdate() }
    }

    if (this.params.citationsEnabled && assistant.citationsEnabled && draft.citedFileIds.size > 0) {
      await this.repository.attachFilesToSession(state.session, 'file_citation', [...draft.citedFileIds])
    }
    return { output: text, message: assistantMessage(text), ...draft.toUpdate() }
  }

  private async _tools(assistant: Assistant): Promise<PipelineTool[]> {
    if (assistant.collectionIndexIds.length === 0) return []
    const collections = await this.repository.getCollectionsForSearch(assistant.collectionIndexIds)
    return collections.length > 0 ? [createCollectionSearchTool(collections)] : []
  }
}

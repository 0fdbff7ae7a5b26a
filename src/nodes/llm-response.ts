/**
 * Node that answers the user with a model call.
 */

import { PipelineNodeRunError, normalizeError } from '../errors.js'
import { isFlowControlSignal } from '../flow-control.js'
import { createModelSummarizer } from '../history/summarizer.js'
import { createLogger } from '../logging/logger.js'
import { StateDraft, type StateUpdate } from '../pipeline/state.js'
import type { ValidationCache } from '../pipeline/validation-cache.js'
import { getBuiltInTools } from '../tools/builtins.js'
import { createCollectionSearchTool } from '../tools/collection-search.js'
import type { PipelineTool } from '../tools/tool.js'
import { assistantMessage, userMessage } from '../types/messages.js'
import { ModelServiceResolver } from './model-service.js'
import type { NodeContext } from './node.js'
import { PipelineNode } from './node.js'
import { createHistoryService, ephemeralMessages, historyTokenLimit } from './node-history.js'
import { NodeKind, type LlmResponseParams } from './params.js'
import { PromptContext, validatePromptVariables } from './prompt-context.js'
import { runToolLoop } from './tool-loop.js'

const log = createLogger('llm-response')

export class LlmResponseNode extends PipelineNode<LlmResponseParams> {
  readonly kind = NodeKind.LLM_RESPONSE

  validate(_cache: ValidationCache): void {
    validatePromptVariables(this.id, this.params.prompt, this.params)
  }

  protected async handle(context: NodeContext): Promise<StateUpdate> {
    const { state, config, input } = context
    const { model, providerModel } = await new ModelServiceResolver(this.repository, this.id, this.params).resolve()
    const systemPrompt = await new PromptContext(this.repository, state, this.params).format(this.params.prompt, input)

    const history = createHistoryService(this.repository, this.id, this.params)
    const messages = await history.load({
      session: state.session,
      tokenLimit: historyTokenLimit(this.params, providerModel, config, systemPrompt, input),
      summarize: createModelSummarizer(model),
      ephemeral: ephemeralMessages(state),
      ...(state.inputMessageId !== undefined ? { inputMessageId: state.inputMessageId } : {}),
    })

    const draft = new StateDraft(state)
    const tools = await this._tools()

    let text: string
    try {
      text = await runToolLoop({
        model,
        systemPrompt,
        messages: [...messages, userMessage(input)],
        tools,
        toolContext: { draft, repository: this.repository, session: state.session },
        maxIterations: config.maxToolIterations,
      })
    } catch (error) {
      if (isFlowControlSignal(error)) throw error
      const cause = normalizeError(error)
      if (!config.replyOnLlmError) {
        throw new PipelineNodeRunError(this.id, `Model call failed: ${cause.message}`, { cause })
      }
      log.warn('model call failed, replying with the fallback message', { nodeId: this.id, message: cause.message })
      return { output: config.llmErrorReply, message: assistantMessage(config.llmErrorReply), ...draft.toUpdate() }
    }

    await history.save(state.session, input, text)
    if (this.params.generateCitations && draft.citedFileIds.size > 0) {
      await this.repository.attachFilesToSession(state.session, 'file_citation', [...draft.citedFileIds])
    }
    return { output: text, message: assistantMessage(text), ...draft.toUpdate() }
  }

  private async _tools(): Promise<PipelineTool[]> {
    const tools = getBuiltInTools(this.params.tools)
    if (this.params.collectionIndexIds.length > 0) {
      const collections = await this.repository.getCollectionsForSearch(this.params.collectionIndexIds)
      if (collections.length > 0) {
        tools.push(createCollectionSearchTool(collections))
      }
    }
    return tools
  }
}

/**
 * Nodes that pick exactly one outgoing branch.
 *
 * A router with keywords `[K0, K1, ...]` exposes the handles `output_0, output_1, ...`. The label a router computes
 * is matched case-insensitively against the keywords; anything else takes the default keyword's handle.
 */

import { PipelineNodeRunError, normalizeError } from '../errors.js'
import { createModelSummarizer } from '../history/summarizer.js'
import type { StateUpdate } from '../pipeline/state.js'
import type { ValidationCache } from '../pipeline/validation-cache.js'
import type { JSONObject } from '../types/json.js'
import { getPath, stringifyValue } from '../types/json.js'
import { userMessage } from '../types/messages.js'
import { ModelServiceResolver } from './model-service.js'
import { PipelineNode, type NodeContext } from './node.js'
import { createHistoryService, ephemeralMessages, historyTokenLimit } from './node-history.js'
import { NodeKind, type BooleanParams, type RouterParams, type StaticRouterParams } from './params.js'
import { PromptContext, validatePromptVariables } from './prompt-context.js'

/**
 * Handle of the keyword at `index`.
 */
export function routeHandle(index: number): string {
  return `output_${index}`
}

/**
 * Outcome of matching a label against the keywords.
 */
export interface RouteDecision {
  keyword: string
  handle: string
  usedDefault: boolean
}

export abstract class RouterBase<TParams> extends PipelineNode<TParams> {
  protected abstract get keywords(): readonly string[]
  protected abstract get defaultKeywordIndex(): number
  protected abstract get tagOutputMessage(): boolean

  private _connectedHandles: ReadonlySet<string> | undefined

  get outputHandles(): readonly string[] {
    return this.keywords.map((_, index) => routeHandle(index))
  }

  get isRouter(): boolean {
    return true
  }

  /**
   * Handle taken when the label matches no keyword.
   */
  get defaultHandle(): string | undefined {
    return routeHandle(this.defaultKeywordIndex)
  }

  /**
   * Computes the label to route on.
   */
  protected abstract classify(context: NodeContext): Promise<string>

  /**
   * Records which handles have an outgoing edge. Until this is called every handle counts as connected.
   */
  connectOutputs(handles: Iterable<string>): void {
    this._connectedHandles = new Set(handles)
  }

  /**
   * Matches a label against the keywords. A label matching no keyword, or one whose handle has no edge, takes the
   * default route.
   */
  decide(label: string): RouteDecision {
    const normalized = label.trim().toUpperCase()
    const matched = this.keywords.indexOf(normalized)
    const routable = matched !== -1 && (this._connectedHandles?.has(routeHandle(matched)) ?? true)
    const index = routable ? matched : this.defaultKeywordIndex
    return {
      keyword: this.keywords[index] ?? normalized,
      handle: routeHandle(index),
      usedDefault: !routable,
    }
  }

  protected async handle(context: NodeContext): Promise<StateUpdate> {
    const decision = this.decide(await this.classify(context))
    const tag = `${this.name}:${decision.keyword}${decision.usedDefault ? ':default' : ''}`
    return {
      output: context.input,
      route: decision.handle,
      ...(this.tagOutputMessage ? { messageTags: [tag] } : {}),
    }
  }
}

/**
 * Routes on a model's classification of the input.
 */
export class LlmRouterNode extends RouterBase<RouterParams> {
  readonly kind = NodeKind.ROUTER

  protected get keywords(): readonly string[] {
    return this.params.keywords
  }

  protected get defaultKeywordIndex(): number {
    return this.params.defaultKeywordIndex
  }

  protected get tagOutputMessage(): boolean {
    return this.params.tagOutputMessage
  }

  validate(_cache: ValidationCache): void {
    validatePromptVariables(this.id, this.params.prompt, {})
  }

  protected async classify(context: NodeContext): Promise<string> {
    const { state, config, input } = context
    const { model, providerModel } = await new ModelServiceResolver(this.repository, this.id, this.params).resolve()
    const prompt = await new PromptContext(this.repository, state, {}).format(this.params.prompt, input)
    const systemPrompt =
      `${prompt}\n\nClassify the input into exactly one of the following keywords: ` +
      `${this.params.keywords.join(', ')}. Respond with the keyword only.`

    const history = createHistoryService(this.repository, this.id, this.params)
    const messages = await history.load({
      session: state.session,
      tokenLimit: historyTokenLimit(this.params, providerModel, config, systemPrompt, input),
      summarize: createModelSummarizer(model),
      ephemeral: ephemeralMessages(state),
      ...(state.inputMessageId !== undefined ? { inputMessageId: state.inputMessageId } : {}),
    })

    let label: string
    try {
      const response = await model.invoke({ systemPrompt, messages: [...messages, userMessage(input)] })
      label = response.text
    } catch (error) {
      const cause = normalizeError(error)
      throw new PipelineNodeRunError(this.id, `Model call failed: ${cause.message}`, { cause })
    }

    await history.save(state.session, input, this.decide(label).keyword)
    return label
  }
}

/**
 * Routes on a value read from the participant data, the temporary state or the session state.
 */
export class StaticRouterNode extends RouterBase<StaticRouterParams> {
  readonly kind = NodeKind.STATIC_ROUTER

  protected get keywords(): readonly string[] {
    return this.params.keywords
  }

  protected get defaultKeywordIndex(): number {
    return this.params.defaultKeywordIndex
  }

  protected get tagOutputMessage(): boolean {
    return this.params.tagOutputMessage
  }

  protected async classify(context: NodeContext): Promise<string> {
    return stringifyValue(getPath(this._source(context), this.params.routeKey))
  }

  private _source({ state }: NodeContext): JSONObject {
    switch (this.params.dataSource) {
      case 'participant_data':
        return state.participantData
      case 'temp_state':
        return state.tempStateView()
      case 'session_state':
        return state.sessionState
    }
  }
}

const BOOLEAN_KEYWORDS = ['TRUE', 'FALSE'] as const

/**
 * Routes to `output_0` when the input equals the configured text, otherwise to `output_1`.
 */
export class BooleanNode extends RouterBase<BooleanParams> {
  readonly kind = NodeKind.BOOLEAN

  protected get keywords(): readonly string[] {
    return BOOLEAN_KEYWORDS
  }

  protected get defaultKeywordIndex(): number {
    return 1
  }

  protected get tagOutputMessage(): boolean {
    return false
  }

  protected async classify({ input }: NodeContext): Promise<string> {
    return input.trim() === this.params.inputEquals.trim() ? 'TRUE' : 'FALSE'
  }
}

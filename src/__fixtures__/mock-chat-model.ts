/**
 * Scripted chat model for pipeline tests.
 *
 * Replies are queued with {@link MockChatModel.addTurn} and consumed in order; every request is recorded so tests can
 * assert on prompts, history and tool results.
 */

import type { ChatModel, ChatRequest, ChatResponse, LlmService, ModelParameters, ToolCall } from '../llm/types.js'

type Turn = { type: 'reply'; response: ChatResponse } | { type: 'error'; error: Error }

export class MockChatModel implements ChatModel {
  readonly modelName: string
  readonly requests: ChatRequest[] = []
  private readonly _turns: Turn[] = []
  private _fallback: string | undefined

  constructor(modelName: string = 'test-model') {
    this.modelName = modelName
  }

  get callCount(): number {
    return this.requests.length
  }

  /**
   * Queues a text reply, a tool-use reply, or an error.
   *
   * @returns This model for chaining
   */
  addTurn(turn: string | { toolCalls: ToolCall[]; text?: string } | Error): this {
    if (turn instanceof Error) {
      this._turns.push({ type: 'error', error: turn })
    } else if (typeof turn === 'string') {
      this._turns.push({ type: 'reply', response: { text: turn, toolCalls: [], stopReason: 'endTurn' } })
    } else {
      this._turns.push({
        type: 'reply',
        response: { text: turn.text ?? '', toolCalls: turn.toolCalls, stopReason: 'toolUse' },
      })
    }
    return this
  }

  /**
   * Reply used once the queue is empty.
   */
  replyAlways(text: string): this {
    this._fallback = text
    return this
  }

  async invoke(request: ChatRequest): Promise<ChatResponse> {
    this.requests.push(structuredClone(request))
    const turn = this._turns.shift()
    if (!turn) {
      if (this._fallback !== undefined) {
        return { text: this._fallback, toolCalls: [], stopReason: 'endTurn' }
      }
      throw new Error(`MockChatModel has no turn queued for call ${this.requests.length}`)
    }
    if (turn.type === 'error') throw turn.error
    return turn.response
  }
}

/**
 * Service handing out the same scripted model for every model name.
 */
export class MockLlmService implements LlmService {
  readonly providerType = 'openai' as const
  readonly model: MockChatModel
  readonly modelRequests: Array<{ modelName: string; parameters: ModelParameters | undefined }> = []

  constructor(model: MockChatModel = new MockChatModel()) {
    this.model = model
  }

  getChatModel(modelName: string, parameters?: ModelParameters): ChatModel {
    this.modelRequests.push({ modelName, parameters })
    return this.model
  }
}

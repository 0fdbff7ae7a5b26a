/**
 * Anthropic messages service.
 */

import Anthropic, { type ClientOptions } from '@anthropic-ai/sdk'
import { LlmServiceError, normalizeError } from '../errors.js'
import { toJSONValue } from '../types/json.js'
import type {
  ChatModel,
  ChatRequest,
  ChatResponse,
  LlmService,
  ModelMessage,
  ModelParameters,
  StopReason,
  ToolCall,
} from './types.js'

const DEFAULT_MAX_TOKENS = 4096

export interface AnthropicServiceOptions {
  /**
   * Anthropic API key (falls back to ANTHROPIC_API_KEY environment variable).
   */
  apiKey?: string

  /**
   * Pre-configured client instance.
   */
  client?: Anthropic

  clientConfig?: ClientOptions
}

type UserBlock = Anthropic.TextBlockParam | Anthropic.ToolResultBlockParam
type AssistantBlock = Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam

export class AnthropicService implements LlmService {
  readonly providerType = 'anthropic' as const
  private readonly _client: Anthropic

  constructor(options: AnthropicServiceOptions = {}) {
    const { apiKey, client, clientConfig } = options
    if (client) {
      this._client = client
    } else {
      if (!apiKey && !process.env.ANTHROPIC_API_KEY) {
        throw new LlmServiceError(
          "Anthropic API key is required. Provide it via the 'apiKey' option or set the ANTHROPIC_API_KEY environment variable."
        )
      }
      this._client = new Anthropic({
        ...(apiKey ? { apiKey } : {}),
        ...clientConfig,
      })
    }
  }

  getChatModel(modelName: string, parameters: ModelParameters = {}): ChatModel {
    return new AnthropicChatModel(this._client, modelName, parameters)
  }
}

class AnthropicChatModel implements ChatModel {
  readonly modelName: string
  private readonly _client: Anthropic
  private readonly _parameters: ModelParameters

  constructor(client: Anthropic, modelName: string, parameters: ModelParameters) {
    this._client = client
    this.modelName = modelName
    this._parameters = parameters
  }

  async invoke(request: ChatRequest): Promise<ChatResponse> {
    let response: Anthropic.Message
    try {
      response = await this._client.messages.create(this._formatRequest(request))
    } catch (error) {
      throw new LlmServiceError(`Anthropic request failed: ${normalizeError(error).message}`, { cause: error })
    }

    let text = ''
    const toolCalls: ToolCall[] = []
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text
      } else if (block.type === 'tool_use') {
        toolCalls.push({ id: block.id, name: block.name, input: toJSONValue(block.input) })
      }
    }

    return {
      text,
      toolCalls,
      stopReason: this._mapStopReason(response.stop_reason),
      usage: { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens },
    }
  }

  private _mapStopReason(reason: Anthropic.Message['stop_reason']): StopReason {
    switch (reason) {
      case 'end_turn':
        return 'endTurn'
      case 'tool_use':
        return 'toolUse'
      case 'max_tokens':
        return 'maxTokens'
      default:
        return 'other'
    }
  }

  private _formatRequest(request: ChatRequest): Anthropic.MessageCreateParamsNonStreaming {
    // Anthropic takes no system role inside the conversation, so inline system messages join the system prompt.
    const system = [
      ...(request.systemPrompt ? [request.systemPrompt] : []),
      ...request.messages.flatMap((message) => (message.role === 'system' ? [message.content] : [])),
    ].join('\n\n')

    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.modelName,
      max_tokens: this._parameters.maxTokens ?? DEFAULT_MAX_TOKENS,
      messages: this._formatMessages(request.messages),
    }
    if (system) params.system = system
    if (this._parameters.temperature !== undefined) params.temperature = this._parameters.temperature
    if (this._parameters.topP !== undefined) params.top_p = this._parameters.topP
    if (request.tools && request.tools.length > 0) {
      params.tools = request.tools.map((spec) => ({
        name: spec.name,
        description: spec.description,
        input_schema: { ...spec.inputSchema, type: 'object' as const },
      }))
    }
    return params
  }

  /**
   * Converts messages into alternating user/assistant turns, grouping consecutive blocks of the same role.
   */
  private _formatMessages(messages: ModelMessage[]): Anthropic.MessageParam[] {
    const formatted: Anthropic.MessageParam[] = []
    let userBlocks: UserBlock[] = []

    const flushUser = (): void => {
      if (userBlocks.length > 0) {
        formatted.push({ role: 'user', content: userBlocks })
        userBlocks = []
      }
    }

    for (const message of messages) {
      switch (message.role) {
        case 'system':
          break
        case 'user':
          userBlocks.push({ type: 'text', text: message.content })
          break
        case 'tool':
          userBlocks.push({ type: 'tool_result', tool_use_id: message.toolCallId, content: message.content })
          break
        case 'assistant': {
          flushUser()
          const blocks: AssistantBlock[] = []
          if (message.content) blocks.push({ type: 'text', text: message.content })
          for (const call of message.toolCalls ?? []) {
            blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.input })
          }
          formatted.push({ role: 'assistant', content: blocks })
          break
        }
      }
    }
    flushUser()
    return formatted
  }
}

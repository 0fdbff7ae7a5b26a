/**
 * OpenAI chat completions service.
 */

import OpenAI, { type ClientOptions } from 'openai'
import { LlmServiceError, normalizeError } from '../errors.js'
import type {
  ChatModel,
  ChatRequest,
  ChatResponse,
  LlmService,
  ModelParameters,
  StopReason,
  ToolCall,
} from './types.js'
import { parseToolInput } from './tool-input.js'

type ChatCompletionMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam
type ChatCompletionCreateParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming

/**
 * Options for creating an OpenAI service.
 */
export interface OpenAIServiceOptions {
  /**
   * OpenAI API key (falls back to OPENAI_API_KEY environment variable).
   */
  apiKey?: string

  /**
   * Pre-configured client instance.
   */
  client?: OpenAI

  /**
   * Additional client configuration, such as `baseURL` or `organization`.
   */
  clientConfig?: ClientOptions
}

const STOP_REASONS: Record<string, StopReason> = {
  stop: 'endTurn',
  tool_calls: 'toolUse',
  length: 'maxTokens',
}

export class OpenAIService implements LlmService {
  readonly providerType = 'openai' as const
  private readonly _client: OpenAI

  constructor(options: OpenAIServiceOptions = {}) {
    const { apiKey, client, clientConfig } = options
    if (client) {
      this._client = client
    } else {
      if (!apiKey && !process.env.OPENAI_API_KEY) {
        throw new LlmServiceError(
          "OpenAI API key is required. Provide it via the 'apiKey' option or set the OPENAI_API_KEY environment variable."
        )
      }
      this._client = new OpenAI({
        ...(apiKey ? { apiKey } : {}),
        ...clientConfig,
      })
    }
  }

  getChatModel(modelName: string, parameters: ModelParameters = {}): ChatModel {
    return new OpenAIChatModel(this._client, modelName, parameters)
  }
}

class OpenAIChatModel implements ChatModel {
  readonly modelName: string
  private readonly _client: OpenAI
  private readonly _parameters: ModelParameters

  constructor(client: OpenAI, modelName: string, parameters: ModelParameters) {
    this._client = client
    this.modelName = modelName
    this._parameters = parameters
  }

  async invoke(request: ChatRequest): Promise<ChatResponse> {
    let completion: OpenAI.Chat.Completions.ChatCompletion
    try {
      completion = await this._client.chat.completions.create(this._formatRequest(request))
    } catch (error) {
      throw new LlmServiceError(`OpenAI request failed: ${normalizeError(error).message}`, { cause: error })
    }

    const choice = completion.choices[0]
    if (!choice) {
      throw new LlmServiceError('OpenAI returned no choices')
    }
    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? [])
      .filter((call): call is OpenAI.Chat.Completions.ChatCompletionMessageFunctionToolCall => call.type === 'function')
      .map((call) => ({
      id: call.id,
      name: call.function.name,
      input: parseToolInput(call.function.arguments),
    }))

    return {
      text: choice.message.content ?? '',
      toolCalls,
      stopReason: STOP_REASONS[choice.finish_reason] ?? 'other',
      ...(completion.usage
        ? { usage: { inputTokens: completion.usage.prompt_tokens, outputTokens: completion.usage.completion_tokens } }
        : {}),
    }
  }

  private _formatRequest(request: ChatRequest): ChatCompletionCreateParams {
    const params: ChatCompletionCreateParams = {
      model: this.modelName,
      messages: this._formatMessages(request),
    }

    if (this._parameters.temperature !== undefined) {
      params.temperature = this._parameters.temperature
    }
    if (this._parameters.maxTokens !== undefined) {
      params.max_tokens = this._parameters.maxTokens
    }
    if (this._parameters.topP !== undefined) {
      params.top_p = this._parameters.topP
    }

    if (request.tools && request.tools.length > 0) {
      params.tools = request.tools.map((spec) => ({
        type: 'function' as const,
        function: {
          name: spec.name,
          description: spec.description,
          parameters: spec.inputSchema,
        },
      }))
    }

    return params
  }

  private _formatMessages(request: ChatRequest): ChatCompletionMessageParam[] {
    const messages: ChatCompletionMessageParam[] = []
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt })
    }

    for (const message of request.messages) {
      switch (message.role) {
        case 'system':
          messages.push({ role: 'system', content: message.content })
          break
        case 'user':
          messages.push({ role: 'user', content: message.content })
          break
        case 'assistant':
          messages.push({
            role: 'assistant',
            content: message.content,
            ...(message.toolCalls && message.toolCalls.length > 0
              ? {
                  tool_calls: message.toolCalls.map((call) => ({
                    id: call.id,
                    type: 'function' as const,
                    function: { name: call.name, arguments: JSON.stringify(call.input) },
                  })),
                }
              : {}),
          })
          break
        case 'tool':
          messages.push({ role: 'tool', tool_call_id: message.toolCallId, content: message.content })
          break
      }
    }
    return messages
  }
}

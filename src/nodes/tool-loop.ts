import { normalizeError } from '../errors.js'
import { isFlowControlSignal } from '../flow-control.js'
import type { ChatModel, ModelMessage, ToolCall } from '../llm/types.js'
import { createLogger } from '../logging/logger.js'
import { formatToolResult, type PipelineTool, type ToolContext } from '../tools/tool.js'
import type { ChatMessage } from '../types/messages.js'

const log = createLogger('tool-loop')

export interface ToolLoopOptions {
  model: ChatModel
  systemPrompt: string
  messages: readonly ChatMessage[]
  tools: readonly PipelineTool[]
  toolContext: ToolContext
  /** Model calls that may request tools; the call after the last one is made without tools. */
  maxIterations: number
}

/**
 * Calls the model, running requested tools and feeding their results back until the model answers with text.
 *
 * @returns The model's final text
 * @throws FlowControlSignal raised by a tool
 */
export async function runToolLoop(options: ToolLoopOptions): Promise<string> {
  const { model, systemPrompt, tools, toolContext, maxIterations } = options
  const messages: ModelMessage[] = options.messages.map(toModelMessage)
  const specs = tools.map((tool) => tool.toolSpec)

  for (let iteration = 0; ; iteration++) {
    const allowTools = specs.length > 0 && iteration < maxIterations
    const response = await model.invoke({ systemPrompt, messages, ...(allowTools ? { tools: specs } : {}) })
    if (!allowTools || response.toolCalls.length === 0) {
      return response.text
    }

    messages.push({ role: 'assistant', content: response.text, toolCalls: response.toolCalls })
    for (const call of response.toolCalls) {
      messages.push({
        role: 'tool',
        toolCallId: call.id,
        toolName: call.name,
        content: await executeTool(call, tools, toolContext),
      })
    }
  }
}

async function executeTool(call: ToolCall, tools: readonly PipelineTool[], context: ToolContext): Promise<string> {
  const tool = tools.find((candidate) => candidate.name === call.name)
  if (!tool) {
    return `Error: unknown tool '${call.name}'`
  }
  try {
    return formatToolResult(await tool.invoke(call.input, context))
  } catch (error) {
    if (isFlowControlSignal(error)) throw error
    const message = normalizeError(error).message
    log.debug('tool failed', { tool: call.name, message })
    return `Error: ${message}`
  }
}

function toModelMessage(message: ChatMessage): ModelMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content }
    case 'user':
      return { role: 'user', content: message.content }
    case 'assistant':
      return { role: 'assistant', content: message.content }
  }
}

import type { ChatModel } from '../llm/types.js'
import type { ChatMessage } from '../types/messages.js'
import type { Summarizer } from './compression.js'

const SUMMARY_PROMPT =
  'Progressively summarize the conversation below. If it starts with an existing summary, extend that summary ' +
  'with the new lines rather than starting over. Return only the new summary.'

/**
 * Creates a {@link Summarizer} backed by a chat model.
 *
 * @param model - Model used to write summaries
 * @returns A summarizer
 */
export function createModelSummarizer(model: ChatModel): Summarizer {
  return async (messages: ChatMessage[]): Promise<string> => {
    const transcript = messages.map((message) => `${labelFor(message)}: ${message.content}`).join('\n')
    const response = await model.invoke({
      systemPrompt: SUMMARY_PROMPT,
      messages: [{ role: 'user', content: transcript }],
    })
    return response.text.trim()
  }
}

function labelFor(message: ChatMessage): string {
  switch (message.role) {
    case 'system':
      return 'Summary so far'
    case 'user':
      return 'Human'
    case 'assistant':
      return 'AI'
  }
}

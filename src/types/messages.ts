/**
 * Conversation message types shared by the state container, history and model services.
 */

/**
 * Role of a conversation message.
 */
export type Role = 'user' | 'assistant' | 'system'

/**
 * A message in a conversation.
 */
export interface ChatMessage {
  role: Role
  content: string
}

/**
 * A message appended to the run's ephemeral history, remembering which node produced it.
 */
export interface PipelineMessage extends ChatMessage {
  nodeId?: string
}

/**
 * Creates a user message.
 *
 * @param content - Message text
 * @returns The message
 */
export function userMessage(content: string): ChatMessage {
  return { role: 'user', content }
}

/**
 * Creates an assistant message.
 *
 * @param content - Message text
 * @returns The message
 */
export function assistantMessage(content: string): ChatMessage {
  return { role: 'assistant', content }
}

/**
 * Creates a system message.
 *
 * @param content - Message text
 * @returns The message
 */
export function systemMessage(content: string): ChatMessage {
  return { role: 'system', content }
}

import type { ChatMessage } from '../types/messages.js'

const CHARS_PER_TOKEN = 4
const TOKENS_PER_MESSAGE = 3

/**
 * Approximates the token count of a message list: a quarter token per character plus a fixed per-message overhead.
 *
 * @param messages - Messages to count
 * @returns Approximate token count
 */
export function countTokens(messages: readonly ChatMessage[]): number {
  return messages.reduce((total, message) => total + countTextTokens(message.content) + TOKENS_PER_MESSAGE, 0)
}

/**
 * Approximates the token count of a text.
 *
 * @param text - Text to count
 * @returns Approximate token count
 */
export function countTextTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN)
}

/**
 * Splits a text into chunks of about `tokens` tokens each, breaking at whitespace where possible. Consecutive chunks
 * share roughly `overlap` tokens.
 *
 * @param text - Text to split
 * @param tokens - Approximate chunk size in tokens
 * @param overlap - Approximate overlap in tokens
 * @returns The chunks; empty for blank text
 */
export function chunkByTokens(text: string, tokens: number, overlap: number = 0): string[] {
  if (text.trim() === '') return []
  const size = Math.max(tokens, 1) * CHARS_PER_TOKEN
  const overlapChars = Math.min(Math.max(overlap, 0) * CHARS_PER_TOKEN, size - 1)
  if (text.length <= size) return [text]

  const chunks: string[] = []
  let start = 0
  for (;;) {
    let end = Math.min(start + size, text.length)
    if (end < text.length) {
      const boundary = Math.max(text.lastIndexOf(' ', end), text.lastIndexOf('\n', end))
      if (boundary > start) end = boundary
    }
    const chunk = text.slice(start, end).trim()
    if (chunk !== '') chunks.push(chunk)
    if (end >= text.length) return chunks
    start = Math.max(end - overlapChars, start + 1)
  }
}

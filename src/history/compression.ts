/**
 * Compression checkpoint algorithm.
 *
 * Works on history entries ordered oldest first, as returned by a checkpoint-aware read. Only the first entry can
 * carry a summary, since reads start at the newest checkpoint. The result says which messages to replay into the
 * model and, when the history was out of bound, which record to checkpoint and how.
 */

import type { ChatMessage } from '../types/messages.js'
import { systemMessage } from '../types/messages.js'
import type { CompressionCheckpoint, HistoryMode } from '../repository/types.js'
import { countTokens } from './token-count.js'

/**
 * One unit of history: a turn for scoped histories, a single message for the session log.
 */
export interface HistoryEntry {
  recordId: number
  messages: ChatMessage[]
  summary: string | null
}

export interface CompressionPolicy {
  mode: HistoryMode
  /** Most entries kept verbatim. */
  maxHistoryLength: number
  /** Token budget for the replayed history, already net of the prompt. */
  tokenLimit: number
}

/**
 * Produces a summary of the given messages, typically by calling a model.
 */
export type Summarizer = (messages: ChatMessage[]) => Promise<string>

export interface CompressionResult {
  /** Messages to replay, oldest first. */
  messages: ChatMessage[]
  /** Checkpoint to persist, or null when the history is already within bound. */
  checkpoint: { recordId: number; value: CompressionCheckpoint } | null
}

/**
 * Applies a history mode to the entries read since the last checkpoint.
 *
 * A history that is within bound yields no checkpoint, which makes a second pass over an already compressed
 * history a no-op.
 *
 * @param entries - Entries ordered oldest first
 * @param policy - Mode and bounds
 * @param summarize - Summarizer used in `summarize` mode
 * @returns Messages to replay and the checkpoint to write
 */
export async function compressHistory(
  entries: readonly HistoryEntry[],
  policy: CompressionPolicy,
  summarize: Summarizer
): Promise<CompressionResult> {
  const previousSummary = policy.mode === 'summarize' ? (entries[0]?.summary ?? null) : null
  const keep = keptEntryCount(entries, policy, previousSummary)

  if (keep >= entries.length) {
    return { messages: withSummary(previousSummary, entries), checkpoint: null }
  }

  const dropped = entries.slice(0, entries.length - keep)
  const kept = entries.slice(entries.length - keep)
  const oldestKept = kept[0]
  if (!oldestKept) {
    throw new Error('Compression must keep at least one entry')
  }

  if (policy.mode !== 'summarize') {
    return {
      messages: withSummary(null, kept),
      checkpoint: { recordId: oldestKept.recordId, value: { kind: 'marker' } },
    }
  }

  const text = await summarize([
    ...(previousSummary ? [systemMessage(previousSummary)] : []),
    ...dropped.flatMap((entry) => entry.messages),
  ])
  return {
    messages: withSummary(text, kept),
    checkpoint: { recordId: oldestKept.recordId, value: { kind: 'summary', text } },
  }
}

/**
 * Number of newest entries to keep verbatim. Never less than one for a non-empty history.
 */
function keptEntryCount(
  entries: readonly HistoryEntry[],
  policy: CompressionPolicy,
  previousSummary: string | null
): number {
  const total = entries.length
  if (total === 0) return 0

  switch (policy.mode) {
    case 'max_history_length':
      return Math.max(1, Math.min(total, policy.maxHistoryLength))
    case 'truncate_tokens':
      return Math.max(1, fittingEntryCount(entries, policy.tokenLimit))
    case 'summarize': {
      const tokens = countTokens(withSummary(previousSummary, entries))
      if (total <= policy.maxHistoryLength && tokens <= policy.tokenLimit) {
        return total
      }
      return Math.max(1, Math.min(policy.maxHistoryLength, fittingEntryCount(entries, policy.tokenLimit)))
    }
  }
}

/**
 * Counts the newest entries whose messages fit within `tokenLimit`.
 */
function fittingEntryCount(entries: readonly HistoryEntry[], tokenLimit: number): number {
  let used = 0
  let count = 0
  for (let i = entries.length - 1; i >= 0; i--) {
    const entry = entries[i]
    if (!entry) break
    used += countTokens(entry.messages)
    if (used > tokenLimit) break
    count++
  }
  return count
}

function withSummary(summary: string | null, entries: readonly HistoryEntry[]): ChatMessage[] {
  return [...(summary ? [systemMessage(summary)] : []), ...entries.flatMap((entry) => entry.messages)]
}

import { describe, it, expect, vi } from 'vitest'
import { compressHistory, type HistoryEntry } from '../compression.js'
import { chunkByTokens, countTextTokens, countTokens } from '../token-count.js'

function turn(recordId: number, text: string = `turn ${recordId}`, summary: string | null = null): HistoryEntry {
  return {
    recordId,
    messages: [
      { role: 'user', content: `human ${text}` },
      { role: 'assistant', content: `ai ${text}` },
    ],
    summary,
  }
}

const noSummarizer = vi.fn(async () => {
  throw new Error('summarizer should not be called')
})

describe('countTokens', () => {
  it('counts a quarter token per character plus three per message', () => {
    expect(countTextTokens('abcde')).toBe(2)
    expect(countTokens([{ role: 'user', content: 'abcd' }, { role: 'assistant', content: '' }])).toBe(7)
  })
})

describe('chunkByTokens', () => {
  it('keeps text that fits in one chunk', () => {
    expect(chunkByTokens('hello', 10)).toStrictEqual(['hello'])
    expect(chunkByTokens('  ', 3)).toStrictEqual([])
  })

  it('splits on whitespace', () => {
    expect(chunkByTokens('aaaa bbbb cccc dddd eeee', 3)).toStrictEqual(['aaaa bbbb', 'cccc dddd', 'eeee'])
  })

  it('repeats the overlap at the start of the next chunk', () => {
    expect(chunkByTokens('aaaa bbbb cccc dddd', 3, 1)).toStrictEqual(['aaaa bbbb', 'bbbb cccc', 'cccc dddd'])
  })

  it('cuts words longer than a chunk', () => {
    expect(chunkByTokens('abcdefghij', 1)).toStrictEqual(['abcd', 'efgh', 'ij'])
  })
})

describe('compressHistory', () => {
  describe('max_history_length', () => {
    const policy = { mode: 'max_history_length' as const, maxHistoryLength: 2, tokenLimit: 10_000 }

    it('returns everything without a checkpoint when within bound', async () => {
      const result = await compressHistory([turn(1), turn(2)], policy, noSummarizer)

      expect(result.checkpoint).toBeNull()
      expect(result.messages).toHaveLength(4)
    })

    it('keeps the newest entries and marks the oldest kept record', async () => {
      const result = await compressHistory([turn(1), turn(2), turn(3)], policy, noSummarizer)

      expect(result.checkpoint).toStrictEqual({ recordId: 2, value: { kind: 'marker' } })
      expect(result.messages.map((message) => message.content)).toStrictEqual([
        'human turn 2',
        'ai turn 2',
        'human turn 3',
        'ai turn 3',
      ])
    })

    it('ignores stored summaries', async () => {
      const result = await compressHistory([turn(1, 'a', 'old summary')], policy, noSummarizer)

      expect(result.messages.map((message) => message.role)).toStrictEqual(['user', 'assistant'])
    })
  })

  describe('truncate_tokens', () => {
    it('keeps the newest entries that fit the token limit', async () => {
      // each message: 'human aaaa' -> 3 + 3 tokens, 'ai aaaa' -> 2 + 3 tokens, so 11 per turn
      const entries = [turn(1, 'aaaa'), turn(2, 'aaaa'), turn(3, 'aaaa')]
      const result = await compressHistory(
        entries,
        { mode: 'truncate_tokens', maxHistoryLength: 10, tokenLimit: 25 },
        noSummarizer
      )

      expect(result.checkpoint).toStrictEqual({ recordId: 2, value: { kind: 'marker' } })
      expect(result.messages).toHaveLength(4)
    })

    it('keeps at least the newest entry', async () => {
      const result = await compressHistory(
        [turn(1), turn(2)],
        { mode: 'truncate_tokens', maxHistoryLength: 10, tokenLimit: 1 },
        noSummarizer
      )

      expect(result.checkpoint).toStrictEqual({ recordId: 2, value: { kind: 'marker' } })
    })
  })

  describe('summarize', () => {
    const policy = { mode: 'summarize' as const, maxHistoryLength: 2, tokenLimit: 10_000 }

    it('replays the stored summary ahead of the entries', async () => {
      const result = await compressHistory([turn(4, 'x', 'summary 1-3'), turn(5, 'y')], policy, noSummarizer)

      expect(result.checkpoint).toBeNull()
      expect(result.messages[0]).toStrictEqual({ role: 'system', content: 'summary 1-3' })
      expect(result.messages).toHaveLength(5)
    })

    it('folds the previous summary and the dropped entries into a new summary', async () => {
      const summarize = vi.fn(async () => 'summary 1-4')

      const result = await compressHistory(
        [turn(4, 'four', 'summary 1-3'), turn(5, 'five'), turn(6, 'six')],
        policy,
        summarize
      )

      expect(summarize).toHaveBeenCalledWith([
        { role: 'system', content: 'summary 1-3' },
        { role: 'user', content: 'human four' },
        { role: 'assistant', content: 'ai four' },
      ])
      expect(result.checkpoint).toStrictEqual({ recordId: 5, value: { kind: 'summary', text: 'summary 1-4' } })
      expect(result.messages).toStrictEqual([
        { role: 'system', content: 'summary 1-4' },
        { role: 'user', content: 'human five' },
        { role: 'assistant', content: 'ai five' },
        { role: 'user', content: 'human six' },
        { role: 'assistant', content: 'ai six' },
      ])
    })

    it('summarizes when the token limit is exceeded even below the entry limit', async () => {
      const summarize = vi.fn(async () => 'short')

      const result = await compressHistory(
        [turn(1, 'aaaa'), turn(2, 'aaaa')],
        { mode: 'summarize', maxHistoryLength: 10, tokenLimit: 15 },
        summarize
      )

      expect(result.checkpoint).toStrictEqual({ recordId: 2, value: { kind: 'summary', text: 'short' } })
    })

    it('takes no checkpoint on a second pass over a compressed history', async () => {
      const result = await compressHistory([turn(5, 'five', 'summary 1-4'), turn(6, 'six')], policy, noSummarizer)

      expect(result.checkpoint).toBeNull()
    })

    it('treats a summary that reads like a marker as text', async () => {
      const result = await compressHistory(
        [turn(1), turn(2), turn(3)],
        policy,
        vi.fn(async () => 'summarize')
      )

      expect(result.checkpoint).toStrictEqual({ recordId: 2, value: { kind: 'summary', text: 'summarize' } })
    })
  })

  it('returns nothing for an empty history', async () => {
    const result = await compressHistory(
      [],
      { mode: 'summarize', maxHistoryLength: 2, tokenLimit: 100 },
      noSummarizer
    )

    expect(result).toStrictEqual({ messages: [], checkpoint: null })
  })
})

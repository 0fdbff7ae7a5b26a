/**
 * Access to the three history scopes for one node.
 *
 * Global history is the session's canonical log, node-scoped and named histories are stored per `(type, name)`,
 * and the ephemeral scope is whatever earlier nodes of the current run appended to the state. Every read goes through
 * {@link compressHistory}, and a resulting checkpoint is persisted before the messages are returned.
 */

import { createLogger } from '../logging/logger.js'
import type { PipelineRepository } from '../repository/pipeline-repository.js'
import type { CheckpointTarget, HistoryMode, HistoryType, ScopedHistory } from '../repository/types.js'
import type { ChatMessage } from '../types/messages.js'
import { assistantMessage, userMessage } from '../types/messages.js'
import type { SessionRef } from '../types/session.js'
import { compressHistory, type HistoryEntry, type Summarizer } from './compression.js'

const log = createLogger('history')

export interface HistorySettings {
  type: HistoryType
  /** Required for named histories. */
  name?: string
  mode: HistoryMode
  maxHistoryLength: number
}

export interface LoadHistoryOptions {
  session: SessionRef
  /** Token budget for the replayed history. */
  tokenLimit: number
  summarize: Summarizer
  /** Inbound message the caller already stored in the session log. */
  inputMessageId?: number
  /** Messages produced earlier in this run, appended after global history. */
  ephemeral?: readonly ChatMessage[]
}

export class HistoryService {
  private readonly _repository: PipelineRepository
  private readonly _nodeId: string
  private readonly _settings: HistorySettings

  constructor(repository: PipelineRepository, nodeId: string, settings: HistorySettings) {
    this._repository = repository
    this._nodeId = nodeId
    this._settings = settings
  }

  get settings(): HistorySettings {
    return this._settings
  }

  /**
   * Reads the history to replay into a model call, compressing it first when it is out of bound.
   *
   * @returns Messages oldest first
   */
  async load(options: LoadHistoryOptions): Promise<ChatMessage[]> {
    const { type, mode } = this._settings
    switch (type) {
      case 'none':
        return []
      case 'global': {
        const stored = await this._repository.getSessionMessages(options.session, mode, options.inputMessageId)
        const entries = stored.map((message) => ({
          recordId: message.id,
          messages: [{ role: message.role, content: message.content }],
          summary: message.summary,
        }))
        const messages = await this._compress(entries, options, (recordId) => ({
          scope: 'global',
          messageId: recordId,
        }))
        return [...messages, ...(options.ephemeral ?? [])]
      }
      case 'node':
      case 'named': {
        const history = await this._scopedHistory(options.session)
        const records = await this._repository.getScopedMessages(history, mode)
        const entries = records.map((record) => ({
          recordId: record.id,
          messages: [userMessage(record.humanMessage), assistantMessage(record.aiMessage)],
          summary: record.summary,
        }))
        return this._compress(entries, options, (recordId) => ({ scope: 'scoped', recordId }))
      }
    }
  }

  /**
   * Persists one turn. Only node-scoped and named histories are written here; the session log belongs to the caller.
   */
  async save(session: SessionRef, humanMessage: string, aiMessage: string): Promise<void> {
    const { type } = this._settings
    if (type !== 'node' && type !== 'named') return
    const history = await this._scopedHistory(session)
    await this._repository.saveScopedMessage(history, { humanMessage, aiMessage, nodeId: this._nodeId })
  }

  private async _compress(
    entries: HistoryEntry[],
    options: LoadHistoryOptions,
    target: (recordId: number) => CheckpointTarget
  ): Promise<ChatMessage[]> {
    const { mode, maxHistoryLength } = this._settings
    const result = await compressHistory(
      entries,
      { mode, maxHistoryLength, tokenLimit: options.tokenLimit },
      options.summarize
    )
    if (result.checkpoint) {
      log.debug('writing compression checkpoint', {
        nodeId: this._nodeId,
        recordId: result.checkpoint.recordId,
        kind: result.checkpoint.value.kind,
      })
      await this._repository.saveCompressionCheckpoint(
        target(result.checkpoint.recordId),
        result.checkpoint.value,
        mode
      )
    }
    return result.messages
  }

  private async _scopedHistory(session: SessionRef): Promise<ScopedHistory> {
    const { type, name } = this._settings
    if (type === 'named') {
      if (!name) {
        throw new Error('A named history requires a history name')
      }
      return this._repository.getOrCreateScopedHistory(session, 'named', name)
    }
    return this._repository.getOrCreateScopedHistory(session, 'node', this._nodeId)
  }
}

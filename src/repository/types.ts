/**
 * Records exchanged through the {@link PipelineRepository} port.
 *
 * These are plain data: no record exposes a way back into the store.
 */

import type { JSONObject } from '../types/json.js'
import type { LlmProviderType } from '../llm/types.js'

/**
 * Where a node keeps its conversational memory.
 */
export const HistoryType = {
  /** The session's canonical message log. */
  GLOBAL: 'global',
  /** A history private to one node, keyed by node id. */
  NODE: 'node',
  /** A history shared by every node using the same name. */
  NAMED: 'named',
  /** No history. */
  NONE: 'none',
} as const

export type HistoryType = (typeof HistoryType)[keyof typeof HistoryType]

/**
 * Persisted history scopes. Global history lives in the session's message log instead.
 */
export type ScopedHistoryType = typeof HistoryType.NODE | typeof HistoryType.NAMED

/**
 * How a history is kept within bounds.
 */
export const HistoryMode = {
  SUMMARIZE: 'summarize',
  TRUNCATE_TOKENS: 'truncate_tokens',
  MAX_HISTORY_LENGTH: 'max_history_length',
} as const

export type HistoryMode = (typeof HistoryMode)[keyof typeof HistoryMode]

/**
 * A node-scoped or named history.
 */
export interface ScopedHistory {
  id: number
  sessionId: string
  type: ScopedHistoryType
  name: string
}

/**
 * One turn of a scoped history.
 */
export interface HistoryRecord {
  id: number
  historyId: number
  nodeId: string
  humanMessage: string
  aiMessage: string
  compressionMarker: HistoryMode | null
  summary: string | null
  createdAt: Date
}

/**
 * One message of the session's canonical log.
 */
export interface SessionMessage {
  id: number
  sessionId: string
  role: 'user' | 'assistant'
  content: string
  compressionMarker: HistoryMode | null
  summary: string | null
  createdAt: Date
}

/**
 * Result of compressing a history.
 *
 * A marker only records that everything older than the checkpointed record is dropped. A summary also replaces that
 * older content with text.
 */
export type CompressionCheckpoint = { kind: 'marker' } | { kind: 'summary'; text: string }

/**
 * Record a checkpoint is written to.
 */
export type CheckpointTarget = { scope: 'global'; messageId: number } | { scope: 'scoped'; recordId: number }

export interface LlmProvider {
  id: number
  type: LlmProviderType
  name: string
  config: {
    apiKey?: string
    baseUrl?: string
    organization?: string
  }
}

export interface LlmProviderModel {
  id: number
  type: LlmProviderType
  name: string
  maxTokenLimit: number
}

export interface SourceMaterial {
  id: number
  topic: string
  material: string
}

export interface Collection {
  id: number
  name: string
  summary: string
  isIndex: boolean
}

export interface CollectionIndexSummary {
  id: number
  name: string
  summary: string
}

export interface CollectionFileInfo {
  id: number
  name: string
  summary: string
  contentType: string
}

/**
 * A chunk returned by searching indexed collections.
 */
export interface CollectionSearchHit {
  collectionId: number
  fileId: number
  fileName: string
  content: string
}

export interface StoredFile {
  id: number
  teamId: string
  name: string
  contentType: string
  purpose: string
  size: number
}

export interface NewFile {
  teamId: string
  name: string
  content: Buffer
  contentType: string
  purpose: string
}

/**
 * How files attached to a session are presented to the user.
 */
export type AttachmentType = 'file_citation' | 'code_interpreter' | 'file_attachment'

/**
 * Legacy assistant configuration.
 */
export interface Assistant {
  id: number
  name: string
  instructions: string
  llmProviderId: number
  llmProviderModelId: number
  temperature: number
  /** Indexed collections the assistant searches. */
  collectionIndexIds: number[]
  citationsEnabled: boolean
}

export type ParticipantData = JSONObject

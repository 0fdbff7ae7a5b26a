/**
 * Persistence port of the pipeline engine.
 *
 * Every persistence operation a node performs goes through this interface. Lookups by id either return the record
 * or throw {@link RepositoryLookupError}; no method signals "not found" with null.
 */

import type { LlmService } from '../llm/types.js'
import type { ParticipantSchedule, SessionRef } from '../types/session.js'
import type {
  Assistant,
  AttachmentType,
  CheckpointTarget,
  Collection,
  CollectionFileInfo,
  CollectionIndexSummary,
  CollectionSearchHit,
  CompressionCheckpoint,
  HistoryMode,
  HistoryRecord,
  LlmProvider,
  LlmProviderModel,
  NewFile,
  ParticipantData,
  ScopedHistory,
  ScopedHistoryType,
  SessionMessage,
  SourceMaterial,
  StoredFile,
} from './types.js'

/**
 * Storage backend interface for pipeline execution.
 *
 * Implement this interface to run the engine against another store. Implementations perform no caching or retries
 * of their own.
 */
export interface PipelineRepository {
  // --- History ---

  /**
   * Returns the scoped history for a session, creating it on first use.
   *
   * @param session - Session the history belongs to
   * @param type - Node-scoped or named
   * @param name - Node id for node-scoped histories, the history name otherwise
   */
  getOrCreateScopedHistory(session: SessionRef, type: ScopedHistoryType, name: string): Promise<ScopedHistory>

  /**
   * Appends one turn to a scoped history.
   *
   * @returns The stored record
   */
  saveScopedMessage(
    history: ScopedHistory,
    turn: { humanMessage: string; aiMessage: string; nodeId: string }
  ): Promise<HistoryRecord>

  /**
   * Returns the records of a scoped history from the newest checkpoint of `mode` onwards, oldest first.
   */
  getScopedMessages(history: ScopedHistory, mode: HistoryMode): Promise<HistoryRecord[]>

  /**
   * Returns the session's messages from the newest checkpoint of `mode` onwards, oldest first.
   *
   * @param excludeMessageId - Message to leave out, usually the inbound message the caller already stored
   */
  getSessionMessages(session: SessionRef, mode: HistoryMode, excludeMessageId?: number): Promise<SessionMessage[]>

  /**
   * Writes a compression checkpoint onto a history record.
   *
   * A marker only records the mode. A summary also replaces the record's `summary` field.
   */
  saveCompressionCheckpoint(
    target: CheckpointTarget,
    checkpoint: CompressionCheckpoint,
    mode: HistoryMode
  ): Promise<void>

  // --- Models ---

  getLlmProvider(providerId: number): Promise<LlmProvider>

  /**
   * Loads the provider and builds its service in one call.
   */
  getLlmService(providerId: number): Promise<LlmService>

  getLlmProviderModel(modelId: number): Promise<LlmProviderModel>

  // --- Resources ---

  getSourceMaterial(materialId: number): Promise<SourceMaterial>

  getCollection(collectionId: number): Promise<Collection>

  /**
   * Returns the indexed collections among `collectionIds`. Unknown or non-indexed ids are skipped.
   */
  getCollectionsForSearch(collectionIds: readonly number[]): Promise<Collection[]>

  getCollectionIndexSummaries(collectionIds: readonly number[]): Promise<CollectionIndexSummary[]>

  /**
   * @throws RepositoryLookupError when the collection does not exist
   */
  getCollectionFileInfo(collectionId: number): Promise<CollectionFileInfo[]>

  /**
   * Searches the content of indexed collections.
   */
  searchCollections(collectionIds: readonly number[], query: string, limit: number): Promise<CollectionSearchHit[]>

  getAssistant(assistantId: number): Promise<Assistant>

  // --- Files ---

  createFile(file: NewFile): Promise<StoredFile>

  attachFilesToSession(session: SessionRef, type: AttachmentType, fileIds: readonly number[]): Promise<void>

  // --- Participants ---

  getParticipantGlobalData(session: SessionRef): Promise<ParticipantData>

  getParticipantSchedules(session: SessionRef): Promise<ParticipantSchedule[]>
}

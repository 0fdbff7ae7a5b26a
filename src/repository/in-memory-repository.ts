/**
 * In-memory implementation of {@link PipelineRepository}.
 *
 * Intended for tests and local experiments. Every lookup reads from data seeded through the `add*` methods and
 * throws {@link RepositoryLookupError} for anything that was not seeded, so a run can never silently fall through to
 * a real store. Not safe for concurrent runs.
 */

import { RepositoryLookupError } from '../errors.js'
import type { LlmService } from '../llm/types.js'
import { copyObject } from '../types/json.js'
import type { ParticipantSchedule, SessionRef } from '../types/session.js'
import type { PipelineRepository } from './pipeline-repository.js'
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
 * A port method invocation, recorded in call order.
 */
export interface RepositoryCall {
  method: keyof PipelineRepository
  args: unknown[]
}

interface CollectionContent {
  fileId: number
  fileName: string
  content: string
}

/**
 * Returns the tail of `records` starting at the newest record carrying `mode` as its checkpoint.
 *
 * @param records - Records ordered oldest first
 * @param mode - Active history mode
 * @returns The records a reader should see
 */
export function sliceFromCheckpoint<T extends { compressionMarker: HistoryMode | null }>(
  records: readonly T[],
  mode: HistoryMode
): T[] {
  for (let i = records.length - 1; i >= 0; i--) {
    if (records[i]?.compressionMarker === mode) {
      return records.slice(i)
    }
  }
  return [...records]
}

export class InMemoryRepository implements PipelineRepository {
  /**
   * Every port call made against this repository.
   */
  readonly calls: RepositoryCall[] = []

  readonly files: Array<StoredFile & { content: Buffer }> = []
  readonly attachments: Array<{ sessionId: string; type: AttachmentType; fileIds: number[] }> = []

  private readonly _histories: ScopedHistory[] = []
  private readonly _records: HistoryRecord[] = []
  private readonly _sessionMessages: SessionMessage[] = []
  private readonly _providers = new Map<number, LlmProvider>()
  private readonly _services = new Map<number, LlmService>()
  private readonly _models = new Map<number, LlmProviderModel>()
  private readonly _sourceMaterials = new Map<number, SourceMaterial>()
  private readonly _collections = new Map<number, Collection>()
  private readonly _collectionFiles = new Map<number, CollectionFileInfo[]>()
  private readonly _collectionContent = new Map<number, CollectionContent[]>()
  private readonly _assistants = new Map<number, Assistant>()
  private readonly _participantData = new Map<string, ParticipantData>()
  private readonly _schedules = new Map<string, ParticipantSchedule[]>()
  private _nextId = 1

  // --- Seeding ---

  /**
   * Registers a provider, optionally with a ready-made service (a fake model in tests). Without one,
   * {@link InMemoryRepository.getLlmService} throws.
   */
  addLlmProvider(provider: LlmProvider, service?: LlmService): this {
    this._providers.set(provider.id, provider)
    if (service) this._services.set(provider.id, service)
    return this
  }

  addLlmProviderModel(model: LlmProviderModel): this {
    this._models.set(model.id, model)
    return this
  }

  addSourceMaterial(material: SourceMaterial): this {
    this._sourceMaterials.set(material.id, material)
    return this
  }

  addCollection(
    collection: Collection,
    files: Array<CollectionFileInfo & { content?: string }> = []
  ): this {
    this._collections.set(collection.id, collection)
    this._collectionFiles.set(
      collection.id,
      files.map(({ id, name, summary, contentType }) => ({ id, name, summary, contentType }))
    )
    this._collectionContent.set(
      collection.id,
      files.map((file) => ({ fileId: file.id, fileName: file.name, content: file.content ?? file.summary }))
    )
    return this
  }

  addAssistant(assistant: Assistant): this {
    this._assistants.set(assistant.id, assistant)
    return this
  }

  setParticipantData(session: SessionRef, data: ParticipantData): this {
    this._participantData.set(session.participantId, copyObject(data))
    return this
  }

  setParticipantSchedules(session: SessionRef, schedules: ParticipantSchedule[]): this {
    this._schedules.set(session.participantId, schedules)
    return this
  }

  /**
   * Appends a message to the session's canonical log.
   *
   * @returns The stored message
   */
  addSessionMessage(
    session: SessionRef,
    message: { role: 'user' | 'assistant'; content: string; summary?: string; compressionMarker?: HistoryMode }
  ): SessionMessage {
    const stored: SessionMessage = {
      id: this._nextId++,
      sessionId: session.id,
      role: message.role,
      content: message.content,
      compressionMarker: message.compressionMarker ?? null,
      summary: message.summary ?? null,
      createdAt: new Date(),
    }
    this._sessionMessages.push(stored)
    return stored
  }

  /**
   * Snapshot of the stored records of a scoped history, oldest first.
   */
  scopedRecords(historyId: number): HistoryRecord[] {
    return this._records.filter((record) => record.historyId === historyId).map((record) => ({ ...record }))
  }

  /**
   * Snapshot of the session's canonical log, oldest first.
   */
  sessionMessages(sessionId: string): SessionMessage[] {
    return this._sessionMessages.filter((message) => message.sessionId === sessionId).map((message) => ({ ...message }))
  }

  // --- History ---

  async getOrCreateScopedHistory(session: SessionRef, type: ScopedHistoryType, name: string): Promise<ScopedHistory> {
    this._record('getOrCreateScopedHistory', [session.id, type, name])
    const existing = this._histories.find((h) => h.sessionId === session.id && h.type === type && h.name === name)
    if (existing) return { ...existing }
    const history: ScopedHistory = { id: this._nextId++, sessionId: session.id, type, name }
    this._histories.push(history)
    return { ...history }
  }

  async saveScopedMessage(
    history: ScopedHistory,
    turn: { humanMessage: string; aiMessage: string; nodeId: string }
  ): Promise<HistoryRecord> {
    this._record('saveScopedMessage', [history.id, turn])
    const record: HistoryRecord = {
      id: this._nextId++,
      historyId: history.id,
      nodeId: turn.nodeId,
      humanMessage: turn.humanMessage,
      aiMessage: turn.aiMessage,
      compressionMarker: null,
      summary: null,
      createdAt: new Date(),
    }
    this._records.push(record)
    return { ...record }
  }

  async getScopedMessages(history: ScopedHistory, mode: HistoryMode): Promise<HistoryRecord[]> {
    this._record('getScopedMessages', [history.id, mode])
    return sliceFromCheckpoint(this.scopedRecords(history.id), mode)
  }

  async getSessionMessages(
    session: SessionRef,
    mode: HistoryMode,
    excludeMessageId?: number
  ): Promise<SessionMessage[]> {
    this._record('getSessionMessages', [session.id, mode, excludeMessageId])
    const messages = this.sessionMessages(session.id).filter((message) => message.id !== excludeMessageId)
    return sliceFromCheckpoint(messages, mode)
  }

  async saveCompressionCheckpoint(
    target: CheckpointTarget,
    checkpoint: CompressionCheckpoint,
    mode: HistoryMode
  ): Promise<void> {
    this._record('saveCompressionCheckpoint', [target, checkpoint, mode])
    const record =
      target.scope === 'global'
        ? this._sessionMessages.find((message) => message.id === target.messageId)
        : this._records.find((candidate) => candidate.id === target.recordId)
    if (!record) {
      const entity = target.scope === 'global' ? 'Message' : 'History message'
      throw new RepositoryLookupError(entity, target.scope === 'global' ? target.messageId : target.recordId)
    }
    record.compressionMarker = mode
    if (checkpoint.kind === 'summary') {
      record.summary = checkpoint.text
    }
  }

  // --- Models ---

  async getLlmProvider(providerId: number): Promise<LlmProvider> {
    this._record('getLlmProvider', [providerId])
    return this._lookup(this._providers, providerId, 'LLM provider')
  }

  async getLlmService(providerId: number): Promise<LlmService> {
    this._record('getLlmService', [providerId])
    this._lookup(this._providers, providerId, 'LLM provider')
    const service = this._services.get(providerId)
    if (!service) {
      throw new RepositoryLookupError(
        'LLM service',
        providerId,
        `LLM service for provider ${providerId} not configured`
      )
    }
    return service
  }

  async getLlmProviderModel(modelId: number): Promise<LlmProviderModel> {
    this._record('getLlmProviderModel', [modelId])
    return this._lookup(this._models, modelId, 'LLM provider model')
  }

  // --- Resources ---

  async getSourceMaterial(materialId: number): Promise<SourceMaterial> {
    this._record('getSourceMaterial', [materialId])
    return this._lookup(this._sourceMaterials, materialId, 'Source material')
  }

  async getCollection(collectionId: number): Promise<Collection> {
    this._record('getCollection', [collectionId])
    return this._lookup(this._collections, collectionId, 'Collection')
  }

  async getCollectionsForSearch(collectionIds: readonly number[]): Promise<Collection[]> {
    this._record('getCollectionsForSearch', [collectionIds])
    return collectionIds.flatMap((id) => {
      const collection = this._collections.get(id)
      return collection?.isIndex ? [{ ...collection }] : []
    })
  }

  async getCollectionIndexSummaries(collectionIds: readonly number[]): Promise<CollectionIndexSummary[]> {
    this._record('getCollectionIndexSummaries', [collectionIds])
    return collectionIds.flatMap((id) => {
      const collection = this._collections.get(id)
      return collection ? [{ id: collection.id, name: collection.name, summary: collection.summary }] : []
    })
  }

  async getCollectionFileInfo(collectionId: number): Promise<CollectionFileInfo[]> {
    this._record('getCollectionFileInfo', [collectionId])
    this._lookup(this._collections, collectionId, 'Collection')
    return (this._collectionFiles.get(collectionId) ?? []).map((file) => ({ ...file }))
  }

  async searchCollections(
    collectionIds: readonly number[],
    query: string,
    limit: number
  ): Promise<CollectionSearchHit[]> {
    this._record('searchCollections', [collectionIds, query, limit])
    const terms = query.toLowerCase().split(/\s+/).filter(Boolean)
    const hits: Array<CollectionSearchHit & { score: number }> = []
    for (const collectionId of collectionIds) {
      for (const chunk of this._collectionContent.get(collectionId) ?? []) {
        const text = chunk.content.toLowerCase()
        const score = terms.filter((term) => text.includes(term)).length
        if (score > 0) hits.push({ collectionId, ...chunk, score })
      }
    }
    return hits
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map(({ collectionId, fileId, fileName, content }) => ({ collectionId, fileId, fileName, content }))
  }

  async getAssistant(assistantId: number): Promise<Assistant> {
    this._record('getAssistant', [assistantId])
    return this._lookup(this._assistants, assistantId, 'Assistant')
  }

  // --- Files ---

  async createFile(file: NewFile): Promise<StoredFile> {
    this._record('createFile', [{ name: file.name, contentType: file.contentType, purpose: file.purpose }])
    const stored: StoredFile = {
      id: this._nextId++,
      teamId: file.teamId,
      name: file.name,
      contentType: file.contentType,
      purpose: file.purpose,
      size: file.content.byteLength,
    }
    this.files.push({ ...stored, content: file.content })
    return stored
  }

  async attachFilesToSession(session: SessionRef, type: AttachmentType, fileIds: readonly number[]): Promise<void> {
    this._record('attachFilesToSession', [session.id, type, fileIds])
    this.attachments.push({ sessionId: session.id, type, fileIds: [...fileIds] })
  }

  // --- Participants ---

  async getParticipantGlobalData(session: SessionRef): Promise<ParticipantData> {
    this._record('getParticipantGlobalData', [session.participantId])
    return copyObject(this._participantData.get(session.participantId) ?? {})
  }

  async getParticipantSchedules(session: SessionRef): Promise<ParticipantSchedule[]> {
    this._record('getParticipantSchedules', [session.participantId])
    return (this._schedules.get(session.participantId) ?? []).map((schedule) => ({ ...schedule }))
  }

  private _record(method: keyof PipelineRepository, args: unknown[]): void {
    this.calls.push({ method, args })
  }

  private _lookup<T extends object>(store: Map<number, T>, id: number, entity: string): T {
    const value = store.get(id)
    if (value === undefined) {
      throw new RepositoryLookupError(entity, id)
    }
    return { ...value }
  }
}

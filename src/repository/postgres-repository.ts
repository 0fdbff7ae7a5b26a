/**
 * Postgres-backed {@link PipelineRepository}.
 *
 * Written against the `pg` client. Each call checks a client out of the pool and releases it when done; writes that
 * touch several rows run in a transaction. Rows are validated with zod on the way out.
 */

import pg from 'pg'
import { z } from 'zod'
import { RepositoryLookupError } from '../errors.js'
import { createLlmService } from '../llm/service-factory.js'
import type { LlmService } from '../llm/types.js'
import { createLogger } from '../logging/logger.js'
import { isJSONObject } from '../types/json.js'
import type { ParticipantSchedule, SessionRef } from '../types/session.js'
import type { PipelineRepository } from './pipeline-repository.js'
import { POSTGRES_SCHEMA_DDL } from './schema.js'
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

const log = createLogger('postgres-repository')

/**
 * The part of a `pg` client the repository uses.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>
  release(): void
}

/**
 * The part of a `pg` pool the repository uses.
 */
export interface SqlPool {
  connect(): Promise<SqlClient>
}

export interface PostgresRepositoryOptions {
  /** Connection string, used to create a pool when none is injected. */
  connectionString?: string
  /** Pre-configured pool. */
  pool?: SqlPool
}

const HistoryModeSchema = z.enum(['summarize', 'truncate_tokens', 'max_history_length'])
const ProviderTypeSchema = z.enum(['openai', 'anthropic'])
const id = z.coerce.number().int()

const ScopedHistoryRow = z.object({
  id,
  session_id: z.string(),
  type: z.enum(['node', 'named']),
  name: z.string(),
})

const HistoryRecordRow = z.object({
  id,
  history_id: id,
  node_id: z.string(),
  human_message: z.string(),
  ai_message: z.string(),
  compression_marker: HistoryModeSchema.nullable(),
  summary: z.string().nullable(),
  created_at: z.coerce.date(),
})

const SessionMessageRow = z.object({
  id,
  session_id: z.string(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  compression_marker: HistoryModeSchema.nullable(),
  summary: z.string().nullable(),
  created_at: z.coerce.date(),
})

const LlmProviderRow = z.object({
  id,
  type: ProviderTypeSchema,
  name: z.string(),
  config: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().optional(),
    organization: z.string().optional(),
  }),
})

const LlmProviderModelRow = z.object({
  id,
  type: ProviderTypeSchema,
  name: z.string(),
  max_token_limit: id,
})

const SourceMaterialRow = z.object({ id, topic: z.string(), material: z.string() })

const CollectionRow = z.object({ id, name: z.string(), summary: z.string(), is_index: z.boolean() })

const FileInfoRow = z.object({ id, name: z.string(), summary: z.string(), content_type: z.string() })

const SearchHitRow = z.object({ collection_id: id, file_id: id, file_name: z.string(), content: z.string() })

const StoredFileRow = z.object({
  id,
  team_id: z.string(),
  name: z.string(),
  content_type: z.string(),
  purpose: z.string(),
  size: id,
})

const AssistantRow = z.object({
  id,
  name: z.string(),
  instructions: z.string(),
  llm_provider_id: id,
  llm_provider_model_id: id,
  temperature: z.coerce.number(),
  collection_index_ids: z.array(id),
  citations_enabled: z.boolean(),
})

const ParticipantDataRow = z.object({ data: z.unknown() })

const ScheduleRow = z.object({
  id: z.string(),
  name: z.string(),
  prompt: z.string(),
  next_trigger_date: z.coerce.date().nullable(),
  is_complete: z.boolean(),
})

const HISTORY_RECORD_COLUMNS = 'id, history_id, node_id, human_message, ai_message, compression_marker, summary, created_at'
const SESSION_MESSAGE_COLUMNS = 'id, session_id, role, content, compression_marker, summary, created_at'

export class PostgresRepository implements PipelineRepository {
  private readonly _pool: SqlPool
  private _initPromise: Promise<void> | undefined

  constructor(options: PostgresRepositoryOptions) {
    if (options.pool) {
      this._pool = options.pool
    } else if (options.connectionString) {
      this._pool = new pg.Pool({ connectionString: options.connectionString })
    } else {
      throw new Error('PostgresRepository requires either connectionString or pool')
    }
  }

  /**
   * Creates the tables if they do not exist. Runs once per instance; every other method calls it first.
   */
  async ensureSchema(): Promise<void> {
    this._initPromise ??= this._withClient(async (client) => {
      await client.query(POSTGRES_SCHEMA_DDL)
    }, false)
    try {
      await this._initPromise
    } catch (error) {
      this._initPromise = undefined
      throw error
    }
  }

  // --- History ---

  async getOrCreateScopedHistory(session: SessionRef, type: ScopedHistoryType, name: string): Promise<ScopedHistory> {
    const rows = await this._query(
      `INSERT INTO pipeline_scoped_history (session_id, type, name)
       VALUES ($1, $2, $3)
       ON CONFLICT (session_id, type, name) DO UPDATE SET name = EXCLUDED.name
       RETURNING id, session_id, type, name`,
      [session.id, type, name],
      ScopedHistoryRow
    )
    const row = this._first(rows, 'Scoped history', name)
    return { id: row.id, sessionId: row.session_id, type: row.type, name: row.name }
  }

  async saveScopedMessage(
    history: ScopedHistory,
    turn: { humanMessage: string; aiMessage: string; nodeId: string }
  ): Promise<HistoryRecord> {
    const rows = await this._query(
      `INSERT INTO pipeline_history_record (history_id, node_id, human_message, ai_message)
       VALUES ($1, $2, $3, $4)
       RETURNING ${HISTORY_RECORD_COLUMNS}`,
      [history.id, turn.nodeId, turn.humanMessage, turn.aiMessage],
      HistoryRecordRow
    )
    return toHistoryRecord(this._first(rows, 'Scoped history', history.id))
  }

  async getScopedMessages(history: ScopedHistory, mode: HistoryMode): Promise<HistoryRecord[]> {
    const rows = await this._query(
      `SELECT ${HISTORY_RECORD_COLUMNS}
       FROM pipeline_history_record
       WHERE history_id = $1
         AND id >= COALESCE(
           (SELECT MAX(id) FROM pipeline_history_record WHERE history_id = $1 AND compression_marker = $2), 0)
       ORDER BY id ASC`,
      [history.id, mode],
      HistoryRecordRow
    )
    return rows.map(toHistoryRecord)
  }

  async getSessionMessages(
    session: SessionRef,
    mode: HistoryMode,
    excludeMessageId?: number
  ): Promise<SessionMessage[]> {
    const rows = await this._query(
      `SELECT ${SESSION_MESSAGE_COLUMNS}
       FROM session_message
       WHERE session_id = $1
         AND ($3::integer IS NULL OR id <> $3)
         AND id >= COALESCE(
           (SELECT MAX(id) FROM session_message
            WHERE session_id = $1 AND compression_marker = $2 AND ($3::integer IS NULL OR id <> $3)), 0)
       ORDER BY id ASC`,
      [session.id, mode, excludeMessageId ?? null],
      SessionMessageRow
    )
    return rows.map((row) => ({
      id: row.id,
      sessionId: row.session_id,
      role: row.role,
      content: row.content,
      compressionMarker: row.compression_marker,
      summary: row.summary,
      createdAt: row.created_at,
    }))
  }

  async saveCompressionCheckpoint(
    target: CheckpointTarget,
    checkpoint: CompressionCheckpoint,
    mode: HistoryMode
  ): Promise<void> {
    const table = target.scope === 'global' ? 'session_message' : 'pipeline_history_record'
    const entity = target.scope === 'global' ? 'Session message' : 'History record'
    const recordId = target.scope === 'global' ? target.messageId : target.recordId
    const rows =
      checkpoint.kind === 'summary'
        ? await this._query(
            `UPDATE ${table} SET compression_marker = $2, summary = $3 WHERE id = $1 RETURNING id`,
            [recordId, mode, checkpoint.text],
            z.object({ id })
          )
        : await this._query(
            `UPDATE ${table} SET compression_marker = $2 WHERE id = $1 RETURNING id`,
            [recordId, mode],
            z.object({ id })
          )
    this._first(rows, entity, recordId)
  }

  // --- Models ---

  async getLlmProvider(providerId: number): Promise<LlmProvider> {
    const rows = await this._query(
      'SELECT id, type, name, config FROM llm_provider WHERE id = $1',
      [providerId],
      LlmProviderRow
    )
    const row = this._first(rows, 'LLM provider', providerId)
    const { apiKey, baseUrl, organization } = row.config
    return {
      id: row.id,
      type: row.type,
      name: row.name,
      config: {
        ...(apiKey !== undefined ? { apiKey } : {}),
        ...(baseUrl !== undefined ? { baseUrl } : {}),
        ...(organization !== undefined ? { organization } : {}),
      },
    }
  }

  async getLlmService(providerId: number): Promise<LlmService> {
    return createLlmService(await this.getLlmProvider(providerId))
  }

  async getLlmProviderModel(modelId: number): Promise<LlmProviderModel> {
    const rows = await this._query(
      'SELECT id, type, name, max_token_limit FROM llm_provider_model WHERE id = $1',
      [modelId],
      LlmProviderModelRow
    )
    const row = this._first(rows, 'LLM provider model', modelId)
    return { id: row.id, type: row.type, name: row.name, maxTokenLimit: row.max_token_limit }
  }

  // --- Resources ---

  async getSourceMaterial(materialId: number): Promise<SourceMaterial> {
    const rows = await this._query(
      'SELECT id, topic, material FROM source_material WHERE id = $1',
      [materialId],
      SourceMaterialRow
    )
    return this._first(rows, 'Source material', materialId)
  }

  async getCollection(collectionId: number): Promise<Collection> {
    const rows = await this._query(
      'SELECT id, name, summary, is_index FROM collection WHERE id = $1',
      [collectionId],
      CollectionRow
    )
    return toCollection(this._first(rows, 'Collection', collectionId))
  }

  async getCollectionsForSearch(collectionIds: readonly number[]): Promise<Collection[]> {
    const rows = await this._query(
      'SELECT id, name, summary, is_index FROM collection WHERE id = ANY($1::integer[]) AND is_index ORDER BY id',
      [[...collectionIds]],
      CollectionRow
    )
    return rows.map(toCollection)
  }

  async getCollectionIndexSummaries(collectionIds: readonly number[]): Promise<CollectionIndexSummary[]> {
    const rows = await this._query(
      'SELECT id, name, summary, is_index FROM collection WHERE id = ANY($1::integer[]) ORDER BY id',
      [[...collectionIds]],
      CollectionRow
    )
    return rows.map((row) => ({ id: row.id, name: row.name, summary: row.summary }))
  }

  async getCollectionFileInfo(collectionId: number): Promise<CollectionFileInfo[]> {
    await this.getCollection(collectionId)
    const rows = await this._query(
      `SELECT f.id, f.name, f.summary, f.content_type
       FROM collection_file cf JOIN file f ON f.id = cf.file_id
       WHERE cf.collection_id = $1
       ORDER BY f.id`,
      [collectionId],
      FileInfoRow
    )
    return rows.map((row) => ({ id: row.id, name: row.name, summary: row.summary, contentType: row.content_type }))
  }

  async searchCollections(
    collectionIds: readonly number[],
    query: string,
    limit: number
  ): Promise<CollectionSearchHit[]> {
    const rows = await this._query(
      `SELECT c.collection_id, c.file_id, f.name AS file_name, c.content
       FROM collection_chunk c JOIN file f ON f.id = c.file_id
       WHERE c.collection_id = ANY($1::integer[])
         AND to_tsvector('simple', c.content) @@ plainto_tsquery('simple', $2)
       ORDER BY ts_rank(to_tsvector('simple', c.content), plainto_tsquery('simple', $2)) DESC, c.id
       LIMIT $3`,
      [[...collectionIds], query, limit],
      SearchHitRow
    )
    return rows.map((row) => ({
      collectionId: row.collection_id,
      fileId: row.file_id,
      fileName: row.file_name,
      content: row.content,
    }))
  }

  async getAssistant(assistantId: number): Promise<Assistant> {
    const rows = await this._query(
      `SELECT id, name, instructions, llm_provider_id, llm_provider_model_id, temperature, collection_index_ids,
              citations_enabled
       FROM assistant WHERE id = $1`,
      [assistantId],
      AssistantRow
    )
    const row = this._first(rows, 'Assistant', assistantId)
    return {
      id: row.id,
      name: row.name,
      instructions: row.instructions,
      llmProviderId: row.llm_provider_id,
      llmProviderModelId: row.llm_provider_model_id,
      temperature: row.temperature,
      collectionIndexIds: row.collection_index_ids,
      citationsEnabled: row.citations_enabled,
    }
  }

  // --- Files ---

  async createFile(file: NewFile): Promise<StoredFile> {
    const rows = await this._query(
      `INSERT INTO file (team_id, name, content_type, purpose, size, content)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING id, team_id, name, content_type, purpose, size`,
      [file.teamId, file.name, file.contentType, file.purpose, file.content.byteLength, file.content],
      StoredFileRow
    )
    const row = this._first(rows, 'File', file.name)
    return {
      id: row.id,
      teamId: row.team_id,
      name: row.name,
      contentType: row.content_type,
      purpose: row.purpose,
      size: row.size,
    }
  }

  async attachFilesToSession(session: SessionRef, type: AttachmentType, fileIds: readonly number[]): Promise<void> {
    if (fileIds.length === 0) return
    await this._withClient(async (client) => {
      await client.query('BEGIN')
      try {
        for (const fileId of fileIds) {
          await client.query(
            `INSERT INTO session_file (session_id, file_id, attachment_type)
             VALUES ($1, $2, $3)
             ON CONFLICT DO NOTHING`,
            [session.id, fileId, type]
          )
        }
        await client.query('COMMIT')
      } catch (error) {
        await client.query('ROLLBACK')
        throw error
      }
    })
  }

  // --- Participants ---

  async getParticipantGlobalData(session: SessionRef): Promise<ParticipantData> {
    const rows = await this._query(
      'SELECT data FROM participant_data WHERE participant_id = $1 AND experiment_id = $2',
      [session.participantId, session.experimentId ?? ''],
      ParticipantDataRow
    )
    const data = rows[0]?.data
    if (data !== undefined && !isJSONObject(data)) {
      log.warn('ignoring participant data that is not an object', { participantId: session.participantId })
      return {}
    }
    return data ?? {}
  }

  async getParticipantSchedules(session: SessionRef): Promise<ParticipantSchedule[]> {
    const rows = await this._query(
      `SELECT id, name, prompt, next_trigger_date, is_complete
       FROM participant_schedule
       WHERE participant_id = $1 AND experiment_id = $2
       ORDER BY next_trigger_date ASC NULLS LAST, id`,
      [session.participantId, session.experimentId ?? ''],
      ScheduleRow
    )
    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      prompt: row.prompt,
      nextTriggerDate: row.next_trigger_date ? row.next_trigger_date.toISOString() : null,
      isComplete: row.is_complete,
    }))
  }

  // --- Helpers ---

  private async _query<TRow extends z.ZodType>(
    text: string,
    values: unknown[],
    schema: TRow
  ): Promise<Array<z.output<TRow>>> {
    return this._withClient(async (client) => {
      const result = await client.query(text, values)
      return result.rows.map((row) => schema.parse(row))
    })
  }

  private async _withClient<T>(work: (client: SqlClient) => Promise<T>, initialize = true): Promise<T> {
    if (initialize) {
      await this.ensureSchema()
    }
    const client = await this._pool.connect()
    try {
      return await work(client)
    } finally {
      client.release()
    }
  }

  private _first<T>(rows: readonly T[], entity: string, entityId: number | string): T {
    const [row] = rows
    if (row === undefined) {
      throw new RepositoryLookupError(entity, entityId)
    }
    return row
  }
}

function toHistoryRecord(row: z.output<typeof HistoryRecordRow>): HistoryRecord {
  return {
    id: row.id,
    historyId: row.history_id,
    nodeId: row.node_id,
    humanMessage: row.human_message,
    aiMessage: row.ai_message,
    compressionMarker: row.compression_marker,
    summary: row.summary,
    createdAt: row.created_at,
  }
}

function toCollection(row: z.output<typeof CollectionRow>): Collection {
  return { id: row.id, name: row.name, summary: row.summary, isIndex: row.is_index }
}

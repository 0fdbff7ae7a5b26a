/**
 * Main entry point of the pipeline engine.
 */

// Running pipelines
export { PipelineExecutor, runPipeline } from './pipeline/executor.js'
export type { ExecutorOptions } from './pipeline/executor.js'
export { compilePipeline } from './pipeline/graph.js'
export type { CompiledPipeline, CompileOptions } from './pipeline/graph.js'
export { ValidationCache } from './pipeline/validation-cache.js'
export { RunStatus } from './pipeline/result.js'
export type {
  AbortedRun,
  CompletedRun,
  FailedRun,
  PipelineRunResult,
  RunFailure,
  SuspendedRun,
} from './pipeline/result.js'
export { PipelineDefinitionSchema } from './pipeline/definition.js'
export type {
  EdgeDefinition,
  NodeDefinition,
  ParsedPipelineDefinition,
  PipelineDefinition,
} from './pipeline/definition.js'

// State
export { PipelineState, StateDraft, RESERVED_TEMP_STATE_KEYS } from './pipeline/state.js'
export type { Attachment, NodeOutput, PipelineStateInit, StateUpdate } from './pipeline/state.js'

// Nodes
export { PipelineNode, DEFAULT_OUTPUT_HANDLE } from './nodes/node.js'
export type { NodeContext } from './nodes/node.js'
export { NodeKind, isNodeKind } from './nodes/params.js'
export { createNode } from './nodes/factory.js'
export { StartNode, EndNode, PassthroughNode } from './nodes/boundary.js'
export { LlmResponseNode } from './nodes/llm-response.js'
export { RouterBase, LlmRouterNode, StaticRouterNode, BooleanNode } from './nodes/router.js'
export { CodeNode } from './nodes/code.js'
export { AssistantNode } from './nodes/assistant.js'
export { RenderTemplateNode } from './nodes/render-template.js'
export { ExtractStructuredDataNode, ExtractParticipantDataNode, buildDataSchema } from './nodes/extraction.js'

// Flow control and errors
export {
  FlowControlSignal,
  AbortPipelineSignal,
  WaitForNextInputSignal,
  RequiredOutputsMissingSignal,
  isFlowControlSignal,
} from './flow-control.js'
export {
  RepositoryLookupError,
  PipelineBuildError,
  PipelineNodeBuildError,
  PipelineNodeRunError,
  CodeNodeRunError,
  LlmServiceError,
  normalizeError,
} from './errors.js'

// Repository
export type { PipelineRepository } from './repository/pipeline-repository.js'
export { InMemoryRepository } from './repository/in-memory-repository.js'
export { PostgresRepository } from './repository/postgres-repository.js'
export type { PostgresRepositoryOptions, SqlClient, SqlPool } from './repository/postgres-repository.js'
export { POSTGRES_SCHEMA_DDL } from './repository/schema.js'
export { HistoryMode, HistoryType } from './repository/types.js'
export type {
  Assistant,
  AttachmentType,
  CheckpointTarget,
  Collection,
  CollectionFileInfo,
  CollectionIndexSummary,
  CollectionSearchHit,
  CompressionCheckpoint,
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
} from './repository/types.js'

// History
export { HistoryService } from './history/history-service.js'
export { compressHistory } from './history/compression.js'
export type { CompressionPolicy, CompressionResult, HistoryEntry, Summarizer } from './history/compression.js'
export { createModelSummarizer } from './history/summarizer.js'
export { countTokens, chunkByTokens } from './history/token-count.js'

// Models
export { OpenAIService } from './llm/openai.js'
export type { OpenAIServiceOptions } from './llm/openai.js'
export { AnthropicService } from './llm/anthropic.js'
export type { AnthropicServiceOptions } from './llm/anthropic.js'
export { createLlmService } from './llm/service-factory.js'
export type {
  ChatModel,
  ChatRequest,
  ChatResponse,
  LlmProviderType,
  LlmService,
  ModelMessage,
  ModelParameters,
  StopReason,
  ToolCall,
  ToolSpec,
  Usage,
} from './llm/types.js'

// Tools
export { tool } from './tools/tool.js'
export type { PipelineTool, ToolConfig, ToolContext } from './tools/tool.js'
export { BUILT_IN_TOOL_SLUGS, getBuiltInTools } from './tools/builtins.js'
export type { BuiltInToolSlug } from './tools/builtins.js'
export { createCollectionSearchTool } from './tools/collection-search.js'

// Configuration and logging
export { createEngineConfig, loadEngineConfig, EngineConfigSchema } from './config.js'
export type { EngineConfig, EngineConfigInput } from './config.js'
export { configureLogging } from './logging/logger.js'
export type { Logger } from './logging/types.js'

// Shared types
export type { JSONObject, JSONValue } from './types/json.js'
export type { ChatMessage, PipelineMessage, Role } from './types/messages.js'
export type { ParticipantSchedule, SessionRef } from './types/session.js'

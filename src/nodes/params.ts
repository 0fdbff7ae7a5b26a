/**
 * Parameter schemas, one per node kind.
 */

import { z } from 'zod'
import { BUILT_IN_TOOL_SLUGS } from '../tools/builtins.js'
import { isJSONObject } from '../types/json.js'

/**
 * Node kinds, keyed by the type string used in definitions.
 */
export const NodeKind = {
  START: 'StartNode',
  END: 'EndNode',
  LLM_RESPONSE: 'LLMResponseWithPrompt',
  ROUTER: 'RouterNode',
  STATIC_ROUTER: 'StaticRouterNode',
  BOOLEAN: 'BooleanNode',
  CODE: 'CodeNode',
  ASSISTANT: 'AssistantNode',
  RENDER_TEMPLATE: 'RenderTemplate',
  PASSTHROUGH: 'Passthrough',
  EXTRACT_STRUCTURED_DATA: 'ExtractStructuredData',
  EXTRACT_PARTICIPANT_DATA: 'ExtractParticipantData',
} as const

export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind]

const NODE_KINDS: readonly string[] = Object.values(NodeKind)

export function isNodeKind(value: string): value is NodeKind {
  return NODE_KINDS.includes(value)
}

const id = z.coerce.number().int().positive()

const ModelParametersSchema = z
  .object({
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().int().positive().optional(),
    topP: z.number().min(0).max(1).optional(),
  })
  .default({})

const LlmSchema = z.object({
  llmProviderId: id,
  llmProviderModelId: id,
  llmModelParameters: ModelParametersSchema,
})

const HistorySchema = z.object({
  historyType: z.enum(['global', 'node', 'named', 'none']).default('none'),
  historyName: z.string().min(1).optional(),
  historyMode: z.enum(['summarize', 'truncate_tokens', 'max_history_length']).default('summarize'),
  maxHistoryLength: z.number().int().positive().default(10),
  userMaxTokenLimit: z.number().int().positive().optional(),
})

function requireHistoryName(params: { historyType: string; historyName?: string | undefined }): boolean {
  return params.historyType !== 'named' || params.historyName !== undefined
}

const HISTORY_NAME_ISSUE = { message: 'A history name is required for named history', path: ['historyName'] }

const KeywordsSchema = z.object({
  keywords: z
    .array(z.string().trim().min(1, 'Keywords cannot be empty'))
    .min(1)
    .transform((keywords) => keywords.map((keyword) => keyword.toUpperCase()))
    .refine((keywords) => new Set(keywords).size === keywords.length, 'Keywords must be unique'),
  defaultKeywordIndex: z.number().int().min(0).default(0),
  tagOutputMessage: z.boolean().default(false),
})

function defaultIndexInRange(params: { keywords: string[]; defaultKeywordIndex: number }): boolean {
  return params.defaultKeywordIndex < params.keywords.length
}

const DEFAULT_INDEX_ISSUE = { message: 'Default keyword index is out of range', path: ['defaultKeywordIndex'] }

export const LlmResponseParamsSchema = LlmSchema.extend(HistorySchema.shape)
  .extend({
    prompt: z.string().default('You are a helpful assistant. Answer the user.'),
    sourceMaterialId: id.optional(),
    collectionId: id.optional(),
    collectionIndexIds: z.array(id).default([]),
    tools: z.array(z.enum(BUILT_IN_TOOL_SLUGS)).default([]),
    generateCitations: z.boolean().default(true),
  })
  .refine(requireHistoryName, HISTORY_NAME_ISSUE)

export const RouterParamsSchema = LlmSchema.extend(HistorySchema.shape)
  .extend(KeywordsSchema.shape)
  .extend({
    prompt: z.string().default('Classify the user input.'),
  })
  .refine(requireHistoryName, HISTORY_NAME_ISSUE)
  .refine(defaultIndexInRange, DEFAULT_INDEX_ISSUE)

export const StaticRouterParamsSchema = KeywordsSchema.extend({
  dataSource: z.enum(['participant_data', 'temp_state', 'session_state']).default('participant_data'),
  routeKey: z.string().min(1),
}).refine(defaultIndexInRange, DEFAULT_INDEX_ISSUE)

export const BooleanParamsSchema = z.object({
  inputEquals: z.string(),
})

export const CodeParamsSchema = z.object({
  code: z.string().default(''),
})

export const AssistantParamsSchema = z.object({
  assistantId: id,
  inputFormatter: z
    .string()
    .refine((formatter) => formatter.includes('{input}'), 'The input formatter must contain {input}')
    .optional(),
  citationsEnabled: z.boolean().default(true),
})

export const RenderTemplateParamsSchema = z.object({
  templateString: z.string().min(1),
})

const DataSchemaSchema = z
  .string()
  .default('{"name": "the name of the user"}')
  .refine((source) => {
    const parsed = parseJson(source)
    return isJSONObject(parsed) && Object.keys(parsed).length > 0
  }, 'Invalid schema')

export const ExtractStructuredDataParamsSchema = LlmSchema.extend({
  dataSchema: DataSchemaSchema,
})

export const ExtractParticipantDataParamsSchema = ExtractStructuredDataParamsSchema.extend({
  /** Participant data key the extracted object is stored under. Empty merges into the top level. */
  keyName: z.string().default(''),
})

function parseJson(source: string): unknown {
  try {
    return JSON.parse(source)
  } catch {
    return undefined
  }
}

export type LlmResponseParams = z.output<typeof LlmResponseParamsSchema>
export type RouterParams = z.output<typeof RouterParamsSchema>
export type StaticRouterParams = z.output<typeof StaticRouterParamsSchema>
export type BooleanParams = z.output<typeof BooleanParamsSchema>
export type CodeParams = z.output<typeof CodeParamsSchema>
export type AssistantParams = z.output<typeof AssistantParamsSchema>
export type RenderTemplateParams = z.output<typeof RenderTemplateParamsSchema>
export type ExtractStructuredDataParams = z.output<typeof ExtractStructuredDataParamsSchema>
export type ExtractParticipantDataParams = z.output<typeof ExtractParticipantDataParamsSchema>

/**
 * Settings shared by nodes that call a model.
 */
export type LlmSettings = z.output<typeof LlmSchema>

/**
 * Settings shared by nodes that keep history.
 */
export type HistoryParams = z.output<typeof HistorySchema>

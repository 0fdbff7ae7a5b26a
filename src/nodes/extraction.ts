/**
 * Nodes that extract structured data from their input with a model.
 *
 * The data schema is a JSON object mapping each field to its description, e.g.
 * `{"name": "the user's name", "pets": [{"name": "the pet's name"}]}`. A list holding one object describes a list
 * of such objects. The input is split into chunks that fit the model's context; each chunk is sent with the data
 * extracted so far, and the model answers by calling a tool whose input schema is built from the data schema.
 */

import { z } from 'zod'
import { PipelineNodeBuildError, PipelineNodeRunError, normalizeError } from '../errors.js'
import { chunkByTokens, countTextTokens } from '../history/token-count.js'
import { createLogger } from '../logging/logger.js'
import type { ChatModel, ChatRequest, ToolCall, ToolSpec } from '../llm/types.js'
import type { StateUpdate } from '../pipeline/state.js'
import type { ValidationCache } from '../pipeline/validation-cache.js'
import { isJSONObject, stringifyValue, toJSONValue, type JSONObject, type JSONValue } from '../types/json.js'
import { assistantMessage, userMessage } from '../types/messages.js'
import { formatZodError, zodSchemaToJsonSchema } from '../utils/zod.js'
import { ModelServiceResolver } from './model-service.js'
import { PipelineNode, type NodeContext } from './node.js'
import { modelTokenLimit } from './node-history.js'
import {
  NodeKind,
  type ExtractParticipantDataParams,
  type ExtractStructuredDataParams,
  type LlmSettings,
} from './params.js'

const log = createLogger('extraction')

export const EXTRACTION_TOOL_NAME = 'extract_data'

const CHUNK_OVERLAP_RATIO = 0.2

type DataShape = Record<string, z.ZodType>

/**
 * Builds the zod schema a data schema describes. Described fields are nullable strings; nulls are dropped from the
 * extracted data so they never overwrite known values.
 *
 * @throws Error naming the first field that is neither a description nor a list holding one object
 */
export function buildDataSchema(description: JSONObject): z.ZodObject<DataShape> {
  const shape: DataShape = {}
  for (const [key, value] of Object.entries(description)) {
    if (typeof value === 'string') {
      shape[key] = z.string().nullable().describe(value)
      continue
    }
    const [item] = Array.isArray(value) ? value : []
    if (Array.isArray(value) && value.length === 1 && isJSONObject(item)) {
      shape[key] = z.array(buildDataSchema(item)).describe(`A list of ${key}`)
      continue
    }
    throw new Error(`Field '${key}' must be a description or a list holding one object`)
  }
  return z.object(shape)
}

/**
 * Extraction prompt for the data gathered so far.
 */
export function extractionPrompt(reference: JSONValue): string {
  return (
    'Extract user data using the current user data and conversation history as reference. ' +
    `Answer by calling the ${EXTRACTION_TOOL_NAME} tool.\n` +
    `Current user data:\n${stringifyValue(reference)}\n` +
    "The conversation history should carry more weight in the outcome. It can change the user's current data."
  )
}

abstract class ExtractionNode<TParams extends LlmSettings & { dataSchema: string }> extends PipelineNode<TParams> {
  validate(cache: ValidationCache): void {
    cache.getOrCompute('data-schema', this.params.dataSchema, () => this._schema(), isZodObject)
  }

  /**
   * Data the first chunk is extracted against.
   */
  protected abstract referenceData(context: NodeContext): JSONValue

  /**
   * Combines the data extracted from one chunk with the initial reference data.
   */
  protected abstract merge(extracted: JSONObject, reference: JSONValue): JSONValue

  /**
   * Turns the final data into the node's update.
   */
  protected abstract finish(context: NodeContext, data: JSONValue): StateUpdate

  protected async handle(context: NodeContext): Promise<StateUpdate> {
    const { config, input } = context
    const { model, providerModel } = await new ModelServiceResolver(this.repository, this.id, this.params).resolve()
    const schema = this._schema()
    const tool: ToolSpec = {
      name: EXTRACTION_TOOL_NAME,
      description: 'Records the extracted user data.',
      inputSchema: zodSchemaToJsonSchema(schema),
    }

    const reference = this.referenceData(context)
    const promptTokens =
      countTextTokens(extractionPrompt(reference)) + countTextTokens(JSON.stringify(tool.inputSchema))
    const chunkTokens = modelTokenLimit(providerModel, config) - promptTokens
    if (chunkTokens <= 0) {
      throw new PipelineNodeBuildError(this.id, 'The extraction prompt does not fit the model token limit')
    }
    const chunks = chunkByTokens(input, chunkTokens, Math.floor(chunkTokens * CHUNK_OVERLAP_RATIO))
    log.debug('extracting data', { nodeId: this.id, chunks: chunks.length, chunkTokens })

    let data = reference
    for (const chunk of chunks) {
      const request: ChatRequest = {
        systemPrompt: extractionPrompt(data),
        messages: [userMessage(chunk)],
        tools: [tool],
      }
      const extracted = await this._extract(model, request, schema)
      data = this.merge(extracted, reference)
    }
    return this.finish(context, data)
  }

  private async _extract(
    model: ChatModel,
    request: ChatRequest,
    schema: z.ZodObject<DataShape>
  ): Promise<JSONObject> {
    let call = await this._invoke(model, request)
    if (!call.toolCall) {
      call = await this._invoke(model, {
        ...request,
        messages: [
          ...request.messages,
          assistantMessage(call.text),
          userMessage(`You must call the ${EXTRACTION_TOOL_NAME} tool with the extracted data.`),
        ],
      })
    }
    if (!call.toolCall) {
      throw new PipelineNodeRunError(this.id, 'The model did not return structured data')
    }

    const parsed = schema.safeParse(call.toolCall.input)
    if (!parsed.success) {
      throw new PipelineNodeRunError(
        this.id,
        `Extracted data does not match the schema: ${formatZodError(parsed.error)}`
      )
    }
    const data = toJSONValue(parsed.data, EXTRACTION_TOOL_NAME)
    const extracted: JSONObject = {}
    if (isJSONObject(data)) {
      for (const [key, value] of Object.entries(data)) {
        if (value !== null) extracted[key] = value
      }
    }
    return extracted
  }

  private async _invoke(model: ChatModel, request: ChatRequest): Promise<{ text: string; toolCall?: ToolCall }> {
    try {
      const response = await model.invoke(request)
      const toolCall = response.toolCalls.find((call) => call.name === EXTRACTION_TOOL_NAME)
      return toolCall ? { text: response.text, toolCall } : { text: response.text }
    } catch (error) {
      const cause = normalizeError(error)
      throw new PipelineNodeRunError(this.id, `Model call failed: ${cause.message}`, { cause })
    }
  }

  private _schema(): z.ZodObject<DataShape> {
    const description: unknown = JSON.parse(this.params.dataSchema)
    if (!isJSONObject(description)) {
      throw new PipelineNodeBuildError(this.id, 'Invalid schema')
    }
    try {
      return buildDataSchema(description)
    } catch (error) {
      throw new PipelineNodeBuildError(this.id, `Invalid schema: ${normalizeError(error).message}`)
    }
  }
}

function isZodObject(value: unknown): value is z.ZodObject<DataShape> {
  return value instanceof z.ZodObject
}

/**
 * Outputs the extracted data as JSON.
 */
export class ExtractStructuredDataNode extends ExtractionNode<ExtractStructuredDataParams> {
  readonly kind = NodeKind.EXTRACT_STRUCTURED_DATA

  protected referenceData(): JSONValue {
    return {}
  }

  protected merge(extracted: JSONObject): JSONValue {
    return extracted
  }

  protected finish(_context: NodeContext, data: JSONValue): StateUpdate {
    return { output: JSON.stringify(data) }
  }
}

/**
 * Merges the extracted data into the participant data and passes its input through.
 *
 * With `keyName` set, the data under that key is the reference and the result is stored back under it.
 */
export class ExtractParticipantDataNode extends ExtractionNode<ExtractParticipantDataParams> {
  readonly kind = NodeKind.EXTRACT_PARTICIPANT_DATA

  protected referenceData({ state }: NodeContext): JSONValue {
    if (this.params.keyName === '') return state.participantData
    return state.participantData[this.params.keyName] ?? ''
  }

  protected merge(extracted: JSONObject, reference: JSONValue): JSONValue {
    return isJSONObject(reference) ? { ...reference, ...extracted } : extracted
  }

  protected finish({ state, input }: NodeContext, data: JSONValue): StateUpdate {
    const update: JSONObject =
      this.params.keyName !== '' ? { [this.params.keyName]: data } : isJSONObject(data) ? data : {}
    return { output: input, participantData: { ...state.participantData, ...update } }
  }
}

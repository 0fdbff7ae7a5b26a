/**
 * Tools a response node can bind to its model.
 *
 * A tool validates its input with a Zod schema, which also produces the JSON schema sent to the model. Tools write
 * their effects into the node's {@link StateDraft}; they never touch the pipeline state directly.
 */

import type { z } from 'zod'
import type { ToolSpec } from '../llm/types.js'
import type { StateDraft } from '../pipeline/state.js'
import type { PipelineRepository } from '../repository/pipeline-repository.js'
import type { JSONValue } from '../types/json.js'
import type { SessionRef } from '../types/session.js'
import { zodSchemaToJsonSchema } from '../utils/zod.js'

/**
 * What a tool can reach while it runs.
 */
export interface ToolContext {
  draft: StateDraft
  repository: PipelineRepository
  session: SessionRef
}

export interface PipelineTool {
  readonly name: string
  readonly description: string
  readonly toolSpec: ToolSpec

  /**
   * Validates the input and runs the tool.
   *
   * @throws ZodError when the input does not match the schema
   */
  invoke(input: unknown, context: ToolContext): Promise<JSONValue>
}

/**
 * Configuration for creating a Zod-based tool.
 *
 * @typeParam TInput - Zod schema type for input validation
 */
export interface ToolConfig<TInput extends z.ZodType> {
  name: string
  description: string
  inputSchema: TInput
  callback: (input: z.infer<TInput>, context: ToolContext) => Promise<JSONValue> | JSONValue
}

class ZodTool<TInput extends z.ZodType> implements PipelineTool {
  readonly name: string
  readonly description: string
  readonly toolSpec: ToolSpec
  private readonly _inputSchema: TInput
  private readonly _callback: ToolConfig<TInput>['callback']

  constructor(config: ToolConfig<TInput>) {
    this.name = config.name
    this.description = config.description
    this._inputSchema = config.inputSchema
    this._callback = config.callback
    this.toolSpec = {
      name: config.name,
      description: config.description,
      inputSchema: zodSchemaToJsonSchema(config.inputSchema),
    }
  }

  async invoke(input: unknown, context: ToolContext): Promise<JSONValue> {
    const validatedInput = this._inputSchema.parse(input)
    return await this._callback(validatedInput, context)
  }
}

/**
 * Creates a tool from a Zod schema and callback function.
 *
 * @example
 * ```typescript
 * const echo = tool({
 *   name: 'echo',
 *   description: 'Repeats the text',
 *   inputSchema: z.object({ text: z.string() }),
 *   callback: (input) => input.text,
 * })
 * ```
 *
 * @param config - Tool configuration
 * @returns The tool
 */
export function tool<TInput extends z.ZodType>(config: ToolConfig<TInput>): PipelineTool {
  return new ZodTool(config)
}

/**
 * Renders a tool result as the text returned to the model.
 */
export function formatToolResult(result: JSONValue): string {
  return typeof result === 'string' ? result : JSON.stringify(result)
}

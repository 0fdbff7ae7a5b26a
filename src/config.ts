/**
 * Engine configuration.
 *
 * Values come from an explicit object or from `PIPELINE_*` environment variables and are validated with zod.
 */

import { z } from 'zod'

const DEFAULT_LLM_ERROR_REPLY = 'Sorry, something went wrong while generating a response.'

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

/**
 * Schema of {@link EngineConfig}.
 */
export const EngineConfigSchema = z.object({
  /** Upper bound on model calls that request tools within one node execution. */
  maxToolIterations: z.number().int().min(0).default(5),
  /** Time budget for one code node invocation. */
  codeTimeoutMs: z.number().int().positive().default(5000),
  /** Reply used by response nodes whose model call failed, when {@link replyOnLlmError} is on. */
  llmErrorReply: z.string().min(1).default(DEFAULT_LLM_ERROR_REPLY),
  replyOnLlmError: z.boolean().default(true),
  /** Cap on nodes run concurrently within one step; unbounded when absent. */
  maxParallelNodes: z.number().int().positive().optional(),
  /** Token limit for history when neither the node nor the provider model supplies one. */
  defaultTokenLimit: z.number().int().positive().default(8192),
})

export type EngineConfig = z.infer<typeof EngineConfigSchema>

/**
 * Input accepted by {@link createEngineConfig}; every field is optional.
 */
export type EngineConfigInput = z.input<typeof EngineConfigSchema>

/**
 * Validates a configuration object and fills in defaults.
 *
 * @param input - Partial configuration
 * @returns The complete configuration
 * @throws ZodError when a value is out of range
 */
export function createEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  return EngineConfigSchema.parse(input)
}

const EnvSchema = z.object({
  PIPELINE_MAX_TOOL_ITERATIONS: z.coerce.number().int().optional(),
  PIPELINE_CODE_TIMEOUT_MS: z.coerce.number().int().optional(),
  PIPELINE_LLM_ERROR_REPLY: z.string().optional(),
  PIPELINE_REPLY_ON_LLM_ERROR: booleanFromEnv.optional(),
  PIPELINE_MAX_PARALLEL_NODES: z.coerce.number().int().optional(),
  PIPELINE_DEFAULT_TOKEN_LIMIT: z.coerce.number().int().optional(),
})

/**
 * Reads the configuration from environment variables.
 *
 * @param env - Environment to read, `process.env` by default
 * @returns The complete configuration
 * @throws ZodError when a variable is malformed
 */
export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = EnvSchema.parse(env)
  return createEngineConfig({
    ...(parsed.PIPELINE_MAX_TOOL_ITERATIONS !== undefined
      ? { maxToolIterations: parsed.PIPELINE_MAX_TOOL_ITERATIONS }
      : {}),
    ...(parsed.PIPELINE_CODE_TIMEOUT_MS !== undefined ? { codeTimeoutMs: parsed.PIPELINE_CODE_TIMEOUT_MS } : {}),
    ...(parsed.PIPELINE_LLM_ERROR_REPLY !== undefined ? { llmErrorReply: parsed.PIPELINE_LLM_ERROR_REPLY } : {}),
    ...(parsed.PIPELINE_REPLY_ON_LLM_ERROR !== undefined
      ? { replyOnLlmError: parsed.PIPELINE_REPLY_ON_LLM_ERROR }
      : {}),
    ...(parsed.PIPELINE_MAX_PARALLEL_NODES !== undefined
      ? { maxParallelNodes: parsed.PIPELINE_MAX_PARALLEL_NODES }
      : {}),
    ...(parsed.PIPELINE_DEFAULT_TOKEN_LIMIT !== undefined
      ? { defaultTokenLimit: parsed.PIPELINE_DEFAULT_TOKEN_LIMIT }
      : {}),
  })
}

import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'
import { createEngineConfig, loadEngineConfig } from '../config.js'

describe('createEngineConfig', () => {
  it('fills in defaults', () => {
    expect(createEngineConfig()).toStrictEqual({
      maxToolIterations: 5,
      codeTimeoutMs: 5000,
      llmErrorReply: 'Sorry, something went wrong while generating a response.',
      replyOnLlmError: true,
      defaultTokenLimit: 8192,
    })
  })

  it('keeps explicit values', () => {
    const config = createEngineConfig({ maxToolIterations: 2, maxParallelNodes: 4, replyOnLlmError: false })

    expect(config.maxToolIterations).toBe(2)
    expect(config.maxParallelNodes).toBe(4)
    expect(config.replyOnLlmError).toBe(false)
  })

  it('rejects out-of-range values', () => {
    expect(() => createEngineConfig({ codeTimeoutMs: 0 })).toThrow(ZodError)
  })
})

describe('loadEngineConfig', () => {
  it('reads PIPELINE_ variables', () => {
    const config = loadEngineConfig({
      PIPELINE_MAX_TOOL_ITERATIONS: '3',
      PIPELINE_CODE_TIMEOUT_MS: '250',
      PIPELINE_LLM_ERROR_REPLY: 'Try again later.',
      PIPELINE_REPLY_ON_LLM_ERROR: '0',
      PIPELINE_MAX_PARALLEL_NODES: '2',
      PIPELINE_DEFAULT_TOKEN_LIMIT: '4000',
    })

    expect(config).toStrictEqual({
      maxToolIterations: 3,
      codeTimeoutMs: 250,
      llmErrorReply: 'Try again later.',
      replyOnLlmError: false,
      maxParallelNodes: 2,
      defaultTokenLimit: 4000,
    })
  })

  it('ignores unrelated variables', () => {
    expect(loadEngineConfig({ HOME: '/root' })).toStrictEqual(createEngineConfig())
  })

  it('rejects malformed booleans', () => {
    expect(() => loadEngineConfig({ PIPELINE_REPLY_ON_LLM_ERROR: 'yes' })).toThrow(ZodError)
  })
})

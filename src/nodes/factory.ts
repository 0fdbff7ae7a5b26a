import type { z } from 'zod'
import { PipelineBuildError, PipelineNodeBuildError } from '../errors.js'
import type { NodeDefinition } from '../pipeline/definition.js'
import { formatZodError } from '../utils/zod.js'
import { AssistantNode } from './assistant.js'
import { EndNode, PassthroughNode, StartNode } from './boundary.js'
import { CodeNode } from './code.js'
import { ExtractParticipantDataNode, ExtractStructuredDataNode } from './extraction.js'
import { LlmResponseNode } from './llm-response.js'
import type { PipelineNode } from './node.js'
import {
  AssistantParamsSchema,
  BooleanParamsSchema,
  CodeParamsSchema,
  ExtractParticipantDataParamsSchema,
  ExtractStructuredDataParamsSchema,
  LlmResponseParamsSchema,
  NodeKind,
  RenderTemplateParamsSchema,
  RouterParamsSchema,
  StaticRouterParamsSchema,
  isNodeKind,
} from './params.js'
import { RenderTemplateNode } from './render-template.js'
import { BooleanNode, LlmRouterNode, StaticRouterNode } from './router.js'

/**
 * Instantiates the node a definition describes, validating its parameters.
 *
 * @throws PipelineBuildError when the type is unknown
 * @throws PipelineNodeBuildError when the parameters do not match the type's schema
 */
export function createNode(definition: NodeDefinition): PipelineNode {
  const { id, data } = definition
  const name = data.name ?? id
  const type = data.type
  if (!isNodeKind(type)) {
    throw new PipelineBuildError(`Unknown node type '${type}'`, id)
  }

  switch (type) {
    case NodeKind.START:
      return new StartNode(id, name, {})
    case NodeKind.END:
      return new EndNode(id, name, {})
    case NodeKind.PASSTHROUGH:
      return new PassthroughNode(id, name, {})
    case NodeKind.LLM_RESPONSE:
      return new LlmResponseNode(id, name, parseParams(id, LlmResponseParamsSchema, data.params))
    case NodeKind.ROUTER:
      return new LlmRouterNode(id, name, parseParams(id, RouterParamsSchema, data.params))
    case NodeKind.STATIC_ROUTER:
      return new StaticRouterNode(id, name, parseParams(id, StaticRouterParamsSchema, data.params))
    case NodeKind.BOOLEAN:
      return new BooleanNode(id, name, parseParams(id, BooleanParamsSchema, data.params))
    case NodeKind.CODE:
      return new CodeNode(id, name, parseParams(id, CodeParamsSchema, data.params))
    case NodeKind.ASSISTANT:
      return new AssistantNode(id, name, parseParams(id, AssistantParamsSchema, data.params))
    case NodeKind.RENDER_TEMPLATE:
      return new RenderTemplateNode(id, name, parseParams(id, RenderTemplateParamsSchema, data.params))
    case NodeKind.EXTRACT_STRUCTURED_DATA:
      return new ExtractStructuredDataNode(id, name, parseParams(id, ExtractStructuredDataParamsSchema, data.params))
    case NodeKind.EXTRACT_PARTICIPANT_DATA:
      return new ExtractParticipantDataNode(id, name, parseParams(id, ExtractParticipantDataParamsSchema, data.params))
    default: {
      const unreachable: never = type
      throw new PipelineBuildError(`Unknown node type '${String(unreachable)}'`, id)
    }
  }
}

function parseParams<TSchema extends z.ZodType>(nodeId: string, schema: TSchema, params: unknown): z.output<TSchema> {
  const result = schema.safeParse(params)
  if (!result.success) {
    throw new PipelineNodeBuildError(nodeId, `Invalid parameters: ${formatZodError(result.error)}`)
  }
  return result.data
}

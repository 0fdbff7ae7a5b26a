/**
 * Serialized pipeline definition, as produced by the authoring layer.
 *
 * `position` and `viewport` belong to the editor; they are accepted and carried through untouched.
 */

import { z } from 'zod'

export const NodeDefinitionSchema = z.object({
  id: z.string().min(1),
  type: z.string().optional(),
  position: z.unknown().optional(),
  data: z.object({
    type: z.string().min(1),
    label: z.string().optional(),
    name: z.string().min(1).optional(),
    params: z.record(z.string(), z.unknown()).default({}),
  }),
})

export const EdgeDefinitionSchema = z.object({
  id: z.string().min(1),
  source: z.string().min(1),
  sourceHandle: z
    .string()
    .nullish()
    .transform((handle) => handle ?? 'output'),
  target: z.string().min(1),
  targetHandle: z.string().nullish(),
})

export const PipelineDefinitionSchema = z.object({
  nodes: z.array(NodeDefinitionSchema),
  edges: z.array(EdgeDefinitionSchema).default([]),
  viewport: z.unknown().optional(),
})

/**
 * Definition as accepted by the compiler.
 */
export type PipelineDefinition = z.input<typeof PipelineDefinitionSchema>

/**
 * Definition after validation and defaults.
 */
export type ParsedPipelineDefinition = z.output<typeof PipelineDefinitionSchema>
export type NodeDefinition = z.output<typeof NodeDefinitionSchema>
export type EdgeDefinition = z.output<typeof EdgeDefinitionSchema>

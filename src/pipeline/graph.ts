/**
 * Compiles a definition into an executable graph.
 *
 * Compilation is pure: it reads no repository and performs no model calls, so a definition can be validated when it
 * is saved and again before every run.
 */

import { PipelineBuildError } from '../errors.js'
import { createNode } from '../nodes/factory.js'
import type { PipelineNode } from '../nodes/node.js'
import { NodeKind, isNodeKind } from '../nodes/params.js'
import { RouterBase } from '../nodes/router.js'
import { formatZodError } from '../utils/zod.js'
import {
  PipelineDefinitionSchema,
  type EdgeDefinition,
  type NodeDefinition,
  type PipelineDefinition,
} from './definition.js'
import { ValidationCache } from './validation-cache.js'

export interface CompiledPipeline {
  /** Reachable nodes by id. */
  readonly nodes: ReadonlyMap<string, PipelineNode>
  /** Node ids in a topological order. */
  readonly order: readonly string[]
  readonly edges: readonly EdgeDefinition[]
  readonly incoming: ReadonlyMap<string, readonly EdgeDefinition[]>
  readonly outgoing: ReadonlyMap<string, readonly EdgeDefinition[]>
  readonly startId: string
  readonly endId: string
  /** Editor viewport, carried through. */
  readonly viewport: unknown
}

export interface CompileOptions {
  /** Shared cache for validation work; a fresh one is used per call when absent. */
  cache?: ValidationCache
}

/**
 * Validates a definition and builds its graph.
 *
 * @throws PipelineBuildError for structural problems
 * @throws PipelineNodeBuildError for a misconfigured node
 */
export function compilePipeline(definition: PipelineDefinition, options: CompileOptions = {}): CompiledPipeline {
  const parsed = PipelineDefinitionSchema.safeParse(definition)
  if (!parsed.success) {
    throw new PipelineBuildError(`Invalid pipeline definition: ${formatZodError(parsed.error)}`)
  }
  const { nodes: nodeDefinitions, edges, viewport } = parsed.data

  const byId = new Map<string, NodeDefinition>()
  for (const node of nodeDefinitions) {
    if (byId.has(node.id)) {
      throw new PipelineBuildError(`Duplicate node id '${node.id}'`, node.id)
    }
    if (!isNodeKind(node.data.type)) {
      throw new PipelineBuildError(`Unknown node type '${node.data.type}'`, node.id)
    }
    byId.set(node.id, node)
  }

  for (const edge of edges) {
    for (const endpoint of [edge.source, edge.target]) {
      if (!byId.has(endpoint)) {
        throw new PipelineBuildError(`Edge '${edge.id}' references unknown node '${endpoint}'`, edge.id)
      }
    }
  }

  const startId = singleOfType(nodeDefinitions, NodeKind.START, 'Start')
  const endId = singleOfType(nodeDefinitions, NodeKind.END, 'End')

  const reachable = reachableFrom(startId, edges)
  if (!reachable.has(endId)) {
    throw new PipelineBuildError('The End node is not reachable from the Start node', endId)
  }
  const liveEdges = edges.filter((edge) => reachable.has(edge.source) && reachable.has(edge.target))
  const order = topologicalOrder([...reachable], liveEdges)

  const nodes = new Map<string, PipelineNode>()
  for (const id of order) {
    const definitionForId = byId.get(id)
    if (definitionForId) {
      nodes.set(id, createNode(definitionForId))
    }
  }

  const incoming = groupBy(liveEdges, (edge) => edge.target)
  const outgoing = groupBy(liveEdges, (edge) => edge.source)
  for (const [id, node] of nodes) {
    checkHandles(node, outgoing.get(id) ?? [])
  }

  const cache = options.cache ?? new ValidationCache()
  for (const node of nodes.values()) {
    node.validate(cache)
  }

  return { nodes, order, edges: liveEdges, incoming, outgoing, startId, endId, viewport }
}

function singleOfType(nodes: readonly NodeDefinition[], type: string, label: string): string {
  const matches = nodes.filter((node) => node.data.type === type)
  const [first] = matches
  if (matches.length !== 1 || !first) {
    throw new PipelineBuildError(`There should be exactly 1 ${label} node`)
  }
  return first.id
}

function reachableFrom(startId: string, edges: readonly EdgeDefinition[]): Set<string> {
  const seen = new Set<string>([startId])
  const queue = [startId]
  for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
    for (const edge of edges) {
      if (edge.source === current && !seen.has(edge.target)) {
        seen.add(edge.target)
        queue.push(edge.target)
      }
    }
  }
  return seen
}

function topologicalOrder(ids: readonly string[], edges: readonly EdgeDefinition[]): string[] {
  const inDegree = new Map(ids.map((id) => [id, 0]))
  for (const edge of edges) {
    inDegree.set(edge.target, (inDegree.get(edge.target) ?? 0) + 1)
  }
  const ready = ids.filter((id) => inDegree.get(id) === 0)
  const order: string[] = []
  for (let current = ready.shift(); current !== undefined; current = ready.shift()) {
    order.push(current)
    for (const edge of edges) {
      if (edge.source !== current) continue
      const remaining = (inDegree.get(edge.target) ?? 0) - 1
      inDegree.set(edge.target, remaining)
      if (remaining === 0) ready.push(edge.target)
    }
  }
  if (order.length !== ids.length) {
    const cyclic = ids.find((id) => !order.includes(id))
    throw new PipelineBuildError('A cycle was detected', cyclic)
  }
  return order
}

function checkHandles(node: PipelineNode, edges: readonly EdgeDefinition[]): void {
  const handles = node.outputHandles
  const used = new Set<string>()
  for (const edge of edges) {
    if (!handles.includes(edge.sourceHandle)) {
      throw new PipelineBuildError(`Node '${node.id}' has no output '${edge.sourceHandle}'`, edge.id)
    }
    if (node.isRouter && used.has(edge.sourceHandle)) {
      throw new PipelineBuildError('Multiple edges connected to the same output', node.id)
    }
    used.add(edge.sourceHandle)
  }
  const fallback = node.defaultHandle
  if (fallback !== undefined && !used.has(fallback)) {
    throw new PipelineBuildError(`The default output '${fallback}' of node '${node.id}' must be connected`, node.id)
  }
  if (node instanceof RouterBase) {
    node.connectOutputs(used)
  }
}

function groupBy<T>(items: readonly T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>()
  for (const item of items) {
    const group = groups.get(key(item))
    if (group) {
      group.push(item)
    } else {
      groups.set(key(item), [item])
    }
  }
  return groups
}

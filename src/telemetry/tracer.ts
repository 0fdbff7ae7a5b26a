/**
 * OpenTelemetry tracing for pipeline runs.
 *
 * One span per run and one child span per node execution. Without a registered SDK the `\@opentelemetry/api` calls
 * are no-ops.
 */

import { SpanKind, SpanStatusCode, context, trace, type Span, type Tracer } from '@opentelemetry/api'
import { createLogger } from '../logging/logger.js'

const log = createLogger('telemetry')

const TRACER_NAME = 'dialog-pipelines'

export type AttributeValue = string | number | boolean

export interface RunSpanParams {
  sessionId: string
  teamId: string
  nodeCount: number
}

export interface NodeSpanParams {
  parentSpan: Span
  nodeId: string
  nodeType: string
  nodeName: string
}

export class PipelineTracer {
  private _tracer: Tracer | undefined

  private get tracer(): Tracer {
    if (!this._tracer) {
      this._tracer = trace.getTracer(TRACER_NAME)
    }
    return this._tracer
  }

  startRunSpan(params: RunSpanParams): Span {
    return this._startSpan('pipeline.run', undefined, {
      'pipeline.session.id': params.sessionId,
      'pipeline.team.id': params.teamId,
      'pipeline.node_count': params.nodeCount,
    })
  }

  startNodeSpan(params: NodeSpanParams): Span {
    return this._startSpan(`pipeline.node ${params.nodeType}`, params.parentSpan, {
      'pipeline.node.id': params.nodeId,
      'pipeline.node.type': params.nodeType,
      'pipeline.node.name': params.nodeName,
    })
  }

  /**
   * Ends a span, marking it as failed when `error` is given.
   */
  endSpan(span: Span, attributes: Record<string, AttributeValue> = {}, error?: Error): void {
    try {
      span.setAttributes(attributes)
      if (error) {
        span.setAttribute('pipeline.error.name', error.name)
        span.setStatus({ code: SpanStatusCode.ERROR, message: error.message })
        span.recordException(error)
      } else {
        span.setStatus({ code: SpanStatusCode.OK })
      }
    } catch (spanError) {
      log.debug('failed to finish span', { error: String(spanError) })
    } finally {
      span.end()
    }
  }

  private _startSpan(name: string, parentSpan: Span | undefined, attributes: Record<string, AttributeValue>): Span {
    const parentContext = parentSpan ? trace.setSpan(context.active(), parentSpan) : undefined
    return this.tracer.startSpan(name, { kind: SpanKind.INTERNAL, attributes }, parentContext)
  }
}

let _tracerInstance: PipelineTracer | undefined

/**
 * Returns the shared tracer.
 */
export function getTracer(): PipelineTracer {
  if (_tracerInstance === undefined) {
    _tracerInstance = new PipelineTracer()
  }
  return _tracerInstance
}

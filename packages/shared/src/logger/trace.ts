/**
 * Trace ids correlate every log line written for one logical operation,
 * e.g. a transfer session from its first file to its last
 */

import { randomUUID } from 'node:crypto'

/**
 * Generate a unique trace ID
 */
export function generateTraceId(prefix = 'trace'): string {
  return `${prefix}_${Date.now().toString(36)}_${randomUUID().slice(0, 8)}`
}

/**
 * Trace context for propagating trace information
 */
export interface TraceContext {
  traceId: string
  spanId?: string
  parentSpanId?: string
  name?: string
  timestamp: number
}

/**
 * Create a new trace context
 */
export function createTraceContext(name?: string, traceId?: string): TraceContext {
  return {
    traceId: traceId ?? generateTraceId(),
    name,
    timestamp: Date.now(),
  }
}

/**
 * Create a child span from parent trace context
 */
export function createChildSpan(parent: TraceContext, name?: string): TraceContext {
  return {
    traceId: parent.traceId,
    spanId: generateTraceId('span'),
    parentSpanId: parent.spanId,
    name: name ?? parent.name,
    timestamp: Date.now(),
  }
}

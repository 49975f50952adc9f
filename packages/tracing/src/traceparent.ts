/**
 * W3C Trace Context traceparent header formatting
 * Format: {version}-{trace-id}-{parent-id}-{trace-flags}
 * Example: 00-80e1afed08e019fc1110464cfa66635c-7a085853722dc6d2-01
 */

import type { SpanData } from "./Span.js"

export interface TraceContext {
  readonly traceId: string
  readonly spanId: string
  readonly traceFlags: number
}

const SAMPLED_FLAG = 0x01

/**
 * Format a TraceContext object into a W3C traceparent header string
 */
export const formatTraceparent = (ctx: TraceContext): string => {
  const flags = ctx.traceFlags.toString(16).padStart(2, "0")
  return `00-${ctx.traceId}-${ctx.spanId}-${flags}`
}

/**
 * Build the trace context of a span. Span trace ids are 64-bit, so they are left-padded
 * with zeros to the 128-bit width traceparent requires.
 */
export const traceContextOf = (span: SpanData): TraceContext => ({
  traceId: span.traceId.padStart(32, "0"),
  spanId: span.spanId,
  traceFlags: span.sampleable ? SAMPLED_FLAG : 0
})

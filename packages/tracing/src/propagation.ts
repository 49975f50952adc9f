/**
 * Propagation header sets
 *
 * The headers a span hands to the downstream service so that the downstream work joins the
 * same trace.
 */

import { Option } from "effect"
import type { SpanData } from "./Span.js"
import { formatTraceparent, traceContextOf } from "./traceparent.js"

export const TRACE_ID_HEADER = "X-B3-TraceId"
export const SPAN_ID_HEADER = "X-B3-SpanId"
export const PARENT_SPAN_ID_HEADER = "X-B3-ParentSpanId"
export const SAMPLED_HEADER = "X-B3-Sampled"
export const TRACEPARENT_HEADER = "traceparent"

export type PropagationFormat = "b3" | "w3c" | "b3+w3c"

export type PropagationHeader = readonly [name: string, value: string]

export const b3Headers = (span: SpanData): ReadonlyArray<PropagationHeader> => {
  const headers: Array<PropagationHeader> = [
    [TRACE_ID_HEADER, span.traceId],
    [SPAN_ID_HEADER, span.spanId]
  ]
  if (Option.isSome(span.parentSpanId)) {
    headers.push([PARENT_SPAN_ID_HEADER, span.parentSpanId.value])
  }
  headers.push([SAMPLED_HEADER, span.sampleable ? "1" : "0"])
  return headers
}

export const w3cHeaders = (span: SpanData): ReadonlyArray<PropagationHeader> => [
  [TRACEPARENT_HEADER, formatTraceparent(traceContextOf(span))]
]

export const propagationHeadersFor = (
  format: PropagationFormat
): ((span: SpanData) => ReadonlyArray<PropagationHeader>) => {
  switch (format) {
    case "b3":
      return b3Headers
    case "w3c":
      return w3cHeaders
    case "b3+w3c":
      return (span) => [...b3Headers(span), ...w3cHeaders(span)]
  }
}

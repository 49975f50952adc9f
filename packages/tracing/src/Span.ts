/**
 * Span data model
 *
 * A span is one unit of traced work. A span without a parent is the root span of a new trace;
 * a span with a parent is a sub-span inside the trace that is already in progress.
 */

import { Option } from "effect"
import type { Effect } from "effect"

export type SpanPurpose = "SERVER" | "CLIENT" | "LOCAL_ONLY" | "UNKNOWN"

export interface SpanData {
  readonly traceId: string
  readonly spanId: string
  readonly parentSpanId: Option.Option<string>
  readonly spanName: string
  readonly spanPurpose: SpanPurpose
  readonly sampleable: boolean
  readonly startTimeEpochMicros: number
  // Monotonic clock reading, only meaningful relative to another reading of the same clock
  readonly startTimeNanos: bigint
}

export interface CompletedSpan extends SpanData {
  readonly durationNanos: bigint
}

export interface Span extends SpanData {
  /**
   * Completes the span. Closing the root span finalizes the whole trace, closing a sub-span
   * finalizes only that sub-span and makes its parent current again.
   *
   * Idempotent: closing an already completed span logs a warning and does nothing else.
   */
  readonly close: Effect.Effect<void>

  /**
   * The completed form of the span, once it has been closed.
   */
  readonly completion: Effect.Effect<Option.Option<CompletedSpan>>
}

export const isRootSpan = (span: SpanData): boolean => Option.isNone(span.parentSpanId)

/**
 * Copies the plain data fields of a span, leaving its lifecycle operations behind.
 */
export const toSpanData = (span: SpanData): SpanData => ({
  traceId: span.traceId,
  spanId: span.spanId,
  parentSpanId: span.parentSpanId,
  spanName: span.spanName,
  spanPurpose: span.spanPurpose,
  sampleable: span.sampleable,
  startTimeEpochMicros: span.startTimeEpochMicros,
  startTimeNanos: span.startTimeNanos
})

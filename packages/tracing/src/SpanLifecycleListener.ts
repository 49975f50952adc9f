/**
 * Span lifecycle listeners
 *
 * Listeners are told about every span the tracer starts and completes. They are the hook for
 * shipping spans somewhere: a log line, an in-memory buffer for tests, an exporter.
 */

import { Effect, Ref } from "effect"
import type { CompletedSpan, SpanData } from "./Span.js"
import { serializeSpan, type SpanLoggingFormat } from "./serialization.js"

export interface SpanLifecycleListener {
  readonly spanStarted?: (span: SpanData) => Effect.Effect<void, unknown>
  // Only called for spans whose trace was sampled
  readonly spanSampled?: (span: SpanData) => Effect.Effect<void, unknown>
  readonly spanCompleted?: (span: CompletedSpan) => Effect.Effect<void, unknown>
}

/**
 * Run one listener callback. A failing listener is logged and otherwise ignored; it never
 * reaches the traced work.
 */
export const notifyListener = <S>(
  callback: ((span: S) => Effect.Effect<void, unknown>) | undefined,
  span: S
): Effect.Effect<void> =>
  callback === undefined
    ? Effect.void
    : Effect.suspend(() => callback(span)).pipe(
        Effect.catchAllCause((cause) =>
          Effect.logWarning("Span lifecycle listener failed", { cause })
        )
      )

export const DISTRIBUTED_TRACING_LOG_PREFIX = "[DISTRIBUTED_TRACING]"

/**
 * Logs every completed sampled span at info level.
 */
export const makeSpanLoggingListener = (format: SpanLoggingFormat): SpanLifecycleListener => ({
  spanCompleted: (span) =>
    span.sampleable
      ? Effect.logInfo(`${DISTRIBUTED_TRACING_LOG_PREFIX} ${serializeSpan(span, format)}`)
      : Effect.void
})

export interface InMemorySpanRecorder {
  readonly listener: SpanLifecycleListener
  readonly started: Effect.Effect<ReadonlyArray<SpanData>>
  readonly sampled: Effect.Effect<ReadonlyArray<SpanData>>
  readonly completed: Effect.Effect<ReadonlyArray<CompletedSpan>>
}

/**
 * Records lifecycle events in memory, in the order they happen.
 */
export const makeInMemorySpanRecorder: Effect.Effect<InMemorySpanRecorder> = Effect.gen(function* () {
  const started = yield* Ref.make<ReadonlyArray<SpanData>>([])
  const sampled = yield* Ref.make<ReadonlyArray<SpanData>>([])
  const completed = yield* Ref.make<ReadonlyArray<CompletedSpan>>([])

  return {
    listener: {
      spanStarted: (span) => Ref.update(started, (spans) => [...spans, span]),
      spanSampled: (span) => Ref.update(sampled, (spans) => [...spans, span]),
      spanCompleted: (span) => Ref.update(completed, (spans) => [...spans, span])
    },
    started: Ref.get(started),
    sampled: Ref.get(sampled),
    completed: Ref.get(completed)
  }
})

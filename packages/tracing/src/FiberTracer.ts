/**
 * Fiber-scoped tracer
 *
 * Keeps each fiber's span stack in a FiberRef. A forked fiber starts from a copy of its parent's
 * stack, and a joined fiber never writes its stack back into the parent, so concurrent work
 * cannot disturb the spans of the fiber that spawned it.
 */

import { Array as Arr, Clock, Effect, FiberRef, Layer, Option, Ref, type ConfigError, type Scope } from "effect"
import { TracingConfig, TracingConfigLive } from "./config.js"
import { NoCurrentSpanError } from "./errors.js"
import { generateId } from "./ids.js"
import { propagationHeadersFor, type PropagationFormat } from "./propagation.js"
import { alwaysSample, fromSampleRate, type RootSpanSampler } from "./sampling.js"
import { isRootSpan, toSpanData, type CompletedSpan, type Span, type SpanPurpose } from "./Span.js"
import {
  makeSpanLoggingListener,
  notifyListener,
  type SpanLifecycleListener
} from "./SpanLifecycleListener.js"
import { Tracer, type TracerService } from "./Tracer.js"

export interface FiberTracerOptions {
  readonly sampler?: RootSpanSampler
  readonly propagationFormat?: PropagationFormat
  readonly listeners?: ReadonlyArray<SpanLifecycleListener>
}

export const make = (
  options: FiberTracerOptions = {}
): Effect.Effect<TracerService, never, Scope.Scope> =>
  Effect.gen(function* () {
    const sampler = options.sampler ?? alwaysSample
    const listeners = options.listeners ?? []
    const propagationHeaders = propagationHeadersFor(options.propagationFormat ?? "b3")

    const spanStack = yield* FiberRef.make<ReadonlyArray<Span>>([], {
      join: (parent) => parent
    })

    const currentSpan = Effect.map(FiberRef.get(spanStack), Arr.last)

    const complete = (
      span: Span,
      state: Ref.Ref<Option.Option<CompletedSpan>>
    ): Effect.Effect<void> =>
      Effect.gen(function* () {
        const endTimeNanos = yield* Clock.currentTimeNanos
        const completed: CompletedSpan = {
          ...toSpanData(span),
          durationNanos: endTimeNanos - span.startTimeNanos
        }

        const firstClose = yield* Ref.modify(
          state,
          (previous): readonly [boolean, Option.Option<CompletedSpan>] =>
            Option.isSome(previous) ? [false, previous] : [true, Option.some(completed)]
        )
        if (!firstClose) {
          yield* Effect.logWarning("Ignoring close of a span that was already completed", {
            spanName: span.spanName,
            spanId: span.spanId
          })
          return
        }

        const spans = yield* FiberRef.get(spanStack)
        const top = Arr.last(spans)
        const isCurrent = Option.isSome(top) && top.value === span
        if (!isCurrent) {
          yield* Effect.logWarning("Closing a span that is not the current span", {
            spanName: span.spanName,
            spanId: span.spanId,
            currentSpanId: Option.getOrNull(Option.map(top, (current) => current.spanId))
          })
        }

        if (isRootSpan(span) && spans.includes(span)) {
          // Completing the root span completes the whole trace, open sub-spans included
          yield* FiberRef.set(spanStack, [])
        } else if (isCurrent) {
          yield* FiberRef.set(spanStack, spans.slice(0, -1))
        } else {
          yield* FiberRef.set(spanStack, spans.filter((candidate) => candidate !== span))
        }

        for (const listener of listeners) {
          yield* notifyListener(listener.spanCompleted, completed)
        }
      }).pipe(Effect.uninterruptible)

    const start = (
      spanName: string,
      spanPurpose: SpanPurpose,
      parent: Option.Option<Span>
    ): Effect.Effect<Span> =>
      Effect.gen(function* () {
        const traceId = Option.isSome(parent) ? parent.value.traceId : yield* generateId
        const spanId = yield* generateId
        const sampleable = Option.isSome(parent) ? parent.value.sampleable : yield* sampler
        const startTimeEpochMicros = (yield* Clock.currentTimeMillis) * 1000
        const startTimeNanos = yield* Clock.currentTimeNanos
        const state = yield* Ref.make<Option.Option<CompletedSpan>>(Option.none())

        const span: Span = {
          traceId,
          spanId,
          parentSpanId: Option.map(parent, (p) => p.spanId),
          spanName,
          spanPurpose,
          sampleable,
          startTimeEpochMicros,
          startTimeNanos,
          close: Effect.suspend(() => complete(span, state)),
          completion: Ref.get(state)
        }

        yield* FiberRef.update(spanStack, (spans) =>
          Option.isSome(parent) ? [...spans, span] : [span]
        )

        const data = toSpanData(span)
        for (const listener of listeners) {
          yield* notifyListener(listener.spanStarted, data)
          if (sampleable) {
            yield* notifyListener(listener.spanSampled, data)
          }
        }
        return span
      }).pipe(Effect.uninterruptible)

    const startRequestSpan = (spanName: string, spanPurpose: SpanPurpose) =>
      Effect.gen(function* () {
        const existing = yield* currentSpan
        if (Option.isSome(existing)) {
          yield* Effect.logWarning("Starting a new trace while another trace is in progress", {
            spanName,
            replacedTraceId: existing.value.traceId
          })
        }
        return yield* start(spanName, spanPurpose, Option.none())
      })

    const startSubSpan = (spanName: string, spanPurpose: SpanPurpose) =>
      Effect.flatMap(currentSpan, (parent) =>
        Option.isSome(parent)
          ? start(spanName, spanPurpose, parent)
          : Effect.fail(new NoCurrentSpanError({ spanName }))
      )

    const startSpanInCurrentContext = (spanName: string, spanPurpose: SpanPurpose) =>
      Effect.flatMap(currentSpan, (parent) => start(spanName, spanPurpose, parent))

    return {
      currentSpan,
      startRequestSpan,
      startSubSpan,
      startSpanInCurrentContext,
      propagationHeaders
    } satisfies TracerService
  })

/**
 * Tracer built from TracingConfig, logging every completed sampled span.
 */
export const FiberTracerLive: Layer.Layer<Tracer, ConfigError.ConfigError> = Layer.scoped(
  Tracer,
  Effect.gen(function* () {
    const config = yield* TracingConfig
    return yield* make({
      sampler: fromSampleRate(config.sampleRate),
      propagationFormat: config.propagationFormat,
      listeners: [makeSpanLoggingListener(config.spanLoggingFormat)]
    })
  })
).pipe(Layer.provide(TracingConfigLive))

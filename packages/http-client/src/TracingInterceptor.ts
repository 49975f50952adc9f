/**
 * Tracing Interceptor
 *
 * A request/response hook pair for pipelines that cannot be decorated. Prefer TracedTransport
 * where the pipeline can be decorated: the interceptor only brackets what runs between its two
 * hooks, and both hooks have to be installed or spans leak.
 */

import { Array as Arr, Effect, FiberRef, Option, type Scope } from "effect"
import type { HttpClientRequest } from "@effect/platform"
import { Tracer, type Span } from "@traced-http/tracing"
import { propagateTracingHeaders } from "./HeaderPropagator.js"
import { getSubspanSpanName, type SpanNamer } from "./SpanNaming.js"
import type { Transport } from "./Transport.js"

export interface TracingInterceptor {
  /**
   * Starts the CLIENT span (when the subspan option is on) and propagates the current span's
   * headers onto the request.
   */
  readonly onRequest: (
    request: HttpClientRequest.HttpClientRequest
  ) => Effect.Effect<HttpClientRequest.HttpClientRequest>

  /**
   * Closes the span the matching onRequest started on this fiber, even when the call left other
   * spans open above it.
   */
  readonly onResponse: Effect.Effect<void>
}

export interface TracingInterceptorOptions {
  readonly surroundCallsWithSubspan?: boolean
  readonly spanNamer?: SpanNamer
}

export const makeTracingInterceptor = (
  options: TracingInterceptorOptions = {}
): Effect.Effect<TracingInterceptor, never, Tracer | Scope.Scope> =>
  Effect.gen(function* () {
    const tracer = yield* Tracer
    const surroundCallsWithSubspan = options.surroundCallsWithSubspan ?? true
    const spanNamer = options.spanNamer ?? getSubspanSpanName

    // Spans opened by onRequest and not yet closed, innermost last
    const openedSpans = yield* FiberRef.make<ReadonlyArray<Span>>([], {
      join: (parent) => parent
    })

    const onRequest = (request: HttpClientRequest.HttpClientRequest) =>
      Effect.gen(function* () {
        if (surroundCallsWithSubspan) {
          const span = yield* tracer.startSpanInCurrentContext(spanNamer(request), "CLIENT")
          yield* FiberRef.update(openedSpans, (spans) => [...spans, span])
        }
        const current = yield* tracer.currentSpan
        return propagateTracingHeaders(request, current, tracer)
      })

    const onResponse = Effect.flatMap(FiberRef.get(openedSpans), (spans) =>
      Option.match(Arr.last(spans), {
        onNone: () => Effect.void,
        onSome: (span) =>
          FiberRef.set(openedSpans, spans.slice(0, -1)).pipe(Effect.zipRight(span.close))
      })
    ).pipe(Effect.uninterruptible)

    return { onRequest, onResponse }
  })

/**
 * Install an interceptor pair around a transport. onResponse runs however the call ends.
 */
export const interceptTransport = <A, E, R>(
  transport: Transport<A, E, R>,
  interceptor: TracingInterceptor
): Transport<A, E, R> => ({
  execute: (request) =>
    interceptor.onRequest(request).pipe(
      Effect.flatMap(transport.execute),
      Effect.onExit(() => interceptor.onResponse)
    )
})

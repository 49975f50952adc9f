/**
 * Traced Transport
 *
 * Decorates a Transport so that every outgoing call propagates the caller's tracing headers and,
 * optionally, is surrounded by a CLIENT span.
 *
 * If the subspan option is on but no span is current when the call executes, a new trace is
 * started rather than a sub-span. Either way the span fully surrounds the wrapped transport,
 * including anything the wrapped transport layers around the wire call (retries, other
 * decorators).
 *
 * With the subspan option off, the current span's headers are propagated if there is one, and
 * nothing happens otherwise. Turning the option on guarantees there is a span to propagate.
 */

import { Effect } from "effect"
import type { HttpClientRequest } from "@effect/platform"
import { Tracer, type TracerService } from "@traced-http/tracing"
import { propagateTracingHeaders } from "./HeaderPropagator.js"
import { getSubspanSpanName, type SpanNamer } from "./SpanNaming.js"
import type { Transport } from "./Transport.js"

export interface TracedTransportOptions {
  readonly surroundCallsWithSubspan?: boolean
  readonly spanNamer?: SpanNamer
}

/**
 * Wrap a transport with an already resolved tracer. The options are read here, once; changing
 * the object passed in afterwards has no effect on the returned transport.
 */
export const makeTracedTransport = <A, E, R>(
  transport: Transport<A, E, R>,
  tracer: TracerService,
  options: TracedTransportOptions = {}
): Transport<A, E, R> => {
  const surroundCallsWithSubspan = options.surroundCallsWithSubspan ?? true
  const spanNamer = options.spanNamer ?? getSubspanSpanName

  const propagateAndExecute = (request: HttpClientRequest.HttpClientRequest) =>
    tracer.currentSpan.pipe(
      Effect.map((span) => propagateTracingHeaders(request, span, tracer)),
      Effect.flatMap(transport.execute)
    )

  if (!surroundCallsWithSubspan) {
    return { execute: propagateAndExecute }
  }

  return {
    execute: (request) =>
      Effect.acquireUseRelease(
        // Named from the request as the caller built it, before any header is touched
        Effect.suspend(() => tracer.startSpanInCurrentContext(spanNamer(request), "CLIENT")),
        () => propagateAndExecute(request),
        // A root span completes the whole trace, a sub-span only itself; Span.close knows which
        (spanAroundCall) => spanAroundCall.close
      )
  }
}

/**
 * Wrap a transport with the Tracer from the environment.
 */
export const decorateTransport = <A, E, R>(
  transport: Transport<A, E, R>,
  options: TracedTransportOptions = {}
): Effect.Effect<Transport<A, E, R>, never, Tracer> => {
  const frozen: TracedTransportOptions = { ...options }
  return Effect.map(Tracer, (tracer) => makeTracedTransport(transport, tracer, frozen))
}

/**
 * Builds traced transports. Each transport captures the builder's settings at the moment it is
 * built; changing the builder later only affects transports built afterwards.
 *
 * @example
 * ```ts
 * const builder = TracedTransportBuilder.create()
 * const traced = yield* builder.build(fromHttpClient(client))
 * const untraced = yield* builder.setSurroundCallsWithSubspan(false).build(fromHttpClient(client))
 * ```
 */
export class TracedTransportBuilder {
  private spanNamer: SpanNamer = getSubspanSpanName

  constructor(private surroundCallsWithSubspan: boolean = true) {}

  static create(surroundCallsWithSubspan: boolean = true): TracedTransportBuilder {
    return new TracedTransportBuilder(surroundCallsWithSubspan)
  }

  isSurroundCallsWithSubspan(): boolean {
    return this.surroundCallsWithSubspan
  }

  setSurroundCallsWithSubspan(surroundCallsWithSubspan: boolean): this {
    this.surroundCallsWithSubspan = surroundCallsWithSubspan
    return this
  }

  setSpanNamer(spanNamer: SpanNamer): this {
    this.spanNamer = spanNamer
    return this
  }

  build<A, E, R>(transport: Transport<A, E, R>): Effect.Effect<Transport<A, E, R>, never, Tracer> {
    return decorateTransport(transport, {
      surroundCallsWithSubspan: this.surroundCallsWithSubspan,
      spanNamer: this.spanNamer
    })
  }
}

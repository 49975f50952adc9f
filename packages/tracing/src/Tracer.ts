import { Context, Effect, Option } from "effect"
import type { NoCurrentSpanError } from "./errors.js"
import type { PropagationHeader } from "./propagation.js"
import type { Span, SpanData, SpanPurpose } from "./Span.js"

export interface TracerService {
  /**
   * The span currently active on this fiber, if any.
   */
  readonly currentSpan: Effect.Effect<Option.Option<Span>>

  /**
   * Start a new trace. The root span becomes the current span, replacing whatever trace the
   * fiber was in.
   */
  readonly startRequestSpan: (spanName: string, spanPurpose: SpanPurpose) => Effect.Effect<Span>

  /**
   * Start a child of the current span. The child becomes the current span.
   */
  readonly startSubSpan: (
    spanName: string,
    spanPurpose: SpanPurpose
  ) => Effect.Effect<Span, NoCurrentSpanError>

  /**
   * Start a sub-span if a trace is in progress on this fiber, or a new trace if not.
   */
  readonly startSpanInCurrentContext: (
    spanName: string,
    spanPurpose: SpanPurpose
  ) => Effect.Effect<Span>

  /**
   * The headers that carry the span's identity to a downstream service.
   */
  readonly propagationHeaders: (span: SpanData) => ReadonlyArray<PropagationHeader>
}

export class Tracer extends Context.Tag("Tracer")<Tracer, TracerService>() {}

/**
 * Run an effect inside a span started in the current context. The span is closed when the
 * effect ends, whether it succeeds, fails or is interrupted.
 *
 * @example
 * ```ts
 * const result = yield* withSpan("load-profile", "LOCAL_ONLY")(loadProfile(userId))
 * ```
 */
export const withSpan =
  (spanName: string, spanPurpose: SpanPurpose) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R | Tracer> =>
    Effect.flatMap(Tracer, (tracer) =>
      Effect.acquireUseRelease(
        tracer.startSpanInCurrentContext(spanName, spanPurpose),
        () => effect,
        (span) => span.close
      )
    )

import { Effect } from "effect"
import * as FiberTracer from "../FiberTracer.js"
import { makeInMemorySpanRecorder, type InMemorySpanRecorder } from "../SpanLifecycleListener.js"
import { Tracer, type TracerService } from "../Tracer.js"

// ═══════════════════════════════════════════════════════════════════════════
// Tracer Harness
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Runs `body` against a fresh FiberTracer whose lifecycle events land in an in-memory recorder.
 */
export const runWithTracer = <A, E>(
  body: (tracer: TracerService, recorder: InMemorySpanRecorder) => Effect.Effect<A, E, Tracer>,
  options: FiberTracer.FiberTracerOptions = {}
): Promise<A> =>
  Effect.gen(function* () {
    const recorder = yield* makeInMemorySpanRecorder
    const tracer = yield* FiberTracer.make({ ...options, listeners: [recorder.listener] })
    return yield* body(tracer, recorder).pipe(Effect.provideService(Tracer, tracer))
  }).pipe(Effect.scoped, Effect.runPromise)

import { Clock, Effect, Option, Ref, type Scope } from "effect"
import { Headers, HttpClient, HttpClientResponse, type HttpClientRequest } from "@effect/platform"
import {
  FiberTracer,
  Tracer,
  makeInMemorySpanRecorder,
  type InMemorySpanRecorder,
  type Span,
  type TracerService
} from "@traced-http/tracing"
import type { Transport } from "../Transport.js"

// ═══════════════════════════════════════════════════════════════════════════
// Tracer Harness
// ═══════════════════════════════════════════════════════════════════════════

export const runWithTracer = <A, E>(
  body: (
    tracer: TracerService,
    recorder: InMemorySpanRecorder
  ) => Effect.Effect<A, E, Tracer | Scope.Scope>,
  options: FiberTracer.FiberTracerOptions = {}
): Promise<A> =>
  Effect.gen(function* () {
    const recorder = yield* makeInMemorySpanRecorder
    const tracer = yield* FiberTracer.make({ ...options, listeners: [recorder.listener] })
    return yield* body(tracer, recorder).pipe(Effect.provideService(Tracer, tracer))
  }).pipe(Effect.scoped, Effect.runPromise)

// ═══════════════════════════════════════════════════════════════════════════
// Recording Transport
// ═══════════════════════════════════════════════════════════════════════════

export interface RecordedCall {
  readonly url: string
  readonly traceId: Option.Option<string>
  readonly spanId: Option.Option<string>
  readonly parentSpanId: Option.Option<string>
  readonly sampled: Option.Option<string>
  // The tracer's current span while the transport was running
  readonly currentSpan: Option.Option<Span>
  readonly startTimeNanos: bigint
  readonly endTimeNanos: bigint
}

export interface RecordingTransport<E> extends Transport<string, E, never> {
  readonly calls: Effect.Effect<ReadonlyArray<RecordedCall>>
}

/**
 * A transport that records the headers it was handed and the span current at that moment,
 * then runs `respond`.
 */
export const makeRecordingTransport = <E = never>(
  tracer: TracerService,
  respond: (request: HttpClientRequest.HttpClientRequest) => Effect.Effect<string, E> = () =>
    Effect.succeed("ok")
): Effect.Effect<RecordingTransport<E>> =>
  Effect.gen(function* () {
    const calls = yield* Ref.make<ReadonlyArray<RecordedCall>>([])

    return {
      calls: Ref.get(calls),
      execute: (request) =>
        Effect.gen(function* () {
          const currentSpan = yield* tracer.currentSpan
          const startTimeNanos = yield* Clock.currentTimeNanos
          const exit = yield* Effect.exit(respond(request))
          const endTimeNanos = yield* Clock.currentTimeNanos
          yield* Ref.update(calls, (recorded) => [
            ...recorded,
            {
              url: request.url,
              traceId: Headers.get(request.headers, "X-B3-TraceId"),
              spanId: Headers.get(request.headers, "X-B3-SpanId"),
              parentSpanId: Headers.get(request.headers, "X-B3-ParentSpanId"),
              sampled: Headers.get(request.headers, "X-B3-Sampled"),
              currentSpan,
              startTimeNanos,
              endTimeNanos
            }
          ])
          return yield* exit
        })
    }
  })

// ═══════════════════════════════════════════════════════════════════════════
// Fake HttpClient
// ═══════════════════════════════════════════════════════════════════════════

export interface SentRequest {
  readonly request: HttpClientRequest.HttpClientRequest
  readonly currentSpan: Option.Option<Span>
}

export interface FakeHttpClient {
  readonly client: HttpClient.HttpClient
  readonly sent: Effect.Effect<ReadonlyArray<SentRequest>>
}

/**
 * An in-process HttpClient that answers every request with 200 "ok" and keeps what it was sent.
 */
export const makeFakeHttpClient = (tracer: TracerService): Effect.Effect<FakeHttpClient> =>
  Effect.gen(function* () {
    const sent = yield* Ref.make<ReadonlyArray<SentRequest>>([])

    const client = HttpClient.make((request) =>
      Effect.gen(function* () {
        const currentSpan = yield* tracer.currentSpan
        yield* Ref.update(sent, (all) => [...all, { request, currentSpan }])
        return HttpClientResponse.fromWeb(request, new Response("ok", { status: 200 }))
      })
    )

    return { client, sent: Ref.get(sent) }
  })

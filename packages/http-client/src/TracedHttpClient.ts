/**
 * Traced HTTP client layers
 *
 * The bare layers take the underlying HttpClient from the environment; the *Live variants wire
 * them onto the NodeHttpClient from @effect/platform-node.
 */

import { HttpClient } from "@effect/platform"
import { NodeHttpClient } from "@effect/platform-node"
import { Effect, Layer } from "effect"
import type { Tracer } from "@traced-http/tracing"
import { HttpClientTracingConfig, HttpClientTracingConfigLive } from "./config.js"
import { spanNamerWithPrefix } from "./SpanNaming.js"
import { decorateTransport } from "./TracedTransport.js"
import { makeTracingInterceptor } from "./TracingInterceptor.js"
import { fromHttpClient, HttpTransport } from "./Transport.js"

/**
 * HttpTransport whose calls are surrounded by CLIENT spans (unless switched off through
 * HTTP_CLIENT_SURROUND_CALLS_WITH_SUBSPAN) and carry the tracing headers.
 */
export const TracedHttpTransport: Layer.Layer<
  HttpTransport,
  never,
  HttpClient.HttpClient | HttpClientTracingConfig | Tracer
> = Layer.effect(
  HttpTransport,
  Effect.gen(function* () {
    const config = yield* HttpClientTracingConfig
    const client = yield* HttpClient.HttpClient

    yield* Effect.logDebug("Building traced HTTP transport", {
      surroundCallsWithSubspan: config.surroundCallsWithSubspan,
      spanNamePrefix: config.spanNamePrefix
    })

    return yield* decorateTransport(fromHttpClient(client), {
      surroundCallsWithSubspan: config.surroundCallsWithSubspan,
      spanNamer: spanNamerWithPrefix(config.spanNamePrefix)
    })
  })
)

/**
 * HttpClient that injects the current span's tracing headers into every outgoing request,
 * for code written against HttpClient rather than HttpTransport. It never opens spans.
 */
export const TracedHttpClient: Layer.Layer<
  HttpClient.HttpClient,
  never,
  HttpClient.HttpClient | Tracer
> = Layer.scoped(
  HttpClient.HttpClient,
  Effect.gen(function* () {
    const baseClient = yield* HttpClient.HttpClient
    const interceptor = yield* makeTracingInterceptor({ surroundCallsWithSubspan: false })

    return HttpClient.mapRequestEffect(baseClient, interceptor.onRequest)
  })
)

export const TracedHttpTransportLive = TracedHttpTransport.pipe(
  Layer.provide(NodeHttpClient.layer),
  Layer.provide(HttpClientTracingConfigLive)
)

export const TracedHttpClientLive = TracedHttpClient.pipe(Layer.provide(NodeHttpClient.layer))

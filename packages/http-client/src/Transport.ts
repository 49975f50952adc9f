import { Context, type Effect } from "effect"
import type { HttpClient, HttpClientError, HttpClientRequest, HttpClientResponse } from "@effect/platform"

/**
 * Anything that takes an outgoing request and produces a response. Decorators implement the same
 * interface as what they wrap, so they compose into a pipeline at any single point.
 */
export interface Transport<A, E, R = never> {
  readonly execute: (request: HttpClientRequest.HttpClientRequest) => Effect.Effect<A, E, R>
}

export type HttpTransportService = Transport<
  HttpClientResponse.HttpClientResponse,
  HttpClientError.HttpClientError
>

export class HttpTransport extends Context.Tag("HttpTransport")<HttpTransport, HttpTransportService>() {}

export const fromHttpClient = (client: HttpClient.HttpClient): HttpTransportService => ({
  execute: (request) => client.execute(request)
})

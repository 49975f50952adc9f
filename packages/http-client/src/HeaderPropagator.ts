import { HttpClientRequest } from "@effect/platform"
import { Option } from "effect"
import type { Span, TracerService } from "@traced-http/tracing"

/**
 * Sets the tracer's propagation headers for `span` on the request, overwriting any header of the
 * same name. Without a span there is nothing to propagate and the request comes back as given.
 */
export const propagateTracingHeaders = (
  request: HttpClientRequest.HttpClientRequest,
  span: Option.Option<Span>,
  tracer: Pick<TracerService, "propagationHeaders">
): HttpClientRequest.HttpClientRequest =>
  Option.match(span, {
    onNone: () => request,
    onSome: (current) =>
      tracer
        .propagationHeaders(current)
        .reduce((outgoing, [name, value]) => HttpClientRequest.setHeader(outgoing, name, value), request)
  })

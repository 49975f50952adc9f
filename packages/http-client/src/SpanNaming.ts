import type { HttpClientRequest } from "@effect/platform"

export const DEFAULT_SPAN_NAME_PREFIX = "httpclient_downstream_call"

/**
 * Names the span that surrounds an outgoing call.
 */
export type SpanNamer = (request: HttpClientRequest.HttpClientRequest) => string

const stripQueryAndFragment = (url: string): string => {
  const end = url.search(/[?#]/)
  return end === -1 ? url : url.slice(0, end)
}

/**
 * Returns `<prefix>-<HTTP_METHOD>_<URL>` with any query string and fragment stripped, e.g. for a
 * GET call to https://foo.bar/baz?stuff=things this returns
 * `"httpclient_downstream_call-GET_https://foo.bar/baz"`.
 */
export const getSubspanSpanName = (
  request: HttpClientRequest.HttpClientRequest,
  prefix: string = DEFAULT_SPAN_NAME_PREFIX
): string => `${prefix}-${request.method}_${stripQueryAndFragment(request.url)}`

export const spanNamerWithPrefix =
  (prefix: string): SpanNamer =>
  (request) =>
    getSubspanSpanName(request, prefix)

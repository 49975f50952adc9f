import { Option } from "effect"
import type { CompletedSpan, SpanData } from "../Span.js"

export const childSpanData: SpanData = {
  traceId: "4bf92f3577b34da6",
  spanId: "00f067aa0ba902b7",
  parentSpanId: Option.some("a2fb4a1d1a96d312"),
  spanName: "httpclient_downstream_call-GET_https://foo.bar/baz",
  spanPurpose: "CLIENT",
  sampleable: true,
  startTimeEpochMicros: 1700000000000000,
  startTimeNanos: 0n
}

export const rootSpanData: SpanData = {
  ...childSpanData,
  parentSpanId: Option.none(),
  sampleable: false
}

export const completedChildSpan: CompletedSpan = {
  ...childSpanData,
  durationNanos: 1500000n
}

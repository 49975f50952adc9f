/**
 * Completed span serialization for log output.
 *
 * Every value is rendered as a string so the output stays stable regardless of the number
 * widths involved (durations are bigints).
 */

import { Option } from "effect"
import type { CompletedSpan } from "./Span.js"

export type SpanLoggingFormat = "json" | "key_value"

const fieldsOf = (span: CompletedSpan): ReadonlyArray<readonly [string, string]> => [
  ["traceId", span.traceId],
  ["parentSpanId", Option.getOrElse(span.parentSpanId, () => "null")],
  ["spanId", span.spanId],
  ["spanName", span.spanName],
  ["sampleable", String(span.sampleable)],
  ["spanPurpose", span.spanPurpose],
  ["startTimeEpochMicros", String(span.startTimeEpochMicros)],
  ["durationNanos", span.durationNanos.toString()]
]

export const toJson = (span: CompletedSpan): string =>
  JSON.stringify(Object.fromEntries(fieldsOf(span)))

export const toKeyValue = (span: CompletedSpan): string =>
  fieldsOf(span)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(",")

export const serializeSpan = (span: CompletedSpan, format: SpanLoggingFormat): string =>
  format === "json" ? toJson(span) : toKeyValue(span)

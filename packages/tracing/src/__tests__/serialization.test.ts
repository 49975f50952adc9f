import { describe, it, expect } from "vitest"
import { Option } from "effect"
import { serializeSpan, toJson, toKeyValue } from "../serialization.js"
import { completedChildSpan } from "./fixtures.js"

describe("span serialization", () => {
  it("should render a completed span as JSON with string values", () => {
    expect(toJson(completedChildSpan)).toBe(
      '{"traceId":"4bf92f3577b34da6","parentSpanId":"a2fb4a1d1a96d312","spanId":"00f067aa0ba902b7",' +
        '"spanName":"httpclient_downstream_call-GET_https://foo.bar/baz","sampleable":"true",' +
        '"spanPurpose":"CLIENT","startTimeEpochMicros":"1700000000000000","durationNanos":"1500000"}'
    )
  })

  it("should render a completed span as quoted key/value pairs", () => {
    expect(toKeyValue(completedChildSpan)).toBe(
      'traceId="4bf92f3577b34da6",parentSpanId="a2fb4a1d1a96d312",spanId="00f067aa0ba902b7",' +
        'spanName="httpclient_downstream_call-GET_https://foo.bar/baz",sampleable="true",' +
        'spanPurpose="CLIENT",startTimeEpochMicros="1700000000000000",durationNanos="1500000"'
    )
  })

  it("should write null for the parent of a root span", () => {
    const root = { ...completedChildSpan, parentSpanId: Option.none() }

    expect(JSON.parse(serializeSpan(root, "json"))).toMatchObject({ parentSpanId: "null" })
    expect(serializeSpan(root, "key_value")).toContain('parentSpanId="null"')
  })
})

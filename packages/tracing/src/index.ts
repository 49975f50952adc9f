/**
 * @traced-http/tracing
 *
 * Span model, fiber-scoped tracer and propagation header sets for distributed tracing.
 */

// Span model
export { isRootSpan, toSpanData, type Span, type SpanData, type CompletedSpan, type SpanPurpose } from "./Span.js"

// Tracer capability and the fiber-scoped implementation
export { Tracer, withSpan, type TracerService } from "./Tracer.js"
export * as FiberTracer from "./FiberTracer.js"
export { FiberTracerLive, type FiberTracerOptions } from "./FiberTracer.js"
export { NoCurrentSpanError } from "./errors.js"

// Propagation header sets
export {
  TRACE_ID_HEADER,
  SPAN_ID_HEADER,
  PARENT_SPAN_ID_HEADER,
  SAMPLED_HEADER,
  TRACEPARENT_HEADER,
  b3Headers,
  w3cHeaders,
  propagationHeadersFor,
  type PropagationFormat,
  type PropagationHeader
} from "./propagation.js"
export { formatTraceparent, traceContextOf, type TraceContext } from "./traceparent.js"

// Sampling, lifecycle listeners and span logging
export { alwaysSample, neverSample, fromSampleRate, type RootSpanSampler } from "./sampling.js"
export {
  makeSpanLoggingListener,
  makeInMemorySpanRecorder,
  DISTRIBUTED_TRACING_LOG_PREFIX,
  type SpanLifecycleListener,
  type InMemorySpanRecorder
} from "./SpanLifecycleListener.js"
export { serializeSpan, toJson, toKeyValue, type SpanLoggingFormat } from "./serialization.js"

// Configuration
export { TracingConfig, TracingConfigLive } from "./config.js"

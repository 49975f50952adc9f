/**
 * @traced-http/http-client
 *
 * Distributed-tracing instrumentation for outgoing HTTP calls.
 */

// Transport capability
export { HttpTransport, fromHttpClient, type Transport, type HttpTransportService } from "./Transport.js"

// Header propagation and span naming
export { propagateTracingHeaders } from "./HeaderPropagator.js"
export {
  DEFAULT_SPAN_NAME_PREFIX,
  getSubspanSpanName,
  spanNamerWithPrefix,
  type SpanNamer
} from "./SpanNaming.js"

// Decorator and builder (preferred), interceptor pair (fallback)
export {
  makeTracedTransport,
  decorateTransport,
  TracedTransportBuilder,
  type TracedTransportOptions
} from "./TracedTransport.js"
export {
  makeTracingInterceptor,
  interceptTransport,
  type TracingInterceptor,
  type TracingInterceptorOptions
} from "./TracingInterceptor.js"

// Configuration and layers
export { HttpClientTracingConfig, HttpClientTracingConfigLive } from "./config.js"
export {
  TracedHttpTransport,
  TracedHttpTransportLive,
  TracedHttpClient,
  TracedHttpClientLive
} from "./TracedHttpClient.js"

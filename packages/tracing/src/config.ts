import { Config, Context, Effect, Layer } from "effect"
import type { PropagationFormat } from "./propagation.js"
import type { SpanLoggingFormat } from "./serialization.js"

export class TracingConfig extends Context.Tag("TracingConfig")<
  TracingConfig,
  {
    // Probability that a new trace is sampled, in [0, 1]
    readonly sampleRate: number
    readonly propagationFormat: PropagationFormat
    readonly spanLoggingFormat: SpanLoggingFormat
  }
>() {}

export const TracingConfigLive = Layer.effect(
  TracingConfig,
  Effect.gen(function* () {
    return {
      sampleRate: yield* Config.number("TRACING_SAMPLE_RATE").pipe(
        Config.validate({
          message: "Expected a sample rate between 0 and 1",
          validation: (rate: number) => rate >= 0 && rate <= 1
        }),
        Config.withDefault(1)
      ),
      propagationFormat: yield* Config.literal("b3", "w3c", "b3+w3c")("TRACING_PROPAGATION_FORMAT").pipe(
        Config.withDefault("b3" as const)
      ),
      spanLoggingFormat: yield* Config.literal("json", "key_value")("TRACING_SPAN_LOGGING_FORMAT").pipe(
        Config.withDefault("json" as const)
      )
    }
  })
)

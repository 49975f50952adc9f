import { Config, Context, Effect, Layer } from "effect"
import { DEFAULT_SPAN_NAME_PREFIX } from "./SpanNaming.js"

export class HttpClientTracingConfig extends Context.Tag("HttpClientTracingConfig")<
  HttpClientTracingConfig,
  {
    readonly surroundCallsWithSubspan: boolean
    readonly spanNamePrefix: string
  }
>() {}

export const HttpClientTracingConfigLive = Layer.effect(
  HttpClientTracingConfig,
  Effect.gen(function* () {
    return {
      surroundCallsWithSubspan: yield* Config.boolean("HTTP_CLIENT_SURROUND_CALLS_WITH_SUBSPAN").pipe(
        Config.withDefault(true)
      ),
      spanNamePrefix: yield* Config.string("HTTP_CLIENT_SPAN_NAME_PREFIX").pipe(
        Config.withDefault(DEFAULT_SPAN_NAME_PREFIX)
      )
    }
  })
)

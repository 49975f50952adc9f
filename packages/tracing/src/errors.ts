import { Data } from "effect"

/**
 * A sub-span was requested but the current fiber has no span to be its parent.
 */
export class NoCurrentSpanError extends Data.TaggedError("NoCurrentSpanError")<{
  readonly spanName: string
}> {}

import { Effect, Random } from "effect"

/**
 * Decides whether a new trace is sampled. Sub-spans never consult the sampler, they inherit
 * the decision of the span they belong to.
 */
export type RootSpanSampler = Effect.Effect<boolean>

export const alwaysSample: RootSpanSampler = Effect.succeed(true)

export const neverSample: RootSpanSampler = Effect.succeed(false)

/**
 * Samples each new trace with the given probability.
 *
 * @param sampleRate - Value in [0, 1]; 1 samples every trace, 0 none
 */
export const fromSampleRate = (sampleRate: number): RootSpanSampler => {
  if (sampleRate >= 1) {
    return alwaysSample
  }
  if (sampleRate <= 0) {
    return neverSample
  }
  return Effect.map(Random.next, (draw) => draw < sampleRate)
}

import { describe, it, expect } from "vitest"
import { Effect, Random } from "effect"
import { fromSampleRate } from "../sampling.js"

const countSampled = (sampleRate: number, draws: number) =>
  Effect.replicateEffect(fromSampleRate(sampleRate), draws).pipe(
    Effect.map((decisions) => decisions.filter(Boolean).length),
    Effect.withRandom(Random.make("sampling-test-seed")),
    Effect.runSync
  )

describe("fromSampleRate", () => {
  it("should sample every trace at rate 1", () => {
    expect(countSampled(1, 100)).toBe(100)
  })

  it("should sample no trace at rate 0", () => {
    expect(countSampled(0, 100)).toBe(0)
  })

  it("should sample roughly the requested share of traces", () => {
    const sampled = countSampled(0.5, 2000)

    expect(sampled).toBeGreaterThan(800)
    expect(sampled).toBeLessThan(1200)
  })
})

import { Effect, Random } from "effect"

const INVALID_ID = "0000000000000000"

const randomHexQuad = Effect.map(
  Random.nextIntBetween(0, 0x10000),
  (n) => n.toString(16).padStart(4, "0")
)

/**
 * Generate a random 64-bit identifier as 16 lowercase hex characters.
 * The all-zero id is invalid on the wire, so it is drawn again.
 */
export const generateId: Effect.Effect<string> = Effect.all([
  randomHexQuad,
  randomHexQuad,
  randomHexQuad,
  randomHexQuad
]).pipe(
  Effect.map((quads) => quads.join("")),
  Effect.repeat({ while: (id) => id === INVALID_ID })
)

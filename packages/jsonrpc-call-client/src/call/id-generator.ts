/**
 * @file Correlation ID Generators
 *
 * Every call stamps its request with an id produced by an `IdGenerator`.
 * The ids are not checked against the response, so they only need to be
 * distinct enough to tell requests apart in logs.
 */

/**
 * Produces the correlation id of a new request.
 */
export type IdGenerator = () => string

const UINT32 = 0x1_0000_0000

/**
 * Default generator: a pseudo-random signed 64-bit integer as a decimal
 * string, e.g. `"-4962768465676381896"`. Not cryptographically strong.
 */
export const randomLongId: IdGenerator = () => {
  const high = BigInt(Math.floor(Math.random() * UINT32))
  const low = BigInt(Math.floor(Math.random() * UINT32))
  return BigInt.asIntN(64, (high << 32n) | low).toString()
}

/**
 * Creates a deterministic generator counting up from `start`.
 *
 * @example
 * ```typescript
 * const nextId = sequentialIds()
 * nextId() // '1'
 * nextId() // '2'
 * ```
 */
export function sequentialIds(start = 1): IdGenerator {
  let next = start
  return () => String(next++)
}

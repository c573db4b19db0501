/**
 * Random token generation
 *
 * Used for tool directory suffixes and generated passwords. Draws from
 * node:crypto so values are not predictable from earlier runs.
 *
 * @example
 * ```typescript
 * import { ALPHABETS, randomString } from "@afterdeploy/shared"
 *
 * randomString(6, ALPHABETS.LOWER_ALNUM) // "k3x9qa"
 * ```
 */

import { randomInt } from "node:crypto"

export const ALPHABETS = {
  /** a-z0-9 */
  LOWER_ALNUM: "abcdefghijklmnopqrstuvwxyz0123456789",
  /** a-zA-Z0-9 */
  ALNUM: "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789",
} as const

/** Picks an index in [0, max) */
export type RandomIndex = (max: number) => number

export const cryptoIndex: RandomIndex = max => randomInt(max)

export function randomString(length: number, alphabet: string, pick: RandomIndex = cryptoIndex): string {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`length must be a non-negative integer, got ${length}`)
  }
  if (alphabet.length === 0) {
    throw new RangeError("alphabet must not be empty")
  }

  let out = ""
  for (let i = 0; i < length; i++) {
    out += alphabet[pick(alphabet.length)]
  }
  return out
}

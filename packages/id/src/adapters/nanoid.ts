import { customAlphabet, nanoid as nano } from "nanoid"
import type { IdGenerator } from "../ports/id-generator"

/**
 * nanoid-backed generator. Pass an `alphabet` when the id must stay inside a
 * restricted character set (MIME boundaries, for instance).
 */
export const nanoid = (size?: number, alphabet?: string): IdGenerator<string> => {
  if (alphabet === undefined) return { generate: () => nano(size) }

  const generate = customAlphabet(alphabet, size ?? 21)

  return { generate: () => generate() }
}

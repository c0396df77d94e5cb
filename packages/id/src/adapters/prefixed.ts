import type { IdGenerator } from "../ports/id-generator"

export const prefixed = <P extends string>(
  prefix: P,
  inner: IdGenerator,
): IdGenerator<`${P}_${string}`> => ({
  generate: () => `${prefix}_${inner.generate()}`,
})

import { prefixed } from "../prefixed"
import { uuidV7 } from "../uuid"

describe("prefixed", () => {
  it("joins prefix and inner output with an underscore", () => {
    const generator = prefixed("mixed", { generate: () => "b1" })

    expect(generator.generate()).toBe("mixed_b1")
  })

  it("keeps the inner generator format after the prefix", () => {
    const id = prefixed("related", uuidV7).generate()

    expect(id.slice("related_".length)).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i,
    )
  })
})

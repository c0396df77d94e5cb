import { describeIdGeneratorContract } from "../../ports/__tests__/id-generator.contract"
import { nanoid } from "../nanoid"
import { prefixed } from "../prefixed"

describeIdGeneratorContract({
  name: "prefixed",
  make: () => prefixed("alternative", nanoid(24, "abcdefghijklmnopqrstuvwxyz0123456789")),
})

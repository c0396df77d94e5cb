import { describeIdGeneratorContract } from "../../ports/__tests__/id-generator.contract"
import { uuidV7 } from "../uuid"

describeIdGeneratorContract({ name: "uuidV7", make: () => uuidV7 })

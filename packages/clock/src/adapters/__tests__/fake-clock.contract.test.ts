import { describeClockContract } from "../../ports/__tests__/clock.contract"
import { FakeClock } from "../fake-clock"

describe("FakeClock contract", () => {
  describeClockContract({
    name: "FakeClock",
    make: () => new FakeClock(new Date("2024-03-01T09:30:00Z")),
  })
})

import { FakeClock } from "../fake-clock"

describe("FakeClock behavior", () => {
  it("starts at the provided time, as a number or a Date", () => {
    expect(new FakeClock(1000).nowMs()).toBe(1000)
    expect(new FakeClock(new Date("2024-03-01T09:30:00Z")).now().toISOString()).toBe(
      "2024-03-01T09:30:00.000Z",
    )
  })

  it("defaults to the epoch", () => {
    expect(new FakeClock().nowMs()).toBe(0)
  })

  it("advance() and set() move time", () => {
    const clock = new FakeClock(0)

    clock.advance(100)
    clock.advance(50)

    expect(clock.nowMs()).toBe(150)

    clock.set(500)

    expect(clock.nowMs()).toBe(500)
  })

  it("sleep() resolves at once and advances time", async () => {
    const clock = new FakeClock(0)

    await clock.sleep(1000)

    expect(clock.nowMs()).toBe(1000)
  })

  it("sleep() with an aborted signal leaves time unchanged", async () => {
    const clock = new FakeClock(0)
    const ac = new AbortController()
    ac.abort()

    await clock.sleep(1000, ac.signal)

    expect(clock.nowMs()).toBe(0)
  })
})

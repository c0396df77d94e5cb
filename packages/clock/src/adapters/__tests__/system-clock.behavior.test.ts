import { SystemClock } from "../system-clock"

describe("SystemClock behavior", () => {
  it("waits roughly the requested time", async () => {
    const clock = new SystemClock()
    const started = clock.nowMs()

    await clock.sleep(30)

    expect(clock.nowMs() - started).toBeGreaterThanOrEqual(25)
  })

  it("stops waiting as soon as the signal aborts", async () => {
    const clock = new SystemClock()
    const controller = new AbortController()
    const started = clock.nowMs()

    const sleeping = clock.sleep(10_000, controller.signal)
    setTimeout(() => controller.abort(), 20)
    await sleeping

    expect(clock.nowMs() - started).toBeLessThan(1_000)
  })

  it("detaches its abort listener once done", async () => {
    const clock = new SystemClock()
    const controller = new AbortController()
    const remove = vi.spyOn(controller.signal, "removeEventListener")

    await clock.sleep(5, controller.signal)

    expect(remove).toHaveBeenCalledWith("abort", expect.any(Function))
  })
})

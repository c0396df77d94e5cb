import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/**
 * Manually driven clock for tests. Time only moves through `advance`, `set`
 * or `sleep`.
 */
export class FakeClock implements Clock {
  private time: UnixMs

  constructor(start: UnixMs | Date = 0) {
    this.time = typeof start === "number" ? start : start.getTime()
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  /** Resolves immediately and moves time forward, unless already aborted. */
  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted || ms <= 0) return

    this.advance(ms)
  }
}

import type { Milliseconds, UnixMs } from "./time"

/** Wall-clock reads. The MIME builder stamps the `Date:` header from `now()`. */
export type TimeSource = {
  now(): Date
  nowMs(): UnixMs
}

export interface Sleeper {
  /** Resolves after `ms`, or as soon as `signal` aborts. */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper

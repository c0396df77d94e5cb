import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. Adapters must honor them
 * but are free to choose how.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Example: "info" suppresses the per-command "debug" protocol trace.
   */
  level: LogLevelName

  /**
   * Pretty-print output for local development.
   * Leave off in production where JSON lines are ingested.
   */
  prettify?: boolean
}

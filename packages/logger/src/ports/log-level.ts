export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels (higher = more severe).
 * Matches pino's numbering.
 */
export const LogLevels = {
  /** Wire-level detail: decoded auth prompts, raw reply lines. */
  Trace: 10,
  /** Protocol commands and replies. */
  Debug: 20,
  /** Connection lifecycle. */
  Info: 30,
  Warn: 40,
  Error: 50,
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

/** Lowercase snake-case, e.g. `recipient_rejected`. */
export type ErrorCode = Lowercase<string>

/** Structured details (host, reply code, offending addresses). Frozen on construction. */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** The same operation may succeed later: 4xx replies, timeouts, dropped sockets. */
  readonly isRetryable: boolean

  /**
   * `false` marks a bug rather than a runtime condition: an illegal session
   * transition or a foreign value that was thrown.
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/** JSON-safe form of an error, as carried by batch and queue outcomes. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>

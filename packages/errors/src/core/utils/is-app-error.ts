import type { AppError } from "../../ports/error"

/**
 * Type guard for errors carrying the AppError fields, whether or not they
 * extend BaseError (errors that crossed a package boundary included).
 *
 * @example
 * ```ts
 * if (isAppError(err) && err.isRetryable) queueMessage.retry()
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  return (
    e instanceof Error &&
    "code" in e &&
    typeof e.code === "string" &&
    "context" in e &&
    typeof e.context === "object" &&
    e.context !== null &&
    "isRetryable" in e &&
    typeof e.isRetryable === "boolean" &&
    "isOperational" in e &&
    typeof e.isOperational === "boolean" &&
    "timestamp" in e &&
    e.timestamp instanceof Date &&
    Number.isFinite(e.timestamp.valueOf())
  )
}

import type { AppError, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"

/**
 * Normalizes a thrown value. App errors pass through; anything else (a
 * socket error, a thrown string) is wrapped as non-operational under
 * `fallbackCode`.
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (err instanceof BaseError) return err

  if (err instanceof Error) {
    return new BaseError(err.message, { code: fallbackCode, cause: err, isOperational: false })
  }

  const message = typeof err === "string" ? err : "Unknown error"

  return new BaseError(message, {
    code: fallbackCode,
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
  })
}

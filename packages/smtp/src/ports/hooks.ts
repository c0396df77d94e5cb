import type { AppError } from "@postline/errors"
import type { EmailOptions } from "./message"

type HookResult = void | Promise<void>

/**
 * Lifecycle callbacks. Each runs after the state change it reports; a hook
 * that throws is logged and otherwise ignored.
 */
export interface MailerHooks {
  /** Once, after the session reaches "ready". */
  onConnect?(): HookResult

  /** Once per successful send, with the relay's final reply. */
  onSent?(email: EmailOptions, response: string): HookResult

  /** Once per failed send; `email` is undefined when `Mailer.connect` failed. */
  onError?(email: EmailOptions | undefined, error: AppError): HookResult

  /** Once, after the connection is released. */
  onClose?(reason?: AppError): HookResult
}

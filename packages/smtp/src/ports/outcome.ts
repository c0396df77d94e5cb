import type { SerializedError } from "@postline/errors"
import type { EmailOptions } from "./message"
import type { MailerOptions } from "./mailer-options"

export type SendResult = Readonly<{
  messageId: string
  response: string
  accepted: readonly string[]
}>

export type FailureStage = "build" | "delivery"

/** Plain data; safe to serialize across a queue boundary. */
export type SendOutcome =
  | { success: true; messageId: string; response: string }
  | { success: false; stage: FailureStage; error: SerializedError }

export type BatchItem = {
  mailer: MailerOptions
  email: EmailOptions
}

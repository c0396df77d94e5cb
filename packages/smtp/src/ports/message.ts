import type { EmailAddress, EmailRecipient, EmailRecipients } from "./address"

export type AttachmentDisposition = "attachment" | "inline"

export type Attachment = {
  filename: string

  /** File bytes, base64-encoded by the caller. */
  content: string

  /** Defaults by file extension. */
  contentType?: string

  contentId?: string

  /** Defaults to "inline" when `contentId` is set, otherwise "attachment". */
  disposition?: AttachmentDisposition
}

export type DsnReturn = "headers" | "full"
export type DsnNotify = "success" | "failure" | "delay"

/**
 * Delivery Status Notification parameters (RFC 3461).
 * Only sent when the relay advertises DSN.
 */
export type DsnOptions = {
  /** `RET=HDRS` or `RET=FULL` on MAIL FROM. */
  return?: DsnReturn

  /** `NOTIFY=` on every RCPT TO. An empty list sends `NOTIFY=NEVER`. */
  notify?: DsnNotify[]

  /** `ENVID=` on MAIL FROM. */
  envelopeId?: string

  /** Adds `ORCPT=rfc822;<address>` to every RCPT TO. */
  orcpt?: boolean
}

export type EmailContent =
  | { text: string; html?: string }
  | { text?: string; html: string }

export type EmailOptions = EmailContent & {
  from: EmailRecipient
  to: EmailRecipients

  cc?: EmailRecipients
  bcc?: EmailRecipients

  replyTo?: EmailRecipients

  subject: string

  headers?: Record<string, string>
  attachments?: Attachment[]

  /** Replaces the mailer's DSN defaults for this message. */
  dsn?: DsnOptions
}

export type ResolvedAttachment = Readonly<{
  filename: string
  content: string
  contentType: string
  contentId?: string
  disposition: AttachmentDisposition
}>

/** Validated, normalized form of {@link EmailOptions}. */
export type Email = Readonly<{
  from: EmailAddress
  to: readonly EmailAddress[]
  cc: readonly EmailAddress[]
  bcc: readonly EmailAddress[]
  replyTo: readonly EmailAddress[]
  subject: string
  text?: string
  html?: string
  headers: Readonly<Record<string, string>>
  attachments: readonly ResolvedAttachment[]
  dsn?: DsnOptions
}>

/** MAIL FROM / RCPT TO addressing, separate from the headers. */
export type Envelope = Readonly<{
  from: string
  recipients: readonly string[]
  dsn?: DsnOptions
}>

export type BuiltMessage = Readonly<{
  messageId: string
  envelope: Envelope
  raw: string
}>

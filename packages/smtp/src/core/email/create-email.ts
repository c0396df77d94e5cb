import type { EmailAddress, EmailRecipient, EmailRecipients } from "../../ports/address"
import type { Attachment, Email, EmailOptions, Envelope, ResolvedAttachment } from "../../ports/message"
import { findInvalidEmails } from "../address/validate-address"
import { EmailBuildError, InvalidEmailError } from "../errors/errors"
import { isBase64 } from "../mime/encoding"
import { contentTypeFor } from "../mime/mime-types"

/**
 * Validates and normalizes caller input. All checks happen here, before any
 * connection is opened.
 *
 * @throws {EmailBuildError} `invalid_content` for missing bodies, recipients
 * or attachment fields and for line breaks in the subject or display names;
 * `invalid_email` listing every bad address
 */
export function createEmail(options: EmailOptions): Email {
  const to = toAddresses(options.to)

  if (!options.text && !options.html) {
    throw EmailBuildError.invalidContent("Email requires a text or html body")
  }

  if (to.length === 0) {
    throw EmailBuildError.invalidContent("Email requires at least one recipient")
  }

  const headers = options.headers ?? {}

  for (const [name, value] of Object.entries(headers)) {
    if (!/^[\x21-\x39\x3b-\x7e]+$/.test(name) || /[\r\n]/.test(value)) {
      throw EmailBuildError.invalidContent(`Invalid header "${name}"`, { header: name })
    }
  }

  if (/[\r\n]/.test(options.subject)) {
    throw EmailBuildError.invalidContent("Subject must not contain line breaks")
  }

  const attachments = (options.attachments ?? []).map(resolveAttachment)

  const from = toAddress(options.from)
  const cc = toAddresses(options.cc)
  const bcc = toAddresses(options.bcc)
  const replyTo = toAddresses(options.replyTo)

  for (const address of [from, ...to, ...cc, ...bcc, ...replyTo]) {
    if (address.name !== undefined && /[\r\n]/.test(address.name)) {
      throw EmailBuildError.invalidContent("Display names must not contain line breaks", {
        email: address.email,
      })
    }
  }

  const invalid = findInvalidEmails(
    [from, ...to, ...cc, ...bcc, ...replyTo].map((address) => address.email),
  )

  if (invalid.length > 0) {
    throw EmailBuildError.invalidEmail(new InvalidEmailError(invalid))
  }

  return Object.freeze({
    from,
    to,
    cc,
    bcc,
    replyTo,
    subject: options.subject,
    ...(options.text && { text: options.text }),
    ...(options.html && { html: options.html }),
    headers: Object.freeze({ ...headers }),
    attachments,
    ...(options.dsn && { dsn: Object.freeze({ ...options.dsn }) }),
  })
}

/** Bare addresses for MAIL FROM / RCPT TO. Bcc is included; duplicates are dropped. */
export function envelopeOf(email: Email): Envelope {
  const seen = new Set<string>()
  const recipients: string[] = []

  for (const { email: address } of [...email.to, ...email.cc, ...email.bcc]) {
    const key = address.toLowerCase()
    if (seen.has(key)) continue

    seen.add(key)
    recipients.push(address)
  }

  return {
    from: email.from.email,
    recipients,
    ...(email.dsn && { dsn: email.dsn }),
  }
}

function resolveAttachment(attachment: Attachment, index: number): ResolvedAttachment {
  if (!attachment.filename) {
    throw EmailBuildError.invalidContent(`Attachment ${index} requires a filename`, {
      attachment: index,
    })
  }

  const disposition = attachment.disposition ?? (attachment.contentId ? "inline" : "attachment")
  const contentId = attachment.contentId?.replace(/^<|>$/g, "")

  if (disposition === "inline" && !contentId) {
    throw EmailBuildError.invalidContent(
      `Inline attachment "${attachment.filename}" requires a contentId`,
      { attachment: index },
    )
  }

  if (!isBase64(attachment.content)) {
    throw EmailBuildError.invalidContent(
      `Attachment "${attachment.filename}" content is not base64`,
      { attachment: index },
    )
  }

  return Object.freeze({
    filename: attachment.filename,
    content: attachment.content.replace(/\s+/g, ""),
    contentType: attachment.contentType ?? contentTypeFor(attachment.filename),
    disposition,
    ...(contentId && { contentId }),
  })
}

function toAddress(recipient: EmailRecipient): EmailAddress {
  if (typeof recipient === "string") return { email: recipient.trim() }

  return {
    email: recipient.email.trim(),
    ...(recipient.name && { name: recipient.name }),
  }
}

function toAddresses(recipients: EmailRecipients | undefined): EmailAddress[] {
  if (recipients === undefined) return []

  return (Array.isArray(recipients) ? recipients : [recipients]).map(toAddress)
}

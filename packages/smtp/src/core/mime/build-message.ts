import type { TimeSource } from "@postline/clock"
import { type IdGenerator, nanoid, prefixed, uuidV7 } from "@postline/id"
import type { BuiltMessage, Email, EmailOptions, ResolvedAttachment } from "../../ports/message"
import { createEmail, envelopeOf } from "../email/create-email"
import {
  encodeHeaderText,
  encodeQuotedPrintable,
  fitsSevenBit,
  formatParameter,
  toCrlf,
  wrapBase64,
} from "./encoding"
import {
  formatAddressList,
  formatDate,
  type HeaderField,
  mergeHeaders,
  renderHeaders,
} from "./headers"
import type { MimeLeaf, MimePart, MultipartSubtype } from "./mime-part"
import { partHeaders, renderBody } from "./mime-part"

export type BuildMessageDeps = {
  clock: TimeSource

  /** Local part of the Message-ID. */
  messageIds: IdGenerator

  /** Random part of multipart boundaries. */
  boundaries: IdGenerator
}

const BOUNDARY_ALPHABET = "0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ"

export function defaultBuildDeps(clock: TimeSource): BuildMessageDeps {
  return {
    clock,
    messageIds: uuidV7,
    boundaries: nanoid(24, BOUNDARY_ALPHABET),
  }
}

/**
 * Renders a validated email as an RFC 5322 message with CRLF line endings.
 * Output depends only on the email, the clock and the two generators.
 */
export function buildMessage(email: Email, deps: BuildMessageDeps): BuiltMessage {
  const domain = email.from.email.slice(email.from.email.lastIndexOf("@") + 1)
  const messageId = `<${deps.messageIds.generate()}@${domain}>`

  const root = bodyStructure(email, deps)

  const generated: HeaderField[] = [
    ["From", formatAddressList([email.from])],
    ["To", formatAddressList(email.to)],
    ...(email.cc.length > 0 ? [["Cc", formatAddressList(email.cc)] as const] : []),
    ...(email.replyTo.length > 0 ? [["Reply-To", formatAddressList(email.replyTo)] as const] : []),
    ["Subject", encodeHeaderText(email.subject)],
    ["Date", formatDate(deps.clock.now())],
    ["Message-ID", messageId],
  ]

  const merged = mergeHeaders(generated, email.headers)
  const headers = [...merged, ["MIME-Version", "1.0"] as const, ...partHeaders(root)]

  return {
    messageId: merged.find(([name]) => name.toLowerCase() === "message-id")?.[1] ?? messageId,
    envelope: envelopeOf(email),
    raw: `${renderHeaders(headers)}\r\n\r\n${renderBody(root)}\r\n`,
  }
}

/** {@link createEmail} then {@link buildMessage}. */
export function buildMimeMessage(options: EmailOptions, deps: BuildMessageDeps): BuiltMessage {
  return buildMessage(createEmail(options), deps)
}

function bodyStructure(email: Email, deps: BuildMessageDeps): MimePart {
  const inline = email.attachments.filter((a) => a.disposition === "inline")
  const attached = email.attachments.filter((a) => a.disposition === "attachment")

  const text = email.text === undefined ? undefined : textPart("plain", email.text)
  const html = email.html === undefined ? undefined : textPart("html", email.html)

  let body: MimePart
  if (text && html) body = multipart("alternative", [text, html], deps)
  else if (html) body = html
  else if (text) body = text
  else throw new TypeError("Email has no body")

  if (inline.length > 0) {
    body = multipart("related", [body, ...inline.map(attachmentPart)], deps)
  }

  if (attached.length > 0) {
    body = multipart("mixed", [body, ...attached.map(attachmentPart)], deps)
  }

  return body
}

function multipart(
  subtype: MultipartSubtype,
  parts: readonly MimePart[],
  deps: BuildMessageDeps,
): MimePart {
  return {
    kind: "multipart",
    subtype,
    boundary: prefixed(subtype, deps.boundaries).generate(),
    parts,
  }
}

function textPart(subtype: "plain" | "html", content: string): MimeLeaf {
  const sevenBit = fitsSevenBit(content)

  return {
    kind: "leaf",
    headers: [
      ["Content-Type", `text/${subtype}; charset=utf-8`],
      ["Content-Transfer-Encoding", sevenBit ? "7bit" : "quoted-printable"],
    ],
    body: sevenBit ? toCrlf(content) : encodeQuotedPrintable(content),
  }
}

function attachmentPart(attachment: ResolvedAttachment): MimeLeaf {
  const headers: HeaderField[] = [
    ["Content-Type", `${attachment.contentType}; ${formatParameter("name", attachment.filename)}`],
    ["Content-Transfer-Encoding", "base64"],
    [
      "Content-Disposition",
      `${attachment.disposition}; ${formatParameter("filename", attachment.filename)}`,
    ],
  ]

  if (attachment.contentId) headers.push(["Content-ID", `<${attachment.contentId}>`])

  return { kind: "leaf", headers, body: wrapBase64(attachment.content) }
}

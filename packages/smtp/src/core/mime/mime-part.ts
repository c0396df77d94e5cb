import type { HeaderField } from "./headers"
import { renderHeaders } from "./headers"

export type MultipartSubtype = "mixed" | "related" | "alternative"

export type MimeLeaf = {
  kind: "leaf"
  headers: readonly HeaderField[]
  body: string
}

export type MimeMultipart = {
  kind: "multipart"
  subtype: MultipartSubtype
  boundary: string
  parts: readonly MimePart[]
}

export type MimePart = MimeLeaf | MimeMultipart

export function partHeaders(part: MimePart): readonly HeaderField[] {
  if (part.kind === "leaf") return part.headers

  return [["Content-Type", `multipart/${part.subtype}; boundary="${part.boundary}"`]]
}

export function renderBody(part: MimePart): string {
  if (part.kind === "leaf") return part.body

  const sections = part.parts.map((child) => {
    return `--${part.boundary}\r\n${renderHeaders(partHeaders(child))}\r\n\r\n${renderBody(child)}\r\n`
  })

  return `${sections.join("")}--${part.boundary}--`
}

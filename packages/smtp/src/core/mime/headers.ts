import type { EmailAddress } from "../../ports/address"
import { encodeHeaderText, encodeWords, isAscii, quoteString } from "./encoding"

export type HeaderField = readonly [name: string, value: string]

export function formatAddress(address: EmailAddress): string {
  if (!address.name) return address.email

  const phrase = isAscii(address.name) ? quoteString(address.name) : encodeWords(address.name)

  return `${phrase} <${address.email}>`
}

export function formatAddressList(addresses: readonly EmailAddress[]): string {
  return addresses.map(formatAddress).join(", ")
}

/** RFC 5322 date-time in UTC, e.g. `Fri, 01 Mar 2024 09:30:00 +0000`. */
export function formatDate(date: Date): string {
  return date.toUTCString().replace(/GMT$/, "+0000")
}

const structural = /^(content-|mime-version$)/i

/**
 * Applies caller headers over the generated ones. A caller header replaces
 * a generated header of the same name in place; structural MIME headers and
 * Bcc are never taken from the caller.
 */
export function mergeHeaders(
  generated: readonly HeaderField[],
  overrides: Readonly<Record<string, string>>,
): HeaderField[] {
  const merged = [...generated]

  for (const [name, value] of Object.entries(overrides)) {
    if (structural.test(name) || name.toLowerCase() === "bcc") continue

    const field: HeaderField = [name, encodeHeaderText(value)]
    const index = merged.findIndex(([n]) => n.toLowerCase() === name.toLowerCase())

    if (index >= 0) merged[index] = field
    else merged.push(field)
  }

  return merged
}

export function renderHeaders(fields: readonly HeaderField[]): string {
  return fields.map(([name, value]) => `${name}: ${value}`).join("\r\n")
}

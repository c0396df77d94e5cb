import { isIPv4, isIPv6 } from "node:net"
import { InvalidEmailError } from "../errors/errors"

const MAX_ADDRESS_LENGTH = 254
const MAX_LOCAL_LENGTH = 64
const MAX_DOMAIN_LENGTH = 255

const ATOM = "[A-Za-z0-9!#$%&'*+/=?^_`{|}~-]+"
const LOCAL_PART = new RegExp(`^${ATOM}(?:\\.${ATOM})*$`)
const LABEL = /^[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?$/
const TLD = /^[A-Za-z0-9-]{2,}$/

/**
 * Syntactic mailbox check: dot-atom local part, then either a dotted domain
 * name or a bracketed address literal (`[192.0.2.1]`, `[IPv6:2001:db8::1]`).
 * No DNS lookups.
 */
export function isValidEmail(address: string): boolean {
  const candidate = address.trim()

  if (candidate.length === 0 || candidate.length > MAX_ADDRESS_LENGTH) return false

  const at = candidate.lastIndexOf("@")
  if (at <= 0) return false

  const local = candidate.slice(0, at)
  const domain = candidate.slice(at + 1)

  if (local.length > MAX_LOCAL_LENGTH || !LOCAL_PART.test(local)) return false

  return isValidDomain(domain)
}

/**
 * Returns the trimmed address.
 *
 * @throws {InvalidEmailError} carrying the rejected address
 */
export function validateAddress(address: string): string {
  if (!isValidEmail(address)) throw new InvalidEmailError([address])

  return address.trim()
}

export function findInvalidEmails(addresses: readonly string[]): string[] {
  return addresses.filter((address) => !isValidEmail(address))
}

function isValidDomain(domain: string): boolean {
  if (domain.length === 0 || domain.length > MAX_DOMAIN_LENGTH) return false

  if (domain.startsWith("[")) return isValidAddressLiteral(domain)

  const labels = domain.split(".")
  const tld = labels.at(-1) ?? ""

  return labels.length >= 2 && labels.every((label) => LABEL.test(label)) && TLD.test(tld)
}

function isValidAddressLiteral(literal: string): boolean {
  if (!literal.endsWith("]")) return false

  const inner = literal.slice(1, -1)

  if (inner.toLowerCase().startsWith("ipv6:")) return isIPv6(inner.slice("ipv6:".length))

  return isIPv4(inner)
}

import type { DsnNotify, DsnOptions, DsnReturn } from "../../ports/message"
import type { ServerCapabilities } from "./capabilities"

const RET: Record<DsnReturn, string> = { headers: "HDRS", full: "FULL" }

const NOTIFY: Record<DsnNotify, string> = {
  success: "SUCCESS",
  failure: "FAILURE",
  delay: "DELAY",
}

/** RFC 3461 xtext: `+`, `=`, controls and non-ASCII become `+HH`. */
export function xtext(value: string): string {
  let out = ""

  for (const byte of Buffer.from(value, "utf8")) {
    out +=
      byte < 33 || byte > 126 || byte === 0x2b || byte === 0x3d
        ? `+${byte.toString(16).toUpperCase().padStart(2, "0")}`
        : String.fromCharCode(byte)
  }

  return out
}

export function ehlo(clientName: string): string {
  return `EHLO ${clientName}`
}

export function helo(clientName: string): string {
  return `HELO ${clientName}`
}

export function mailFrom(
  from: string,
  capabilities: ServerCapabilities,
  options: { size: number; dsn?: DsnOptions },
): string {
  let params = ""

  if (capabilities.has("SIZE")) params += ` SIZE=${options.size}`

  if (options.dsn && capabilities.supportsDsn) {
    if (options.dsn.return) params += ` RET=${RET[options.dsn.return]}`
    if (options.dsn.envelopeId) params += ` ENVID=${xtext(options.dsn.envelopeId)}`
  }

  return `MAIL FROM:<${from}>${params}`
}

export function rcptTo(
  recipient: string,
  capabilities: ServerCapabilities,
  dsn?: DsnOptions,
): string {
  let params = ""

  if (dsn && capabilities.supportsDsn) {
    if (dsn.notify) {
      params += ` NOTIFY=${dsn.notify.length > 0 ? dsn.notify.map((n) => NOTIFY[n]).join(",") : "NEVER"}`
    }

    if (dsn.orcpt) params += ` ORCPT=rfc822;${xtext(recipient)}`
  }

  return `RCPT TO:<${recipient}>${params}`
}

/** True when `dsn` asks for anything that would go on the wire. */
export function hasDsnParams(dsn: DsnOptions | undefined): boolean {
  return !!dsn && (!!dsn.return || !!dsn.envelopeId || !!dsn.notify || !!dsn.orcpt)
}

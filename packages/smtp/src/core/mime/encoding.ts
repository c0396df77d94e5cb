const CRLF = "\r\n"
const MAX_ENCODED_LINE = 76
const MAX_7BIT_LINE_OCTETS = 998
const ENCODED_WORD_PREFIX = "=?UTF-8?Q?"
const ENCODED_WORD_SUFFIX = "?="
const MAX_ENCODED_WORD = 75

export function isAscii(value: string): boolean {
  return /^[\x00-\x7f]*$/.test(value)
}

export function toCrlf(value: string): string {
  return value.replace(/\r\n|\r|\n/g, CRLF)
}

/** Plain ASCII with no line over 998 octets can go out as 7bit. */
export function fitsSevenBit(text: string): boolean {
  return isAscii(text) && toCrlf(text).split(CRLF).every((l) => l.length <= MAX_7BIT_LINE_OCTETS)
}

/**
 * Quoted-printable (RFC 2045 §6.7) over the UTF-8 bytes of `text`.
 * Hard line breaks become CRLF; soft breaks (`=` CRLF) keep lines at 76.
 */
export function encodeQuotedPrintable(text: string): string {
  return toCrlf(text).split(CRLF).map(encodeQuotedPrintableLine).join(CRLF)
}

function encodeQuotedPrintableLine(line: string): string {
  const bytes = Buffer.from(line, "utf8")
  const out: string[] = []
  let current = ""

  bytes.forEach((byte, i) => {
    const isLast = i === bytes.length - 1
    const isBlank = byte === 0x20 || byte === 0x09
    const literal = (byte >= 33 && byte <= 126 && byte !== 0x3d) || (isBlank && !isLast)
    const token = literal ? String.fromCharCode(byte) : `=${hex(byte)}`

    // Leave room for the trailing "=" of a soft break.
    if (current.length + token.length > MAX_ENCODED_LINE - 1) {
      out.push(`${current}=`)
      current = ""
    }

    current += token
  })

  out.push(current)

  return out.join(CRLF)
}

/** Base64 body, wrapped at 76 characters. Accepts already-encoded input. */
export function wrapBase64(base64: string): string {
  const compact = base64.replace(/\s+/g, "")
  const lines: string[] = []

  for (let i = 0; i < compact.length; i += MAX_ENCODED_LINE) {
    lines.push(compact.slice(i, i + MAX_ENCODED_LINE))
  }

  return lines.join(CRLF)
}

export function isBase64(value: string): boolean {
  const compact = value.replace(/\s+/g, "")

  return compact.length % 4 === 0 && /^[A-Za-z0-9+/]*={0,2}$/.test(compact)
}

/**
 * RFC 2047 Q-encoded words, each at most 75 characters, folded onto
 * continuation lines. Multi-byte characters are never split across words.
 */
export function encodeWords(text: string): string {
  const budget = MAX_ENCODED_WORD - ENCODED_WORD_PREFIX.length - ENCODED_WORD_SUFFIX.length
  const words: string[] = []
  let current = ""

  for (const char of text) {
    const encoded = encodeQChar(char)

    if (current.length + encoded.length > budget) {
      words.push(current)
      current = ""
    }

    current += encoded
  }

  words.push(current)

  return words.map((w) => `${ENCODED_WORD_PREFIX}${w}${ENCODED_WORD_SUFFIX}`).join(`${CRLF} `)
}

function encodeQChar(char: string): string {
  if (char === " ") return "_"
  if (/^[A-Za-z0-9!*+\-/]$/.test(char)) return char

  return [...Buffer.from(char, "utf8")].map((byte) => `=${hex(byte)}`).join("")
}

/** Header text: unchanged when ASCII, encoded words otherwise. */
export function encodeHeaderText(value: string): string {
  return isAscii(value) ? value : encodeWords(value)
}

export function quoteString(value: string): string {
  return `"${value.replace(/(["\\])/g, "\\$1")}"`
}

/**
 * A MIME parameter such as `filename`. Non-ASCII values use the RFC 2231
 * extended form (`filename*=UTF-8''...`).
 */
export function formatParameter(name: string, value: string): string {
  if (isAscii(value)) return `${name}=${quoteString(value)}`

  const encoded = encodeURIComponent(value).replace(
    /['()*]/g,
    (c) => `%${hex(c.charCodeAt(0))}`,
  )

  return `${name}*=UTF-8''${encoded}`
}

/**
 * Escapes lines starting with "." (RFC 5321 §4.5.2) and appends the
 * end-of-data marker.
 */
export function dotStuff(message: string): string {
  const body = toCrlf(message).replace(/(^|\r\n)\./g, "$1..")
  const terminated = body.endsWith(CRLF) ? body : `${body}${CRLF}`

  return `${terminated}.${CRLF}`
}

function hex(byte: number): string {
  return byte.toString(16).toUpperCase().padStart(2, "0")
}

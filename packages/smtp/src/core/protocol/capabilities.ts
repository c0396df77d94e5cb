import type { SmtpReply } from "../../ports/session"

/**
 * Extensions a relay advertised in its EHLO reply (RFC 5321 §4.1.1.1).
 * The first line carries the relay's domain and greeting; every following
 * line is one keyword with optional parameters.
 */
export class ServerCapabilities {
  private constructor(
    readonly domain: string,
    private readonly extensions: ReadonlyMap<string, readonly string[]>,
  ) {}

  static fromEhlo(reply: SmtpReply): ServerCapabilities {
    const [greeting = "", ...lines] = reply.lines
    const extensions = new Map<string, string[]>()

    for (const line of lines) {
      const [rawKeyword, ...params] = line.trim().split(/\s+/)
      if (!rawKeyword) continue

      // Some relays still announce "AUTH=LOGIN PLAIN" from pre-standard drafts.
      const legacyAuth = /^AUTH=(.*)$/i.exec(rawKeyword)
      const keyword = legacyAuth ? "AUTH" : rawKeyword.toUpperCase()
      const values = legacyAuth ? [legacyAuth[1] ?? "", ...params].filter(Boolean) : params

      const existing = extensions.get(keyword) ?? []
      extensions.set(keyword, [...existing, ...values.filter((v) => !existing.includes(v))])
    }

    return new ServerCapabilities(greeting.split(/\s+/)[0] ?? "", extensions)
  }

  /** A relay that only understood HELO advertises nothing. */
  static none(domain = ""): ServerCapabilities {
    return new ServerCapabilities(domain, new Map())
  }

  has(keyword: string): boolean {
    return this.extensions.has(keyword.toUpperCase())
  }

  params(keyword: string): readonly string[] {
    return this.extensions.get(keyword.toUpperCase()) ?? []
  }

  get supportsStartTls(): boolean {
    return this.has("STARTTLS")
  }

  get supportsDsn(): boolean {
    return this.has("DSN")
  }

  /** Upper-case mechanism names from the AUTH keyword. */
  get authMechanisms(): readonly string[] {
    return this.params("AUTH").map((m) => m.toUpperCase())
  }

  /** Declared maximum message size; 0 means no fixed limit. */
  get sizeLimit(): number | undefined {
    if (!this.has("SIZE")) return undefined

    const limit = Number(this.params("SIZE")[0] ?? 0)

    return Number.isFinite(limit) ? limit : 0
  }

  keywords(): string[] {
    return [...this.extensions.keys()]
  }
}

import type { Milliseconds } from "@postline/clock"
import type { MailerHooks } from "./hooks"
import type { DsnOptions } from "./message"

export const authMechanisms = ["plain", "login", "cram-md5"] as const

/**
 * Recognized AUTH mechanisms. Only "plain" and "login" can be negotiated;
 * selecting "cram-md5" fails explicitly.
 */
export type AuthMechanism = (typeof authMechanisms)[number]

export type Credentials = {
  username: string
  password: string
}

/** Serializable connection settings, safe to put on a queue. */
export type MailerSettings = {
  host: string

  /** @default 587 */
  port?: number

  /**
   * Implicit TLS.
   * @default false
   */
  secure?: boolean

  /**
   * Upgrade with STARTTLS when not `secure`. The upgrade is mandatory when set:
   * a relay without STARTTLS fails the session.
   * @default true
   */
  startTls?: boolean

  credentials?: Credentials

  /**
   * Mechanisms in order of preference.
   * @default ["plain", "login"]
   */
  authType?: AuthMechanism[]

  /** @default 60_000 */
  socketTimeoutMs?: Milliseconds

  /** @default 30_000 */
  responseTimeoutMs?: Milliseconds

  /**
   * Identity sent with EHLO/HELO.
   * @default "[127.0.0.1]"
   */
  clientName?: string

  /** Defaults for every message sent through this mailer. */
  dsn?: DsnOptions
}

export type MailerOptions = MailerSettings & {
  hooks?: MailerHooks
}

export type ResolvedMailerOptions = Readonly<{
  host: string
  port: number
  secure: boolean
  startTls: boolean
  credentials?: Readonly<Credentials>
  authType: readonly AuthMechanism[]
  socketTimeoutMs: Milliseconds
  responseTimeoutMs: Milliseconds
  clientName: string
  dsn?: Readonly<DsnOptions>
  hooks: MailerHooks
}>

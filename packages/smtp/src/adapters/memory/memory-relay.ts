import type { Milliseconds } from "@postline/clock"
import type { AppError } from "@postline/errors"
import { SmtpTimeoutError, TransportError } from "../../core/errors/errors"
import type { ConnectParams, SmtpConnection, SmtpConnector } from "../../ports/connection"

export type RelayStep =
  | "GREETING"
  | "EHLO"
  | "HELO"
  | "STARTTLS"
  | "AUTH"
  | "MAIL"
  | "RCPT"
  | "DATA"
  | "BODY"
  | "RSET"
  | "NOOP"
  | "QUIT"

export type MemoryRelayOptions = {
  /** @default "relay.test" */
  domain?: string

  /** EHLO keywords before TLS. */
  capabilities?: string[]

  /** EHLO keywords once TLS is up. Defaults to `capabilities` without STARTTLS. */
  tlsCapabilities?: string[]

  /** Accepted AUTH credentials, username to password. */
  users?: Record<string, string>

  /** Addresses refused at RCPT TO (case-insensitive). */
  rejectRecipients?: string[]

  /** Replaces the relay's reply to a step. Lines are sent as given. */
  replies?: Partial<Record<RelayStep, string[]>>

  /** Steps the relay never answers. */
  silentOn?: RelayStep[]

  /** Fail every TLS handshake. */
  failTls?: boolean

  /** Refuse every connection attempt. */
  refuseConnection?: boolean
}

export type RelayedMessage = {
  from: string
  recipients: string[]

  /** Everything after `MAIL FROM:<...>`. */
  mailParams: string

  /** Everything after `RCPT TO:<...>`, one entry per recipient. */
  rcptParams: string[]

  /** Message text with dot-stuffing removed and without the terminator. */
  data: string

  secure: boolean
  user?: string
}

const DEFAULT_CAPABILITIES = [
  "PIPELINING",
  "8BITMIME",
  "STARTTLS",
  "AUTH PLAIN LOGIN",
  "SIZE 10485760",
  "DSN",
]

/**
 * In-process SMTP relay behind the connector port. Speaks enough of RFC 5321
 * to exercise a full session without sockets, and records what it saw.
 */
export class MemoryRelay implements SmtpConnector {
  readonly transcript: string[] = []
  readonly messages: RelayedMessage[] = []
  connections = 0

  readonly domain: string
  readonly capabilities: readonly string[]
  readonly tlsCapabilities: readonly string[]

  constructor(readonly options: MemoryRelayOptions = {}) {
    this.domain = options.domain ?? "relay.test"
    this.capabilities = options.capabilities ?? DEFAULT_CAPABILITIES
    this.tlsCapabilities =
      options.tlsCapabilities ?? this.capabilities.filter((c) => c.toUpperCase() !== "STARTTLS")
  }

  async connect(params: ConnectParams): Promise<SmtpConnection> {
    if (this.options.refuseConnection) {
      throw TransportError.failed(new Error(`connect ECONNREFUSED ${params.host}:${params.port}`))
    }

    this.connections++

    return new MemoryRelayConnection(this, params.secure)
  }
}

type Mode = "command" | "data" | "auth-plain" | "auth-login-user" | "auth-login-password"

type Transaction = {
  from: string
  mailParams: string
  recipients: string[]
  rcptParams: string[]
}

class MemoryRelayConnection implements SmtpConnection {
  private readonly outbox: string[] = []
  private waiter?: { resolve(line: string): void; reject(error: AppError): void }
  private closed = false

  private pending = ""
  private mode: Mode = "command"
  private transaction?: Transaction
  private dataLines: string[] = []
  private loginUser = ""
  private user?: string

  constructor(
    private readonly relay: MemoryRelay,
    private secure: boolean,
  ) {
    this.respond("GREETING", [`220 ${relay.domain} ESMTP ready`])
  }

  readLine(timeoutMs: Milliseconds): Promise<string> {
    const line = this.outbox.shift()

    if (line !== undefined) return Promise.resolve(line)
    if (this.closed) return Promise.reject(TransportError.closed())

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = undefined
        reject(SmtpTimeoutError.response(timeoutMs))
      }, timeoutMs)

      this.waiter = {
        resolve: (value) => {
          clearTimeout(timer)
          this.waiter = undefined
          resolve(value)
        },
        reject: (error) => {
          clearTimeout(timer)
          this.waiter = undefined
          reject(error)
        },
      }
    })
  }

  async write(data: string): Promise<void> {
    if (this.closed) throw TransportError.closed()

    this.pending += data

    let end = this.pending.indexOf("\r\n")

    while (end >= 0) {
      const line = this.pending.slice(0, end)
      this.pending = this.pending.slice(end + 2)
      this.receive(line)
      end = this.pending.indexOf("\r\n")
    }
  }

  async upgradeToTls(): Promise<SmtpConnection> {
    if (this.relay.options.failTls) throw new Error("TLS handshake failed")

    this.secure = true

    return this
  }

  async close(): Promise<void> {
    this.closed = true
    this.waiter?.reject(TransportError.closed())
  }

  private receive(line: string): void {
    if (this.mode === "data") {
      this.receiveData(line)
      return
    }

    this.relay.transcript.push(line)

    switch (this.mode) {
      case "auth-plain":
        this.verify(decodePlain(line))
        return
      case "auth-login-user":
        this.loginUser = decode(line)
        this.mode = "auth-login-password"
        this.push(["334 UGFzc3dvcmQ6"])
        return
      case "auth-login-password":
        this.verify({ username: this.loginUser, password: decode(line) })
        return
    }

    const [verb = "", ...args] = line.split(" ")

    switch (verb.toUpperCase()) {
      case "EHLO":
        this.respond("EHLO", ehloReply(this.relay.domain, args.join(" "), this.keywords()))
        return
      case "HELO":
        this.respond("HELO", [`250 ${this.relay.domain}`])
        return
      case "STARTTLS":
        this.respond("STARTTLS", ["220 2.0.0 Ready to start TLS"])
        return
      case "AUTH":
        this.auth(args)
        return
      case "MAIL":
        this.mail(line)
        return
      case "RCPT":
        this.rcpt(line)
        return
      case "DATA":
        if (!this.transaction || this.transaction.recipients.length === 0) {
          this.respond("DATA", ["503 5.5.1 Error: need RCPT command"])
          return
        }

        if (this.respond("DATA", ["354 End data with <CR><LF>.<CR><LF>"])) {
          this.mode = "data"
          this.dataLines = []
        }
        return
      case "RSET":
        this.transaction = undefined
        this.respond("RSET", ["250 2.0.0 Ok"])
        return
      case "NOOP":
        this.respond("NOOP", ["250 2.0.0 Ok"])
        return
      case "QUIT":
        this.respond("QUIT", ["221 2.0.0 Bye"])
        return
      default:
        this.push(["502 5.5.2 Error: command not recognized"])
    }
  }

  private receiveData(line: string): void {
    if (line !== ".") {
      this.dataLines.push(line.startsWith(".") ? line.slice(1) : line)
      return
    }

    this.mode = "command"

    const transaction = this.transaction
    this.transaction = undefined

    const queued = `Q${this.relay.messages.length + 1}`

    if (!this.respond("BODY", [`250 2.0.0 Ok: queued as ${queued}`]) || !transaction) return

    this.relay.messages.push({
      from: transaction.from,
      recipients: transaction.recipients,
      mailParams: transaction.mailParams,
      rcptParams: transaction.rcptParams,
      data: this.dataLines.map((l) => `${l}\r\n`).join(""),
      secure: this.secure,
      ...(this.user !== undefined && { user: this.user }),
    })
  }

  private auth([mechanism = "", initial]: string[]): void {
    const override = this.relay.options.replies?.AUTH

    if (override || this.relay.options.silentOn?.includes("AUTH")) {
      this.respond("AUTH", [])
      return
    }

    switch (mechanism.toUpperCase()) {
      case "PLAIN":
        if (initial === undefined) {
          this.mode = "auth-plain"
          this.push(["334 "])
        } else {
          this.verify(decodePlain(initial))
        }
        return
      case "LOGIN":
        this.mode = "auth-login-user"
        this.push(["334 VXNlcm5hbWU6"])
        return
      default:
        this.push(["504 5.5.4 Unrecognized authentication type"])
    }
  }

  private verify({ username, password }: { username: string; password: string }): void {
    this.mode = "command"

    if (this.relay.options.users?.[username] === password) {
      this.user = username
      this.push(["235 2.7.0 Authentication successful"])
    } else {
      this.push(["535 5.7.8 Authentication credentials invalid"])
    }
  }

  private mail(line: string): void {
    const match = /^MAIL FROM:<([^>]*)>(.*)$/i.exec(line)

    if (!match) {
      this.push(["501 5.5.4 Syntax: MAIL FROM:<address>"])
      return
    }

    if (this.respond("MAIL", ["250 2.1.0 Ok"])) {
      this.transaction = {
        from: match[1] ?? "",
        mailParams: (match[2] ?? "").trim(),
        recipients: [],
        rcptParams: [],
      }
    }
  }

  private rcpt(line: string): void {
    const match = /^RCPT TO:<([^>]*)>(.*)$/i.exec(line)
    const address = match?.[1] ?? ""

    if (!match || !this.transaction) {
      this.push(["503 5.5.1 Error: need MAIL command"])
      return
    }

    const rejected = (this.relay.options.rejectRecipients ?? []).some(
      (r) => r.toLowerCase() === address.toLowerCase(),
    )

    if (rejected) {
      this.push([`550 5.1.1 <${address}>: Recipient address rejected`])
      return
    }

    if (this.respond("RCPT", ["250 2.1.5 Ok"])) {
      this.transaction.recipients.push(address)
      this.transaction.rcptParams.push((match[2] ?? "").trim())
    }
  }

  private keywords(): readonly string[] {
    return this.secure ? this.relay.tlsCapabilities : this.relay.capabilities
  }

  /**
   * Sends the configured or default reply for a step. Returns whether a
   * positive (2xx/3xx) reply went out.
   */
  private respond(step: RelayStep, defaults: string[]): boolean {
    if (this.relay.options.silentOn?.includes(step)) return false

    const lines = this.relay.options.replies?.[step] ?? defaults
    this.push(lines)

    return /^[23]/.test(lines[lines.length - 1] ?? "")
  }

  private push(lines: readonly string[]): void {
    this.outbox.push(...lines)

    if (this.waiter) {
      const line = this.outbox.shift()
      if (line !== undefined) this.waiter.resolve(line)
    }
  }
}

function ehloReply(domain: string, client: string, keywords: readonly string[]): string[] {
  const lines = [`${domain} greets ${client}`, ...keywords]

  return lines.map((text, i) => `250${i === lines.length - 1 ? " " : "-"}${text}`)
}

function decode(line: string): string {
  return Buffer.from(line, "base64").toString("utf8")
}

function decodePlain(payload: string): { username: string; password: string } {
  const [, username = "", password = ""] = decode(payload).split("\0")

  return { username, password }
}

import { isAppError } from "@postline/errors"
import { type IdGenerator, nanoid } from "@postline/id"
import { createNullLogger, type Logger } from "@postline/logger"
import type { SmtpConnection, SmtpConnector } from "../../ports/connection"
import type { ResolvedMailerOptions } from "../../ports/mailer-options"
import type { Envelope } from "../../ports/message"
import type { DeliveryReceipt, SessionState, SmtpReply } from "../../ports/session"
import { negotiateAuth, type SmtpExchange } from "../auth/negotiate-auth"
import {
  SessionStateError,
  SmtpResponseError,
  SmtpTimeoutError,
  TlsError,
  TransportError,
} from "../errors/errors"
import { dotStuff } from "../mime/encoding"
import { ServerCapabilities } from "../protocol/capabilities"
import { ehlo, hasDsnParams, helo, mailFrom, rcptTo } from "../protocol/commands"
import { isPositive, readReply, replyText } from "../protocol/reply"

export type SmtpSessionDeps = {
  connector: SmtpConnector
  logger?: Logger
  sessionIds?: IdGenerator
}

const transitions: Record<SessionState, readonly SessionState[]> = {
  disconnected: ["connected", "closed"],
  connected: ["greeted", "closed"],
  greeted: ["tls_upgraded", "authenticated", "ready", "closed"],
  tls_upgraded: ["authenticated", "ready", "closed"],
  authenticated: ["ready", "closed"],
  ready: ["in_transaction", "closed"],
  in_transaction: ["ready", "closed"],
  closed: [],
}

/**
 * One connection to one relay. Commands are strictly sequential: every
 * command waits for its full reply before the next is written.
 *
 * Any protocol fault (unexpected reply, timeout, transport failure) closes
 * the session; it never tries to resynchronize a broken dialogue.
 */
export class SmtpSession implements SmtpExchange {
  readonly id: string

  private state: SessionState = "disconnected"
  private busy = false
  private connection?: SmtpConnection
  private capabilities = ServerCapabilities.none()
  private closing?: Promise<void>
  private readonly logger: Logger

  constructor(
    private readonly options: ResolvedMailerOptions,
    private readonly deps: SmtpSessionDeps,
  ) {
    this.id = (deps.sessionIds ?? nanoid(12)).generate()
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "smtp-session",
      host: options.host,
      port: options.port,
      sessionId: this.id,
    })
  }

  get currentState(): SessionState {
    return this.state
  }

  get serverCapabilities(): ServerCapabilities {
    return this.capabilities
  }

  /** Connects and runs greeting, EHLO, STARTTLS and AUTH until `ready`. */
  async open(): Promise<void> {
    if (this.state === "closed") throw SessionStateError.closed()
    if (this.state !== "disconnected") throw SessionStateError.busy(this.state)

    await this.guard(async () => {
      const { host, port, secure, socketTimeoutMs } = this.options

      this.connection = await this.deps.connector.connect({
        host,
        port,
        secure,
        timeoutMs: socketTimeoutMs,
      })
      this.transition("connected")

      const greeting = await this.read("greeting")
      if (greeting.code !== 220) throw SmtpResponseError.unexpectedReply("greeting", greeting)
      this.transition("greeted")

      await this.hello()

      if (!secure && this.options.startTls) await this.startTls()

      if (this.options.credentials) {
        await negotiateAuth({
          mechanisms: this.options.authType,
          capabilities: this.capabilities,
          credentials: this.options.credentials,
          exchange: this,
          logger: this.logger,
        })
        this.transition("authenticated")
      }

      this.transition("ready")
    })

    this.logger.info("SMTP session ready", {
      extensions: this.capabilities.keywords(),
    })
  }

  /**
   * One MAIL / RCPT / DATA transaction. `message` is the unstuffed RFC 5322
   * text; dot-stuffing and the terminator are added here.
   */
  async sendMail(envelope: Envelope, message: string): Promise<DeliveryReceipt> {
    if (this.state === "closed") throw SessionStateError.closed()
    if (this.busy || this.state === "in_transaction") throw SessionStateError.busy(this.state)
    if (this.state !== "ready") throw SessionStateError.notReady(this.state)

    const size = Buffer.byteLength(message, "utf8")
    const limit = this.capabilities.sizeLimit

    // Nothing has been written yet, so the session stays ready.
    if (limit !== undefined && limit > 0 && size > limit) {
      throw SmtpResponseError.messageTooLarge(size, limit)
    }

    return this.guard(async () => {
      this.transition("in_transaction")

      const dsn = envelope.dsn ?? this.options.dsn

      if (hasDsnParams(dsn) && !this.capabilities.supportsDsn) {
        this.logger.warn("Relay does not advertise DSN; dropping DSN parameters")
      }

      const mail = await this.command(mailFrom(envelope.from, this.capabilities, { size, dsn }))
      if (mail.code !== 250) throw SmtpResponseError.unexpectedReply("MAIL FROM", mail)

      for (const recipient of envelope.recipients) {
        const rcpt = await this.command(rcptTo(recipient, this.capabilities, dsn))

        if (rcpt.code !== 250 && rcpt.code !== 251) {
          throw SmtpResponseError.recipientRejected(recipient, rcpt)
        }
      }

      const data = await this.command("DATA")
      if (data.code !== 354) throw SmtpResponseError.unexpectedReply("DATA", data)

      this.logger.debug("C: <message body>", { bytes: size })
      await this.write(dotStuff(message))

      const done = await this.read("message body")
      if (done.code !== 250) throw SmtpResponseError.unexpectedReply("message body", done)

      this.transition("ready")

      return { response: replyText(done), accepted: [...envelope.recipients] }
    })
  }

  /**
   * Sends QUIT when the dialogue is idle, then releases the connection.
   * Safe to call in any state and more than once.
   */
  close(): Promise<void> {
    this.closing ??= this.shutdown()

    return this.closing
  }

  /** Writes one command line and reads its reply. `label` replaces the line in logs. */
  async command(line: string, label = line): Promise<SmtpReply> {
    this.logger.debug(`C: ${label}`)
    await this.write(`${line}\r\n`)

    return this.read(label.split(" ")[0] ?? label)
  }

  private async hello(): Promise<void> {
    const reply = await this.command(ehlo(this.options.clientName))

    if (isPositive(reply)) {
      this.capabilities = ServerCapabilities.fromEhlo(reply)
      return
    }

    if (reply.code === 421) throw SmtpResponseError.unexpectedReply("EHLO", reply)

    this.logger.debug("EHLO refused; falling back to HELO", { replyCode: reply.code })

    const fallback = await this.command(helo(this.options.clientName))
    if (fallback.code !== 250) throw SmtpResponseError.unexpectedReply("HELO", fallback)

    this.capabilities = ServerCapabilities.none(fallback.lines[0]?.split(/\s+/)[0])
  }

  private async startTls(): Promise<void> {
    const { host } = this.options

    if (!this.capabilities.supportsStartTls) throw TlsError.unavailable(host)

    const reply = await this.command("STARTTLS")
    if (reply.code !== 220) {
      throw TlsError.failed(host, SmtpResponseError.unexpectedReply("STARTTLS", reply))
    }

    try {
      this.connection = await this.requireConnection().upgradeToTls()
    } catch (err) {
      if (err instanceof SmtpTimeoutError) throw err
      throw TlsError.failed(host, err)
    }

    this.transition("tls_upgraded")
    this.logger.debug("TLS established")

    await this.hello()
  }

  private async read(command: string): Promise<SmtpReply> {
    const connection = this.requireConnection()
    const reply = await readReply(
      (timeoutMs) => connection.readLine(timeoutMs),
      command,
      this.options.responseTimeoutMs,
    )

    for (const line of reply.raw) this.logger.debug(`S: ${line}`)

    return reply
  }

  private write(data: string): Promise<void> {
    return this.requireConnection().write(data)
  }

  private requireConnection(): SmtpConnection {
    if (!this.connection) throw TransportError.closed()

    return this.connection
  }

  private transition(to: SessionState): void {
    if (!transitions[this.state].includes(to)) {
      throw SessionStateError.invalidTransition(this.state, to)
    }

    this.logger.trace("Session state changed", { from: this.state, state: to })
    this.state = to
  }

  /** Runs one protocol step; a failure closes the session and rethrows. */
  private async guard<T>(step: () => Promise<T>): Promise<T> {
    this.busy = true

    try {
      return await step()
    } catch (err) {
      const error = isAppError(err) ? err : TransportError.failed(err)

      if (this.state !== "closed") {
        this.logger.warn("SMTP session failed", { err: error, state: this.state })
        this.state = "closed"
        await this.release()
      }

      throw error
    } finally {
      this.busy = false
    }
  }

  private async shutdown(): Promise<void> {
    const idle = !this.busy && this.connection !== undefined && this.state !== "closed"
    this.state = "closed"

    if (idle) {
      try {
        await this.command("QUIT")
      } catch (err) {
        this.logger.debug("QUIT failed", { err })
      }
    }

    await this.release()
    this.logger.info("SMTP session closed")
  }

  private async release(): Promise<void> {
    const connection = this.connection
    this.connection = undefined

    try {
      await connection?.close()
    } catch (err) {
      this.logger.debug("Closing connection failed", { err })
    }
  }
}

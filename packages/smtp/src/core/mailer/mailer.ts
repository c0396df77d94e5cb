import { type Clock, SystemClock } from "@postline/clock"
import { type AppError, toAppError } from "@postline/errors"
import type { IdGenerator } from "@postline/id"
import { createNullLogger, type Logger } from "@postline/logger"
import { NodeSocketConnector } from "../../adapters/node/node-socket-connector"
import type { SmtpConnector } from "../../ports/connection"
import type { MailerHooks } from "../../ports/hooks"
import type { MailerOptions, ResolvedMailerOptions } from "../../ports/mailer-options"
import type { EmailOptions } from "../../ports/message"
import type { SendResult } from "../../ports/outcome"
import type { SessionState } from "../../ports/session"
import { resolveMailerOptions } from "../config/resolve-mailer-options"
import { createEmail } from "../email/create-email"
import { type BuildMessageDeps, buildMessage, defaultBuildDeps } from "../mime/build-message"
import { SmtpSession } from "../session/smtp-session"

export type MailerDeps = {
  connector?: SmtpConnector
  logger?: Logger
  clock?: Clock
  messageIds?: IdGenerator
  boundaries?: IdGenerator
  sessionIds?: IdGenerator
}

/**
 * Sends email over one SMTP session. `connect` opens it, `sendOne` reuses
 * it for as many messages as needed, `close` ends it.
 *
 * @example
 * ```ts
 * const mailer = await Mailer.connect({ host: "smtp.example.com", credentials })
 * try {
 *   await mailer.sendOne({ from, to, subject: "Hi", text: "Hello" })
 * } finally {
 *   await mailer.close()
 * }
 * ```
 */
export class Mailer {
  private closed?: Promise<void>

  private constructor(
    private readonly options: ResolvedMailerOptions,
    private readonly session: SmtpSession,
    private readonly build: BuildMessageDeps,
    private readonly logger: Logger,
  ) {}

  /**
   * Opens a session. A failure is reported through `onError(undefined, err)`
   * and rethrown.
   */
  static connect(options: MailerOptions, deps: MailerDeps = {}): Promise<Mailer> {
    return Mailer.open(options, deps)
  }

  /** `email` is what `onError` receives when the connection fails. */
  private static async open(
    options: MailerOptions,
    deps: MailerDeps,
    email?: EmailOptions,
  ): Promise<Mailer> {
    const resolved = resolveMailerOptions(options)
    const logger = createLogger(deps)

    const session = new SmtpSession(resolved, {
      connector: deps.connector ?? new NodeSocketConnector(),
      ...(deps.logger && { logger: deps.logger }),
      ...(deps.sessionIds && { sessionIds: deps.sessionIds }),
    })

    const mailer = new Mailer(
      resolved,
      session,
      buildDeps(deps),
      logger.child({ sessionId: session.id }),
    )

    try {
      await session.open()
    } catch (err) {
      await mailer.hook("onError", (h) => h.onError?.(email, toAppError(err)))
      throw err
    }

    await mailer.hook("onConnect", (h) => h.onConnect?.())

    return mailer
  }

  /**
   * Connects, sends one email and closes, even when sending fails. Invalid
   * input is reported before any connection is opened. Every `onError` call,
   * including one for a failed connection, receives `email`.
   */
  static async send(
    options: MailerOptions,
    email: EmailOptions,
    deps: MailerDeps = {},
  ): Promise<SendResult> {
    try {
      createEmail(email)
    } catch (err) {
      const hooks = options.hooks ?? {}
      await runHook(createLogger(deps), "onError", () => hooks.onError?.(email, toAppError(err)))
      throw err
    }

    const mailer = await Mailer.open(options, deps, email)
    let failure: AppError | undefined

    try {
      return await mailer.sendOne(email)
    } catch (err) {
      failure = toAppError(err)
      throw err
    } finally {
      await mailer.close(failure)
    }
  }

  get state(): SessionState {
    return this.session.currentState
  }

  /**
   * Builds and transmits one message. Build failures leave the session
   * untouched; delivery failures close it.
   */
  async sendOne(email: EmailOptions): Promise<SendResult> {
    try {
      const message = buildMessage(createEmail(email), this.build)
      const log = this.logger.child({ messageId: message.messageId })

      log.debug("Sending message", { recipients: message.envelope.recipients.length })

      const receipt = await this.session.sendMail(message.envelope, message.raw)

      log.info("Message accepted", { response: receipt.response })
      await this.hook("onSent", (h) => h.onSent?.(email, receipt.response))

      return {
        messageId: message.messageId,
        response: receipt.response,
        accepted: receipt.accepted,
      }
    } catch (err) {
      const error = toAppError(err)

      this.logger.warn("Send failed", { err: error })
      await this.hook("onError", (h) => h.onError?.(email, error))

      throw error
    }
  }

  /** Ends the session and calls `onClose` once. Later calls are no-ops. */
  close(reason?: AppError): Promise<void> {
    this.closed ??= this.shutdown(reason)

    return this.closed
  }

  private async shutdown(reason?: AppError): Promise<void> {
    await this.session.close()
    await this.hook("onClose", (h) => h.onClose?.(reason))
  }

  private hook(name: keyof MailerHooks, call: (hooks: MailerHooks) => HookResult): Promise<void> {
    const { hooks } = this.options

    return runHook(this.logger, name, () => call(hooks))
  }
}

type HookResult = void | Promise<void>

/** Hook failures are logged and never reach the caller. */
async function runHook(
  logger: Logger,
  name: keyof MailerHooks,
  call: () => HookResult,
): Promise<void> {
  try {
    await call()
  } catch (err) {
    logger.warn(`Mailer hook failed: ${name}`, { err })
  }
}

function createLogger(deps: MailerDeps): Logger {
  return (deps.logger ?? createNullLogger()).child({ module: "mailer" })
}

function buildDeps(deps: MailerDeps): BuildMessageDeps {
  const defaults = defaultBuildDeps(deps.clock ?? new SystemClock())

  return {
    clock: defaults.clock,
    messageIds: deps.messageIds ?? defaults.messageIds,
    boundaries: deps.boundaries ?? defaults.boundaries,
  }
}

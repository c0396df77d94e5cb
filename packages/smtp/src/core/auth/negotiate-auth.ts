import type { Logger } from "@postline/logger"
import type { AuthMechanism, Credentials } from "../../ports/mailer-options"
import type { SmtpReply } from "../../ports/session"
import { AuthError, SmtpTimeoutError } from "../errors/errors"
import type { ServerCapabilities } from "../protocol/capabilities"

/** One command/reply round trip. `label` replaces the line in logs. */
export interface SmtpExchange {
  command(line: string, label?: string): Promise<SmtpReply>
}

export type NegotiateAuthParams = {
  mechanisms: readonly AuthMechanism[]
  capabilities: ServerCapabilities
  credentials: Credentials
  exchange: SmtpExchange
  logger: Logger
}

const REDACTED = "[redacted]"

/**
 * Picks the first mechanism, in caller order, that the relay advertises and
 * runs it. Resolves with the mechanism used.
 *
 * @throws {AuthError} `auth_unsupported` when nothing matches,
 * `auth_rejected` on any unexpected reply, `auth_timeout` when the relay
 * stops answering mid-exchange
 */
export async function negotiateAuth(params: NegotiateAuthParams): Promise<AuthMechanism> {
  const { mechanisms, capabilities } = params
  const advertised = capabilities.authMechanisms

  const mechanism = mechanisms.find((m) => advertised.includes(m.toUpperCase()))

  if (!mechanism) throw AuthError.unsupported(mechanisms, advertised)

  params.logger.debug("Authenticating", { mechanism })

  try {
    switch (mechanism) {
      case "plain":
        await authPlain(params)
        break
      case "login":
        await authLogin(params)
        break
      case "cram-md5":
        throw AuthError.mechanismUnavailable(mechanism)
    }
  } catch (err) {
    if (err instanceof SmtpTimeoutError) throw AuthError.timeout(mechanism, err)

    throw err
  }

  return mechanism
}

async function authPlain({ credentials, exchange }: NegotiateAuthParams): Promise<void> {
  const payload = base64(`\0${credentials.username}\0${credentials.password}`)

  let reply = await exchange.command(`AUTH PLAIN ${payload}`, `AUTH PLAIN ${REDACTED}`)

  // Relays that reject the initial response ask for it again with an empty challenge.
  if (reply.code === 334) reply = await exchange.command(payload, REDACTED)

  if (reply.code !== 235) throw AuthError.rejected("plain", reply)
}

async function authLogin({ credentials, exchange, logger }: NegotiateAuthParams): Promise<void> {
  let reply = await exchange.command("AUTH LOGIN")

  for (const answer of [credentials.username, credentials.password]) {
    if (reply.code !== 334) throw AuthError.rejected("login", reply)

    logger.trace("AUTH LOGIN challenge", { challenge: decodeChallenge(reply) })

    reply = await exchange.command(base64(answer), REDACTED)
  }

  if (reply.code !== 235) throw AuthError.rejected("login", reply)
}

function base64(value: string): string {
  return Buffer.from(value, "utf8").toString("base64")
}

function decodeChallenge(reply: SmtpReply): string {
  return Buffer.from(reply.lines[0] ?? "", "base64").toString("utf8")
}

import type { Milliseconds } from "@postline/clock"
import { BaseError } from "@postline/errors"
import type { SessionState, SmtpReply } from "../../ports/session"

export class InvalidEmailError extends BaseError<"invalid_email"> {
  constructor(readonly invalidEmails: readonly string[]) {
    super(`Invalid email address: ${invalidEmails.map((e) => `"${e}"`).join(", ")}`, {
      code: "invalid_email",
      context: { invalidEmails },
    })
  }
}

export type EmailBuildErrorCode = "invalid_content" | "invalid_email"

export class EmailBuildError extends BaseError<EmailBuildErrorCode> {
  static invalidContent(reason: string, context?: Record<string, unknown>): EmailBuildError {
    return new EmailBuildError(reason, { code: "invalid_content", ...(context && { context }) })
  }

  static invalidEmail(cause: InvalidEmailError): EmailBuildError {
    return new EmailBuildError(cause.message, {
      code: "invalid_email",
      context: { invalidEmails: cause.invalidEmails },
      cause,
    })
  }
}

export type AuthErrorCode = "auth_unsupported" | "auth_rejected" | "auth_timeout"

export class AuthError extends BaseError<AuthErrorCode> {
  static unsupported(requested: readonly string[], advertised: readonly string[]): AuthError {
    return new AuthError(
      `No usable AUTH mechanism: requested [${requested.join(", ")}], server offers [${advertised.join(", ")}]`,
      { code: "auth_unsupported", context: { requested, advertised } },
    )
  }

  static mechanismUnavailable(mechanism: string): AuthError {
    return new AuthError(`AUTH ${mechanism.toUpperCase()} is not implemented`, {
      code: "auth_unsupported",
      context: { mechanism },
    })
  }

  static rejected(mechanism: string, reply: SmtpReply): AuthError {
    return new AuthError(`AUTH ${mechanism.toUpperCase()} rejected: ${reply.raw.join(" ")}`, {
      code: "auth_rejected",
      context: { mechanism, replyCode: reply.code, reply: reply.raw.join("\n") },
    })
  }

  static timeout(mechanism: string, cause: unknown): AuthError {
    return new AuthError(`AUTH ${mechanism.toUpperCase()} timed out`, {
      code: "auth_timeout",
      context: { mechanism },
      cause,
      isRetryable: true,
    })
  }
}

export type TlsErrorCode = "tls_unavailable" | "tls_failed"

export class TlsError extends BaseError<TlsErrorCode> {
  static unavailable(host: string): TlsError {
    return new TlsError(`${host} does not advertise STARTTLS`, {
      code: "tls_unavailable",
      context: { host },
    })
  }

  static failed(host: string, cause: unknown): TlsError {
    return new TlsError(`TLS upgrade with ${host} failed`, {
      code: "tls_failed",
      context: { host },
      cause,
      isRetryable: true,
    })
  }
}

export type SmtpResponseErrorCode =
  | "unexpected_reply"
  | "recipient_rejected"
  | "malformed_reply"
  | "message_too_large"

export class SmtpResponseError extends BaseError<SmtpResponseErrorCode> {
  get replyCode(): number | undefined {
    const code = this.context.replyCode

    return typeof code === "number" ? code : undefined
  }

  static unexpectedReply(command: string, reply: SmtpReply): SmtpResponseError {
    return new SmtpResponseError(`Unexpected reply to ${command}: ${reply.raw.join(" ")}`, {
      code: "unexpected_reply",
      context: { command, replyCode: reply.code, reply: reply.raw.join("\n") },
      isRetryable: isTransient(reply.code),
    })
  }

  static recipientRejected(recipient: string, reply: SmtpReply): SmtpResponseError {
    return new SmtpResponseError(`Recipient <${recipient}> rejected: ${reply.raw.join(" ")}`, {
      code: "recipient_rejected",
      context: {
        command: "RCPT TO",
        recipient,
        replyCode: reply.code,
        reply: reply.raw.join("\n"),
      },
      isRetryable: isTransient(reply.code),
    })
  }

  /** Raised before MAIL FROM when the relay's advertised SIZE is exceeded. */
  static messageTooLarge(size: number, limit: number): SmtpResponseError {
    return new SmtpResponseError(`Message of ${size} bytes exceeds the relay limit of ${limit}`, {
      code: "message_too_large",
      context: { size, limit },
    })
  }

  static malformed(command: string, line: string): SmtpResponseError {
    return new SmtpResponseError(`Malformed reply to ${command}: ${JSON.stringify(line)}`, {
      code: "malformed_reply",
      context: { command, reply: line },
    })
  }
}

export type SmtpTimeoutErrorCode = "connect_timeout" | "tls_timeout" | "response_timeout"

export class SmtpTimeoutError extends BaseError<SmtpTimeoutErrorCode> {
  static connect(host: string, port: number, timeoutMs: Milliseconds): SmtpTimeoutError {
    return new SmtpTimeoutError(`Connecting to ${host}:${port} timed out after ${timeoutMs}ms`, {
      code: "connect_timeout",
      context: { host, port, timeoutMs },
      isRetryable: true,
    })
  }

  static tlsHandshake(host: string, timeoutMs: Milliseconds): SmtpTimeoutError {
    return new SmtpTimeoutError(`TLS handshake with ${host} timed out after ${timeoutMs}ms`, {
      code: "tls_timeout",
      context: { host, timeoutMs },
      isRetryable: true,
    })
  }

  static response(timeoutMs: Milliseconds): SmtpTimeoutError {
    return new SmtpTimeoutError(`No reply within ${timeoutMs}ms`, {
      code: "response_timeout",
      context: { timeoutMs },
      isRetryable: true,
    })
  }
}

export type TransportErrorCode = "transport_failed" | "connection_closed"

export class TransportError extends BaseError<TransportErrorCode> {
  static failed(cause: unknown): TransportError {
    const detail = cause instanceof Error ? cause.message : String(cause)

    return new TransportError(`Transport failed: ${detail}`, {
      code: "transport_failed",
      cause,
      isRetryable: true,
    })
  }

  static closed(): TransportError {
    return new TransportError("Connection closed by peer", {
      code: "connection_closed",
      isRetryable: true,
    })
  }
}

export type SessionStateErrorCode =
  | "session_closed"
  | "session_busy"
  | "not_ready"
  | "invalid_transition"

export class SessionStateError extends BaseError<SessionStateErrorCode> {
  static closed(): SessionStateError {
    return new SessionStateError("Session is closed", { code: "session_closed" })
  }

  static busy(state: SessionState): SessionStateError {
    return new SessionStateError(`Session is busy (${state})`, {
      code: "session_busy",
      context: { state },
    })
  }

  static notReady(state: SessionState): SessionStateError {
    return new SessionStateError(`Session is not ready (${state})`, {
      code: "not_ready",
      context: { state },
    })
  }

  static invalidTransition(from: SessionState, to: SessionState): SessionStateError {
    return new SessionStateError(`Illegal session transition ${from} -> ${to}`, {
      code: "invalid_transition",
      context: { from, to },
      isOperational: false,
    })
  }
}

/** Errors caused by the caller's message data rather than the relay or network. */
export function isBuildError(err: unknown): err is EmailBuildError | InvalidEmailError {
  return err instanceof EmailBuildError || err instanceof InvalidEmailError
}

function isTransient(code: number): boolean {
  return code >= 400 && code < 500
}

export {
  MemoryRelay,
  type MemoryRelayOptions,
  type RelayedMessage,
  type RelayStep,
} from "./adapters/memory/memory-relay"
export {
  NodeSocketConnector,
  type NodeSocketConnectorOptions,
} from "./adapters/node/node-socket-connector"
export { findInvalidEmails, isValidEmail, validateAddress } from "./core/address/validate-address"
export { negotiateAuth, type NegotiateAuthParams, type SmtpExchange } from "./core/auth/negotiate-auth"
export {
  type BatchDeps,
  enqueueEmail,
  enqueueEmails,
  processBatch,
  processQueueBatch,
} from "./core/batch/process-batch"
export {
  type LoadMailerConfigOptions,
  loadMailerConfig,
  type MailerConfig,
  type MailerEnv,
  mailerEnvSchema,
  toMailerConfig,
} from "./core/config/load-mailer-config"
export { parseQueueEmailMessage } from "./core/config/parse-queue-message"
export { resolveMailerOptions } from "./core/config/resolve-mailer-options"
export { createEmail, envelopeOf } from "./core/email/create-email"
export {
  AuthError,
  type AuthErrorCode,
  EmailBuildError,
  type EmailBuildErrorCode,
  InvalidEmailError,
  isBuildError,
  SessionStateError,
  type SessionStateErrorCode,
  SmtpResponseError,
  type SmtpResponseErrorCode,
  SmtpTimeoutError,
  type SmtpTimeoutErrorCode,
  TlsError,
  type TlsErrorCode,
  TransportError,
  type TransportErrorCode,
} from "./core/errors/errors"
export { Mailer, type MailerDeps } from "./core/mailer/mailer"
export {
  type BuildMessageDeps,
  buildMessage,
  buildMimeMessage,
  defaultBuildDeps,
} from "./core/mime/build-message"
export { ServerCapabilities } from "./core/protocol/capabilities"
export { SmtpSession, type SmtpSessionDeps } from "./core/session/smtp-session"
export type * from "./ports/address"
export type * from "./ports/connection"
export type * from "./ports/hooks"
export { type AuthMechanism, authMechanisms, type Credentials } from "./ports/mailer-options"
export type { MailerOptions, MailerSettings, ResolvedMailerOptions } from "./ports/mailer-options"
export type * from "./ports/message"
export type * from "./ports/outcome"
export type * from "./ports/queue"
export type * from "./ports/session"

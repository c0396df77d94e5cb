export type SessionState =
  | "disconnected"
  | "connected"
  | "greeted"
  | "tls_upgraded"
  | "authenticated"
  | "ready"
  | "in_transaction"
  | "closed"

export type SmtpReply = Readonly<{
  code: number

  /** Text of each line, code and separator removed. */
  lines: readonly string[]

  /** Lines as received. */
  raw: readonly string[]
}>

export type DeliveryReceipt = Readonly<{
  /** Final reply to the message body, as received. */
  response: string
  accepted: readonly string[]
}>

import type { Milliseconds } from "@postline/clock"

export type ConnectParams = {
  host: string
  port: number

  /** Implicit TLS from the first byte. */
  secure: boolean

  timeoutMs: Milliseconds
}

/**
 * One duplex byte stream to a relay. SMTP is half-duplex, so the session
 * never has more than one read outstanding.
 */
export interface SmtpConnection {
  /**
   * Next CRLF-terminated line, without the terminator.
   * Rejects with a response timeout when nothing arrives within `timeoutMs`.
   */
  readLine(timeoutMs: Milliseconds): Promise<string>

  write(data: string): Promise<void>

  /** Upgrades the stream in place and returns the connection to use from now on. */
  upgradeToTls(): Promise<SmtpConnection>

  close(): Promise<void>
}

export interface SmtpConnector {
  connect(params: ConnectParams): Promise<SmtpConnection>
}

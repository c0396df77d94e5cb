import net from "node:net"
import { StringDecoder } from "node:string_decoder"
import tls from "node:tls"
import type { Milliseconds } from "@postline/clock"
import type { AppError } from "@postline/errors"
import { SmtpTimeoutError, TransportError } from "../../core/errors/errors"
import type { ConnectParams, SmtpConnection, SmtpConnector } from "../../ports/connection"

export type NodeSocketConnectorOptions = {
  /**
   * Extra TLS settings for implicit TLS and STARTTLS, such as `ca` or
   * `rejectUnauthorized`. `socket`, `host`, `port` and `servername` are set
   * by the connector.
   */
  tls?: tls.ConnectionOptions
}

/** Connects over `node:net`, or `node:tls` when `secure` is set. */
export class NodeSocketConnector implements SmtpConnector {
  constructor(private readonly options: NodeSocketConnectorOptions = {}) {}

  connect({ host, port, secure, timeoutMs }: ConnectParams): Promise<SmtpConnection> {
    const tlsOptions = this.options.tls ?? {}

    return new Promise((resolve, reject) => {
      const socket = secure
        ? tls.connect({ ...tlsOptions, host, port, ...serverName(host) })
        : net.connect({ host, port })

      const readyEvent = secure ? "secureConnect" : "connect"

      const cleanup = () => {
        clearTimeout(timer)
        socket.off(readyEvent, onReady)
        socket.off("error", onError)
      }

      const onReady = () => {
        cleanup()
        resolve(new NodeSmtpConnection(socket, host, tlsOptions, timeoutMs))
      }

      const onError = (err: Error) => {
        cleanup()
        socket.destroy()
        reject(TransportError.failed(err))
      }

      const timer = setTimeout(() => {
        cleanup()
        socket.destroy()
        reject(SmtpTimeoutError.connect(host, port, timeoutMs))
      }, timeoutMs)

      socket.once(readyEvent, onReady)
      socket.once("error", onError)
    })
  }
}

type Waiter = {
  resolve(line: string): void
  reject(error: AppError): void
}

class NodeSmtpConnection implements SmtpConnection {
  private readonly decoder = new StringDecoder("utf8")
  private buffer = ""
  private readonly lines: string[] = []
  private waiter?: Waiter
  private failure?: AppError

  constructor(
    private readonly socket: net.Socket,
    private readonly host: string,
    private readonly tlsOptions: tls.ConnectionOptions,
    /** Bounds the STARTTLS handshake, like the initial connect. */
    private readonly handshakeTimeoutMs: Milliseconds,
  ) {
    socket.on("data", this.onData)
    socket.on("error", this.onError)
    socket.on("close", this.onClose)
  }

  readLine(timeoutMs: Milliseconds): Promise<string> {
    const line = this.lines.shift()

    if (line !== undefined) return Promise.resolve(line)
    if (this.failure) return Promise.reject(this.failure)
    if (this.waiter) return Promise.reject(new Error("readLine called while a read is pending"))

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

  write(data: string): Promise<void> {
    if (this.failure) return Promise.reject(this.failure)

    return new Promise((resolve, reject) => {
      this.socket.write(data, "utf8", (err) => {
        if (err) reject(TransportError.failed(err))
        else resolve()
      })
    })
  }

  upgradeToTls(): Promise<SmtpConnection> {
    if (this.failure) return Promise.reject(this.failure)

    this.detach()

    return new Promise((resolve, reject) => {
      const secure = tls.connect({
        ...this.tlsOptions,
        socket: this.socket,
        ...serverName(this.host),
      })

      const cleanup = () => {
        clearTimeout(timer)
        secure.off("secureConnect", onSecure)
        secure.off("error", onError)
      }

      const onSecure = () => {
        cleanup()
        resolve(
          new NodeSmtpConnection(secure, this.host, this.tlsOptions, this.handshakeTimeoutMs),
        )
      }

      const onError = (err: Error) => {
        cleanup()
        secure.destroy()
        reject(TransportError.failed(err))
      }

      const timer = setTimeout(() => {
        cleanup()
        secure.destroy()
        reject(SmtpTimeoutError.tlsHandshake(this.host, this.handshakeTimeoutMs))
      }, this.handshakeTimeoutMs)

      secure.once("secureConnect", onSecure)
      secure.once("error", onError)
    })
  }

  async close(): Promise<void> {
    this.fail(TransportError.closed())
    this.detach()
    this.socket.destroy()
  }

  private readonly onData = (chunk: Buffer) => {
    this.buffer += this.decoder.write(chunk)

    let newline = this.buffer.indexOf("\n")

    while (newline >= 0) {
      this.lines.push(this.buffer.slice(0, newline).replace(/\r$/, ""))
      this.buffer = this.buffer.slice(newline + 1)
      newline = this.buffer.indexOf("\n")
    }

    if (this.waiter && this.lines.length > 0) {
      const line = this.lines.shift()
      if (line !== undefined) this.waiter.resolve(line)
    }
  }

  private readonly onError = (err: Error) => {
    this.fail(TransportError.failed(err))
  }

  private readonly onClose = () => {
    this.fail(TransportError.closed())
  }

  private fail(error: AppError): void {
    this.failure ??= error
    this.waiter?.reject(this.failure)
  }

  private detach(): void {
    this.socket.off("data", this.onData)
    this.socket.off("error", this.onError)
    this.socket.off("close", this.onClose)
  }
}

/** SNI is only sent for host names, never for IP literals. */
function serverName(host: string): { servername?: string } {
  return net.isIP(host) === 0 ? { servername: host } : {}
}

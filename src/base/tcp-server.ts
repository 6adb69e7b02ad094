import * as net from "net"
import {
  type AcceptResult,
  type InterestMask,
  type ListenerDescriptor,
  type PeerAddress,
  type Waker,
  Interest,
  errorCode,
  nextDescriptorId,
} from "./descriptor"
import TCPStream from "./tcp-connection"

export interface ListenOptions {
  // empty for all interfaces
  host: string
  port: number
  backlog?: number
}

/**
 * The listening socket. Connections handed over by the server wait in a
 * queue until `accept()` takes them, so the listener is readable while that
 * queue is not empty.
 */
export default class TCPListener implements ListenerDescriptor {
  readonly id = nextDescriptorId()
  private readonly backlog: TCPStream[] = []
  private readonly acceptErrors: Error[] = []
  private waker: Waker | null = null
  // a failure seen while nothing was watching
  private failure: Error | null = null
  private closing = false

  private constructor(private readonly server: net.Server) {
    server.on("connection", this.onConnection.bind(this))
    server.on("error", this.onError.bind(this))
    server.on("close", this.onClose.bind(this))
  }

  static async listen(options: ListenOptions): Promise<TCPListener> {
    const server = net.createServer({ pauseOnConnect: true, noDelay: true })
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject)
      server.listen(
        {
          host: options.host == "" ? undefined : options.host,
          port: options.port,
          backlog: options.backlog,
        },
        () => {
          server.off("error", reject)
          resolve()
        },
      )
    })
    return new TCPListener(server)
  }

  poll(): InterestMask {
    return this.backlog.length > 0 || this.acceptErrors.length > 0
      ? Interest.READABLE
      : 0
  }

  watch(waker: Waker) {
    this.waker = waker
    if (this.failure) waker.fail(this.failure)
  }

  unwatch() {
    this.waker = null
  }

  accept(): AcceptResult {
    const error = this.acceptErrors.shift()
    if (error) return { kind: "error", code: errorCode(error), error }

    const stream = this.backlog.shift()
    return stream ? { kind: "ok", stream } : { kind: "would-block" }
  }

  address(): PeerAddress {
    const address = this.server.address()
    if (address == null || typeof address == "string") {
      return { host: address ?? "", port: 0 }
    }
    return { host: address.address, port: address.port }
  }

  /**
   * Stops listening. The server's own close callback waits until every
   * accepted socket is gone, so it is not awaited here: released
   * connections finish on their own.
   */
  async close(): Promise<void> {
    this.closing = true
    this.waker = null
    // connections that were never accepted
    for (const stream of this.backlog.splice(0)) {
      stream.close({ force: true })
    }
    // already closed when the server went away under the loop
    if (!this.server.listening) return
    this.server.close()
  }

  private onConnection(socket: net.Socket) {
    if (this.closing) {
      socket.destroy()
      return
    }
    this.backlog.push(new TCPStream(socket))
    this.waker?.wake()
  }

  private onError(err: Error) {
    if ("syscall" in err && err.syscall == "accept") {
      this.acceptErrors.push(err)
      this.waker?.wake()
      return
    }
    this.fail(err)
  }

  private onClose() {
    if (!this.closing) {
      this.fail(new Error("listening socket closed unexpectedly"))
    }
  }

  private fail(err: Error) {
    this.failure ??= err
    this.waker?.fail(err)
  }
}

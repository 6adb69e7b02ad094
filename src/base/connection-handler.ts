import {
  type CloseOptions,
  type InterestMask,
  type PeerAddress,
  type StreamDescriptor,
  formatPeer,
  isDisconnectCode,
} from "./descriptor"
import type { Logger } from "./log"
import type { DispatchHandler } from "./registration-table"
import type Selector from "./selector"

/**
 * What the protocol layer sees of a connection.
 */
export interface Connection {
  readonly id: number
  // queried from the stream on every access
  readonly peer: PeerAddress
  // false when the write failed; the connection is then closed after on-read
  send(data: Buffer): boolean
}

export interface ConnectionCallbacks {
  onConnect?: (conn: Connection) => void
  // true keeps the connection open
  onRead?: (conn: Connection, data: Buffer) => boolean
  onDisconnect?: (conn: Connection) => void
}

export interface ConnectionOptions {
  chunkSize: number
  logger: Logger
}

export const DEFAULT_CHUNK_SIZE = 1024

export default class ConnectionHandler implements DispatchHandler {
  readonly kind = "connection"
  readonly connection: Connection
  private sendError: string | null = null

  constructor(
    private readonly stream: StreamDescriptor,
    private readonly selector: Selector,
    private readonly callbacks: ConnectionCallbacks,
    private readonly options: ConnectionOptions,
  ) {
    this.connection = {
      id: stream.id,
      get peer() {
        return stream.peer()
      },
      send: (data) => this.send(data),
    }
  }

  /**
   * Runs on-connect once the stream is registered.
   */
  connected() {
    try {
      this.callbacks.onConnect?.(this.connection)
    } catch (error) {
      this.options.logger.error(
        `on-connect failed for ${this.describe()}:`,
        error,
      )
      this.disconnect()
    }
  }

  handle(_ready: InterestMask) {
    const result = this.stream.read(this.options.chunkSize)
    switch (result.kind) {
      case "would-block":
        return
      case "peer-closed":
        this.options.logger.log(`connection closed by ${this.describe()}`)
        break
      case "error":
        if (isDisconnectCode(result.code)) {
          this.options.logger.log(
            `connection lost with ${this.describe()} (${result.code})`,
          )
        } else {
          this.options.logger.error(
            `read failed on ${this.describe()}:`,
            result.error,
          )
        }
        break
      case "ok":
        if (this.dispatchRead(result.data)) return
        break
    }
    this.disconnect()
  }

  /**
   * The only path that releases the stream: on-disconnect, unregister, close.
   * Once it has run the stream is no longer in the selector, so it is never
   * dispatched (or disconnected) again. Shutdown forces the close so a peer
   * that stopped reading cannot hold the stream open.
   */
  disconnect(options: CloseOptions = {}) {
    try {
      this.callbacks.onDisconnect?.(this.connection)
    } catch (error) {
      this.options.logger.error(
        `on-disconnect failed for ${this.describe()}:`,
        error,
      )
    }
    this.selector.unregister(this.stream)
    this.stream.close(options)
  }

  private dispatchRead(data: Buffer): boolean {
    const onRead = this.callbacks.onRead
    if (!onRead) return false

    let keepOpen: boolean
    try {
      keepOpen = onRead(this.connection, data)
    } catch (error) {
      this.options.logger.error(`on-read failed for ${this.describe()}:`, error)
      return false
    }

    if (this.sendError) {
      this.options.logger.log(
        `send to ${this.describe()} failed (${this.sendError})`,
      )
      return false
    }
    return keepOpen
  }

  private send(data: Buffer): boolean {
    const result = this.stream.write(data)
    if (result.kind == "ok") return true

    this.sendError ??= result.code
    return false
  }

  private describe(): string {
    return formatPeer(this.stream.peer())
  }
}

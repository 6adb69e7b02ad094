import {
  type ListenerDescriptor,
  type PeerAddress,
  Interest,
  formatPeer,
} from "./descriptor"
import AcceptHandler from "./accept-handler"
import ConnectionHandler, {
  type ConnectionCallbacks,
  DEFAULT_CHUNK_SIZE,
} from "./connection-handler"
import { type Logger, consoleLogger } from "./log"
import Selector from "./selector"
import TCPListener, { type ListenOptions } from "./tcp-server"

export type LoopState = "running" | "stopped"

export interface EventLoopOptions {
  chunkSize?: number
  maxConnections?: number
  logger?: Logger
}

/**
 * Owns the listener and the selector for the lifetime of one server.
 *
 * `run()` waits for readiness and dispatches each ready descriptor to its
 * handler until `stop()` is called or the selector fails. Shutting down runs
 * the disconnect path for every remaining client and closes the listener
 * last.
 */
export default class EventLoop {
  private current: LoopState = "running"
  private stopRequested = false
  private readonly selector: Selector
  private readonly logger: Logger

  constructor(
    private readonly listener: ListenerDescriptor,
    callbacks: ConnectionCallbacks,
    options: EventLoopOptions = {},
  ) {
    this.logger = options.logger ?? consoleLogger
    // the listener takes one slot of the limit
    this.selector = new Selector({
      maxDescriptors:
        options.maxConnections === undefined
          ? undefined
          : options.maxConnections + 1,
    })
    const handler = new AcceptHandler(listener, this.selector, callbacks, {
      chunkSize: options.chunkSize ?? DEFAULT_CHUNK_SIZE,
      logger: this.logger,
    })
    this.selector.register(listener, Interest.READABLE, handler)
  }

  static async start(
    listenOptions: ListenOptions,
    callbacks: ConnectionCallbacks,
    options: EventLoopOptions = {},
  ): Promise<EventLoop> {
    const listener = await TCPListener.listen(listenOptions)
    return new EventLoop(listener, callbacks, options)
  }

  get state(): LoopState {
    return this.current
  }

  get address(): PeerAddress {
    return this.listener.address()
  }

  get connectionCount(): number {
    const listening = this.selector.isRegistered(this.listener) ? 1 : 0
    return this.selector.size - listening
  }

  hasConnection(id: number): boolean {
    return this.selector
      .registrations()
      .some(
        ({ descriptor, handler }) =>
          descriptor.id == id && handler.kind == "connection",
      )
  }

  async run(): Promise<void> {
    this.logger.log(`listening on ${formatPeer(this.address)}`)
    try {
      while (!this.stopRequested) {
        const events = await this.selector.wait()
        for (const event of events) {
          // a handler earlier in this batch may have released it
          if (!this.selector.isRegistered(event.descriptor)) continue
          event.handler.handle(event.mask)
        }
      }
    } catch (error) {
      this.logger.error("event loop failed:", error)
      throw error
    } finally {
      await this.shutdown()
    }
  }

  stop() {
    this.stopRequested = true
    this.selector.interrupt()
  }

  private async shutdown() {
    for (const { handler } of this.selector.registrations()) {
      if (handler instanceof ConnectionHandler) {
        handler.disconnect({ force: true })
      }
    }
    this.selector.close()
    this.current = "stopped"
    await this.listener.close()
    this.logger.log("event loop stopped")
  }
}

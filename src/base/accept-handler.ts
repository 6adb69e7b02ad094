import {
  type InterestMask,
  type ListenerDescriptor,
  type StreamDescriptor,
  Interest,
  formatPeer,
} from "./descriptor"
import { CapacityExceededError } from "./errors"
import type { DispatchHandler } from "./registration-table"
import type Selector from "./selector"
import ConnectionHandler, {
  type ConnectionCallbacks,
  type ConnectionOptions,
} from "./connection-handler"

/**
 * Bound to the listening descriptor. Takes one pending connection per
 * readiness event; the selector reports the listener again while more are
 * waiting.
 */
export default class AcceptHandler implements DispatchHandler {
  readonly kind = "accept"

  constructor(
    private readonly listener: ListenerDescriptor,
    private readonly selector: Selector,
    private readonly callbacks: ConnectionCallbacks,
    private readonly options: ConnectionOptions,
  ) {}

  handle(_ready: InterestMask) {
    const result = this.listener.accept()
    switch (result.kind) {
      case "would-block":
        // spurious wake
        return
      case "error":
        this.options.logger.error(
          `accept failed (${result.code}):`,
          result.error.message,
        )
        return
      case "ok":
        this.admit(result.stream)
        return
    }
  }

  private admit(stream: StreamDescriptor) {
    const handler = new ConnectionHandler(
      stream,
      this.selector,
      this.callbacks,
      this.options,
    )
    try {
      this.selector.register(stream, Interest.READABLE, handler)
    } catch (error) {
      if (!(error instanceof CapacityExceededError)) throw error

      this.options.logger.error(
        `refusing ${formatPeer(stream.peer())}: ${error.message}`,
      )
      stream.close()
      return
    }
    handler.connected()
  }
}

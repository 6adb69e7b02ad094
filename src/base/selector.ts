import { setImmediate } from "timers/promises"
import {
  type Descriptor,
  type InterestMask,
  type Waker,
  isValidInterest,
} from "./descriptor"
import {
  CapacityExceededError,
  InvalidInterestError,
  MultiplexerFailureError,
} from "./errors"
import RegistrationTable, {
  type DispatchHandler,
  type Registration,
} from "./registration-table"

export interface ReadyEvent {
  readonly descriptor: Descriptor
  // the ready conditions, restricted to the registered interest
  readonly mask: InterestMask
  readonly handler: DispatchHandler
}

export interface SelectorOptions {
  // no limit when absent
  maxDescriptors?: number
}

/**
 * The readiness multiplexer.
 *
 * Readiness is level-triggered: `wait()` polls every watched descriptor and
 * returns those whose current readiness overlaps their interest. When none is
 * ready it suspends until a descriptor reports a change, then polls again.
 */
export default class Selector {
  private readonly table = new RegistrationTable()
  private readonly waker: Waker
  private wakeup: (() => void) | null = null
  private interrupted = false
  private failure: Error | null = null

  constructor(private readonly options: SelectorOptions = {}) {
    this.waker = {
      wake: () => this.notify(),
      fail: (error) => {
        this.failure ??= error
        this.notify()
      },
    }
  }

  register(
    descriptor: Descriptor,
    mask: InterestMask,
    handler: DispatchHandler,
  ) {
    if (!isValidInterest(mask)) {
      throw new InvalidInterestError(mask)
    }
    const limit = this.options.maxDescriptors
    if (
      limit !== undefined &&
      !this.table.has(descriptor) &&
      this.table.size() >= limit
    ) {
      throw new CapacityExceededError(limit)
    }

    this.table.add({ descriptor, mask, handler })
    descriptor.watch(this.waker)
    // the descriptor may already be ready
    this.notify()
  }

  unregister(descriptor: Descriptor): Registration {
    const registration = this.table.remove(descriptor)
    descriptor.unwatch()
    return registration
  }

  isRegistered(descriptor: Descriptor): boolean {
    return this.table.has(descriptor)
  }

  registrations(): Registration[] {
    return this.table.values()
  }

  get size(): number {
    return this.table.size()
  }

  /**
   * Resolves with every ready registration. Resolves with an empty array only
   * after `interrupt()`; rejects with `MultiplexerFailureError` once a
   * descriptor has reported a failure.
   */
  async wait(): Promise<ReadyEvent[]> {
    for (;;) {
      // lets socket events queued by the OS land before polling
      await setImmediate()

      if (this.failure) {
        throw new MultiplexerFailureError(this.failure)
      }
      if (this.interrupted) {
        this.interrupted = false
        return []
      }

      const ready = this.collect()
      if (ready.length > 0) return ready

      await new Promise<void>((resolve) => {
        this.wakeup = resolve
      })
    }
  }

  /**
   * Makes the pending (or the next) `wait()` return without ready events.
   */
  interrupt() {
    this.interrupted = true
    this.notify()
  }

  close() {
    for (const { descriptor } of this.table.values()) {
      descriptor.unwatch()
    }
    this.table.clear()
    this.interrupt()
  }

  private collect(): ReadyEvent[] {
    const ready: ReadyEvent[] = []
    for (const { descriptor, mask, handler } of this.table.values()) {
      const readyMask = descriptor.poll() & mask
      if (readyMask != 0) {
        ready.push({ descriptor, mask: readyMask, handler })
      }
    }
    return ready
  }

  private notify() {
    const wakeup = this.wakeup
    this.wakeup = null
    wakeup?.()
  }
}

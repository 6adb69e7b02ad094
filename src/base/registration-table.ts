import type { Descriptor, InterestMask } from "./descriptor"
import { DuplicateRegistrationError, NotRegisteredError } from "./errors"

/**
 * One unit of reactive work, bound to the descriptor it was registered with.
 */
export interface DispatchHandler {
  readonly kind: "accept" | "connection"
  handle(ready: InterestMask): void
}

export interface Registration {
  readonly descriptor: Descriptor
  readonly mask: InterestMask
  readonly handler: DispatchHandler
}

/**
 * Maps descriptor ids to their registrations. A descriptor appears at most
 * once.
 */
export default class RegistrationTable {
  private readonly entries = new Map<number, Registration>()

  add(registration: Registration) {
    const id = registration.descriptor.id
    if (this.entries.has(id)) {
      throw new DuplicateRegistrationError(id)
    }
    this.entries.set(id, registration)
  }

  remove(descriptor: Descriptor): Registration {
    const registration = this.entries.get(descriptor.id)
    if (!registration) {
      throw new NotRegisteredError(descriptor.id)
    }
    this.entries.delete(descriptor.id)
    return registration
  }

  get(descriptor: Descriptor): Registration | undefined {
    return this.entries.get(descriptor.id)
  }

  has(descriptor: Descriptor): boolean {
    return this.entries.has(descriptor.id)
  }

  size(): number {
    return this.entries.size
  }

  values(): Registration[] {
    return [...this.entries.values()]
  }

  clear() {
    this.entries.clear()
  }
}

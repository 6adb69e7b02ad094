import {
  type AcceptResult,
  type CloseOptions,
  type InterestMask,
  type ListenerDescriptor,
  type PeerAddress,
  type ReadResult,
  type StreamDescriptor,
  type Waker,
  type WriteResult,
  Interest,
  nextDescriptorId,
} from "../src/base/descriptor"
import type { Logger } from "../src/base/log"

function errnoError(code: string): Error {
  return Object.assign(new Error(code), { code })
}

/**
 * An in-memory stream: tests push chunks, EOF or errors into it and inspect
 * what the server wrote back.
 */
export class FakeStream implements StreamDescriptor {
  readonly id = nextDescriptorId()
  readonly written: Buffer[] = []
  closeCount = 0
  forced = false
  waker: Waker | null = null
  private readonly incoming: Buffer[] = []
  private eof = false
  private error: Error | null = null
  private writeError: string | null = null

  constructor(private readonly address: PeerAddress) {}

  receive(text: string) {
    this.incoming.push(Buffer.from(text))
    this.waker?.wake()
  }

  shutdown() {
    this.eof = true
    this.waker?.wake()
  }

  reset(code = "ECONNRESET") {
    this.error = errnoError(code)
    this.waker?.wake()
  }

  failWrites(code = "EPIPE") {
    this.writeError = code
  }

  replies(): string[] {
    return this.written.map((data) => data.toString())
  }

  poll(): InterestMask {
    const readable = this.incoming.length > 0 || this.eof || this.error != null
    return (readable ? Interest.READABLE : 0) | Interest.WRITABLE
  }

  watch(waker: Waker) {
    this.waker = waker
  }

  unwatch() {
    this.waker = null
  }

  read(maxBytes: number): ReadResult {
    if (this.error) {
      const error = this.error
      return { kind: "error", code: error.message, error }
    }
    const chunk = this.incoming.shift()
    if (chunk) {
      if (chunk.length > maxBytes) {
        this.incoming.unshift(chunk.subarray(maxBytes))
        return { kind: "ok", data: chunk.subarray(0, maxBytes) }
      }
      return { kind: "ok", data: chunk }
    }
    if (this.eof) return { kind: "peer-closed" }
    return { kind: "would-block" }
  }

  write(data: Buffer): WriteResult {
    if (this.writeError) {
      return {
        kind: "error",
        code: this.writeError,
        error: errnoError(this.writeError),
      }
    }
    this.written.push(Buffer.from(data))
    return { kind: "ok", written: data.length }
  }

  peer(): PeerAddress {
    return this.address
  }

  close(options: CloseOptions = {}) {
    this.closeCount += 1
    this.forced = options.force ?? false
  }
}

export class FakeListener implements ListenerDescriptor {
  readonly id = nextDescriptorId()
  closed = false
  waker: Waker | null = null
  private readonly pending: FakeStream[] = []
  private readonly errors: Error[] = []
  private spurious = false

  connect(stream: FakeStream) {
    this.pending.push(stream)
    this.waker?.wake()
  }

  // reports readable once with nothing to accept
  spuriousWake() {
    this.spurious = true
    this.waker?.wake()
  }

  failAccept(code: string) {
    this.errors.push(errnoError(code))
    this.waker?.wake()
  }

  crash(error: Error) {
    this.waker?.fail(error)
  }

  poll(): InterestMask {
    const ready =
      this.pending.length > 0 || this.errors.length > 0 || this.spurious
    return ready ? Interest.READABLE : 0
  }

  watch(waker: Waker) {
    this.waker = waker
  }

  unwatch() {
    this.waker = null
  }

  accept(): AcceptResult {
    this.spurious = false
    const error = this.errors.shift()
    if (error) return { kind: "error", code: error.message, error }
    const stream = this.pending.shift()
    return stream ? { kind: "ok", stream } : { kind: "would-block" }
  }

  address(): PeerAddress {
    return { host: "127.0.0.1", port: 50007 }
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

export function peer(port: number): PeerAddress {
  return { host: "10.0.0.1", port }
}

export class MemoryLogger implements Logger {
  readonly lines: string[] = []
  readonly errors: string[] = []

  log(...args: unknown[]) {
    this.lines.push(args.map(String).join(" "))
  }

  error(...args: unknown[]) {
    this.errors.push(args.map(String).join(" "))
  }
}

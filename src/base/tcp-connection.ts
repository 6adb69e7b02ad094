import * as net from "net"
import {
  type CloseOptions,
  type InterestMask,
  type PeerAddress,
  type ReadResult,
  type StreamDescriptor,
  type Waker,
  type WriteResult,
  Interest,
  errorCode,
  nextDescriptorId,
} from "./descriptor"

/**
 * A connected socket driven in paused mode: data is only taken out of the
 * socket by `read()`, and readiness is derived from the socket's events.
 */
export default class TCPStream implements StreamDescriptor {
  readonly id = nextDescriptorId()
  // from the 'error' event
  private err?: Error
  // from the 'end' event
  private ended = false
  // a 'readable' event that no read has consumed yet
  private pending = false
  private waker: Waker | null = null

  constructor(private readonly socket: net.Socket) {
    // kept for the socket's whole life, so late errors never go unhandled
    socket.on("error", this.onError.bind(this))
    socket.on("readable", this.onReadable.bind(this))
    socket.on("end", this.onEnd.bind(this))
    // the socket remembers its peer from the first lookup, which only
    // succeeds while the handle is open
    this.peer()
  }

  poll(): InterestMask {
    let ready = 0
    const buffered = this.socket.readableLength > 0
    if (this.err || this.ended || this.pending || buffered) {
      ready |= Interest.READABLE
    }
    if (this.err || !this.socket.writableNeedDrain) {
      ready |= Interest.WRITABLE
    }
    return ready
  }

  watch(waker: Waker) {
    this.waker = waker
  }

  unwatch() {
    this.waker = null
  }

  read(maxBytes: number): ReadResult {
    if (this.err) {
      return { kind: "error", code: errorCode(this.err), error: this.err }
    }

    const available = this.socket.readableLength
    if (available > 0) {
      const data: unknown = this.socket.read(Math.min(maxBytes, available))
      if (Buffer.isBuffer(data)) {
        // the next 'readable' sets it again
        if (this.socket.readableLength == 0) this.pending = false
        return { kind: "ok", data }
      }
    }

    if (this.ended) return { kind: "peer-closed" }

    // read(0) asks for more data and lets the stream notice EOF and emit 'end'
    this.pending = false
    this.socket.read(0)
    return { kind: "would-block" }
  }

  write(data: Buffer): WriteResult {
    if (this.err) {
      return { kind: "error", code: errorCode(this.err), error: this.err }
    }
    if (this.socket.destroyed || !this.socket.writable) {
      const error = Object.assign(new Error("write after end"), {
        code: "EPIPE",
      })
      return { kind: "error", code: "EPIPE", error }
    }

    this.socket.write(data)
    return { kind: "ok", written: data.length }
  }

  peer(): PeerAddress {
    return {
      host: this.socket.remoteAddress ?? "",
      port: this.socket.remotePort ?? 0,
    }
  }

  close(options: CloseOptions = {}) {
    if (options.force) {
      this.socket.destroy()
      return
    }
    // flushes what was written before releasing the socket
    this.socket.end(() => this.socket.destroy())
  }

  private onReadable() {
    this.pending = true
    this.waker?.wake()
  }

  private onEnd() {
    this.ended = true
    this.waker?.wake()
  }

  private onError(err: Error) {
    this.err = err
    this.waker?.wake()
  }
}

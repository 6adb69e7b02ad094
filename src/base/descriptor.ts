/**
 * Readiness conditions a registration can ask for.
 */
export const Interest = {
  READABLE: 1,
  WRITABLE: 2,
} as const

export type InterestMask = number

const ALL_INTEREST = Interest.READABLE | Interest.WRITABLE

export function isValidInterest(mask: InterestMask): boolean {
  return Number.isInteger(mask) && mask > 0 && (mask & ~ALL_INTEREST) == 0
}

export interface PeerAddress {
  host: string
  port: number
}

export function formatPeer(peer: PeerAddress): string {
  return peer.host.includes(":")
    ? `[${peer.host}]:${peer.port}`
    : `${peer.host}:${peer.port}`
}

export type ReadResult =
  | { kind: "ok"; data: Buffer }
  | { kind: "would-block" }
  | { kind: "peer-closed" }
  | { kind: "error"; code: string; error: Error }

export type WriteResult =
  | { kind: "ok"; written: number }
  | { kind: "error"; code: string; error: Error }

export type AcceptResult =
  | { kind: "ok"; stream: StreamDescriptor }
  | { kind: "would-block" }
  | { kind: "error"; code: string; error: Error }

/**
 * Receives readiness notifications from a watched descriptor.
 *
 * `wake` only says "something changed"; the multiplexer re-polls every
 * descriptor to find out what. `fail` reports a condition the loop cannot
 * recover from.
 */
export interface Waker {
  wake(): void
  fail(error: Error): void
}

export interface Descriptor {
  readonly id: number
  // the readiness conditions that hold right now (level-triggered)
  poll(): InterestMask
  watch(waker: Waker): void
  unwatch(): void
}

export interface CloseOptions {
  // release now instead of waiting for queued writes to reach the peer
  force?: boolean
}

export interface StreamDescriptor extends Descriptor {
  read(maxBytes: number): ReadResult
  write(data: Buffer): WriteResult
  peer(): PeerAddress
  close(options?: CloseOptions): void
}

export interface ListenerDescriptor extends Descriptor {
  accept(): AcceptResult
  address(): PeerAddress
  close(): Promise<void>
}

// connection-reset / broken-pipe class
const DISCONNECT_CODES = new Set([
  "ECONNRESET",
  "EPIPE",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ERR_STREAM_DESTROYED",
  "ERR_STREAM_WRITE_AFTER_END",
])

export function isDisconnectCode(code: string): boolean {
  return DISCONNECT_CODES.has(code)
}

export function errorCode(error: Error): string {
  if ("code" in error && typeof error.code == "string") return error.code
  return "EUNKNOWN"
}

let lastDescriptorId = 0

/**
 * Descriptor ids are unique for the lifetime of the process.
 */
export function nextDescriptorId(): number {
  lastDescriptorId += 1
  return lastDescriptorId
}

import type { Connection, ConnectionCallbacks } from "./base/connection-handler"
import { formatPeer } from "./base/descriptor"
import EventLoop, { type EventLoopOptions } from "./base/event-loop"
import { type Logger, consoleLogger } from "./base/log"
import type { ListenOptions } from "./base/tcp-server"

const CLOSE = Buffer.from("close")

/**
 * Replies to every chunk with the same bytes, ASCII letters upper-cased.
 * A chunk that is exactly `close` ends the connection.
 */
export function upperEchoCallbacks(
  logger: Logger = consoleLogger,
): ConnectionCallbacks {
  return {
    onConnect: (conn) => {
      logger.log("Connected by", formatPeer(conn.peer))
    },
    onRead: (conn, data) => handle(conn, data, logger),
    onDisconnect: (conn) => {
      logger.log("Disconnected by", formatPeer(conn.peer))
    },
  }
}

function handle(conn: Connection, data: Buffer, logger: Logger): boolean {
  logger.log("data:", data.toString(), "from", formatPeer(conn.peer))
  if (data.equals(CLOSE)) return false

  const reply = toUpperAscii(data)
  logger.log("send:", reply.toString(), "to", formatPeer(conn.peer))
  return conn.send(reply)
}

export function toUpperAscii(data: Buffer): Buffer {
  const out = Buffer.from(data)
  for (let i = 0; i < out.length; i++) {
    // 'a'..'z'
    if (out[i] >= 0x61 && out[i] <= 0x7a) out[i] -= 0x20
  }
  return out
}

/**
 * Starts a multiplexed TCP server speaking the upper-case echo protocol.
 */
export default async function startUpperEchoServer(
  listenOptions: ListenOptions,
  options: EventLoopOptions = {},
): Promise<EventLoop> {
  const callbacks = upperEchoCallbacks(options.logger)
  return EventLoop.start(listenOptions, callbacks, options)
}

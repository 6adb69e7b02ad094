import { EventEmitter } from "events"
import * as net from "net"
import { describe, expect, it } from "vitest"
import type EventLoop from "../src/base/event-loop"
import { runCli } from "../src/cli"
import { MemoryLogger } from "./fakes"

function started(): [Promise<EventLoop>, (loop: EventLoop) => void] {
  let onStarted: (loop: EventLoop) => void = () => undefined
  const promise = new Promise<EventLoop>((resolve) => {
    onStarted = resolve
  })
  return [promise, onStarted]
}

describe("runCli", () => {
  it("serves until SIGINT and exits with 0", async () => {
    const logger = new MemoryLogger()
    const signals = new EventEmitter()
    const [ready, onStarted] = started()

    const exit = runCli({
      argv: ["--host", "127.0.0.1", "--port", "0"],
      env: {},
      logger,
      signals,
      onStarted,
    })
    const loop = await ready

    const reply = await new Promise<string>((resolve, reject) => {
      const socket = net.connect({ host: "127.0.0.1", port: loop.address.port })
      socket.on("error", reject)
      socket.once("data", (data: Buffer) => {
        resolve(data.toString())
        socket.end()
      })
      socket.write("ping")
    })
    expect(reply).toBe("PING")

    signals.emit("SIGINT")

    expect(await exit).toBe(0)
    expect(loop.state).toBe("stopped")
    expect(logger.lines).toContain("stopping")
    expect(signals.listenerCount("SIGINT")).toBe(0)
    expect(signals.listenerCount("SIGTERM")).toBe(0)
  })

  it("stops on SIGTERM through the serve command", async () => {
    const signals = new EventEmitter()
    const [ready, onStarted] = started()

    const exit = runCli({
      argv: ["serve", "--port", "0", "--host", "127.0.0.1"],
      env: { MUX_CHUNK_SIZE: "16" },
      logger: new MemoryLogger(),
      signals,
      onStarted,
    })
    await ready
    signals.emit("SIGTERM")

    expect(await exit).toBe(0)
  })

  it("exits with 1 on invalid configuration", async () => {
    const logger = new MemoryLogger()

    const code = await runCli({
      argv: ["--port", "0"],
      env: { MUX_CHUNK_SIZE: "-5" },
      logger,
      signals: new EventEmitter(),
    })

    expect(code).toBe(1)
    expect(logger.errors).toHaveLength(1)
    expect(logger.errors[0]).toMatch(
      /^server error: invalid configuration: chunkSize: /,
    )
  })

  it("exits with 1 when the port is taken", async () => {
    const blocker = net.createServer()
    await new Promise<void>((resolve) =>
      blocker.listen({ host: "127.0.0.1", port: 0 }, resolve),
    )
    const address = blocker.address()
    const port = address != null && typeof address == "object" ? address.port : 0
    const logger = new MemoryLogger()

    try {
      const code = await runCli({
        argv: ["--host", "127.0.0.1", "--port", String(port)],
        env: {},
        logger,
        signals: new EventEmitter(),
      })

      expect(code).toBe(1)
      expect(logger.errors[0]).toMatch(/^server error: .*EADDRINUSE/)
    } finally {
      await new Promise((resolve) => blocker.close(resolve))
    }
  })

  it("rejects unknown flags", async () => {
    const logger = new MemoryLogger()

    const code = await runCli({
      argv: ["--bogus"],
      env: {},
      logger,
      signals: new EventEmitter(),
    })

    expect(code).toBe(1)
    expect(logger.errors[0]).toMatch(/Unknown argument: bogus/)
  })
})

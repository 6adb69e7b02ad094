import type { EventEmitter } from "events"
import yargs, { type Argv } from "yargs"
import type EventLoop from "./base/event-loop"
import { type Logger, consoleLogger } from "./base/log"
import { type ConfigOverrides, loadServerConfig } from "./config"
import startUpperEchoServer from "./upper-echo-server"

export interface CliOptions {
  argv: string[]
  env: NodeJS.ProcessEnv
  logger?: Logger
  // where SIGINT and SIGTERM arrive; the process by default
  signals?: EventEmitter
  onStarted?: (loop: EventLoop) => void
}

/**
 * Parses the command line and serves until stopped.
 *
 * Resolves with the process exit code: 0 after a clean stop, 1 when the
 * configuration is invalid, the bind fails or the event loop fails.
 */
export async function runCli(opts: CliOptions): Promise<number> {
  const logger = opts.logger ?? consoleLogger
  let exitCode = 0

  const parser = yargs(opts.argv)
    .scriptName("tcp-mux-server")
    .command(
      ["serve", "$0"],
      "Serve the upper-case echo protocol on one multiplexed listener",
      (y: Argv) =>
        y
          .option("host", {
            type: "string",
            describe: "Interface to bind (empty for all)",
          })
          .option("port", { type: "number", describe: "Port to bind" })
          .option("chunk-size", {
            type: "number",
            describe: "Bytes taken from a connection per read",
          })
          .option("max-connections", {
            type: "number",
            describe: "Refuse connections beyond this many",
          })
          .option("backlog", {
            type: "number",
            describe: "Listen backlog",
          }),
      async (args) => {
        exitCode = await serve(
          opts,
          {
            host: args.host,
            port: args.port,
            chunkSize: args.chunkSize,
            maxConnections: args.maxConnections,
            backlog: args.backlog,
          },
          logger,
        )
      },
    )
    .strict()
    .exitProcess(false)
    .fail((msg, err) => {
      throw err ?? new Error(msg)
    })

  try {
    await parser.parseAsync()
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error))
    return 1
  }
  return exitCode
}

async function serve(
  opts: CliOptions,
  overrides: ConfigOverrides,
  logger: Logger,
): Promise<number> {
  let loop: EventLoop
  try {
    const config = loadServerConfig(opts.env, overrides)
    loop = await startUpperEchoServer(
      { host: config.host, port: config.port, backlog: config.backlog },
      {
        chunkSize: config.chunkSize,
        maxConnections: config.maxConnections,
        logger,
      },
    )
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    logger.error("server error:", reason)
    return 1
  }

  const signals: EventEmitter = opts.signals ?? process
  const stop = () => {
    logger.log("stopping")
    loop.stop()
  }
  signals.once("SIGINT", stop)
  signals.once("SIGTERM", stop)
  opts.onStarted?.(loop)

  try {
    await loop.run()
    return 0
  } catch {
    // the loop has logged the failure and closed the listener
    return 1
  } finally {
    signals.off("SIGINT", stop)
    signals.off("SIGTERM", stop)
  }
}

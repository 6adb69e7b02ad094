// Where the multiplexer and the protocol write their diagnostics.
export type Logger = Pick<Console, "log" | "error">

export const consoleLogger: Logger = console

export const silentLogger: Logger = {
  log: () => undefined,
  error: () => undefined,
}

import { z } from "zod"
import { DEFAULT_CHUNK_SIZE } from "./base/connection-handler"

export const DEFAULT_PORT = 50007

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`)
    this.name = "ConfigError"
  }
}

const optionalInt = (schema: z.ZodNumber) =>
  z.preprocess(
    (value) => (value === undefined || value === "" ? undefined : value),
    z.coerce.number().pipe(schema).optional(),
  )

const ServerConfigSchema = z.object({
  // empty for all interfaces
  host: z.string().default(""),
  port: optionalInt(z.number().int().min(0).max(65535)),
  chunkSize: optionalInt(z.number().int().positive()),
  maxConnections: optionalInt(z.number().int().positive()),
  backlog: optionalInt(z.number().int().positive()),
})

export type ServerConfig = {
  host: string
  port: number
  chunkSize: number
  maxConnections?: number
  backlog?: number
}

export type ConfigOverrides = Partial<
  Record<keyof ServerConfig, string | number | undefined>
>

/**
 * Reads `MUX_*` variables from `env`; values in `overrides` (from the command
 * line) take precedence.
 */
export function loadServerConfig(
  env: NodeJS.ProcessEnv,
  overrides: ConfigOverrides = {},
): ServerConfig {
  const input = {
    host: overrides.host ?? env.MUX_HOST,
    port: overrides.port ?? env.MUX_PORT,
    chunkSize: overrides.chunkSize ?? env.MUX_CHUNK_SIZE,
    maxConnections: overrides.maxConnections ?? env.MUX_MAX_CONNECTIONS,
    backlog: overrides.backlog ?? env.MUX_BACKLOG,
  }

  const parsed = ServerConfigSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    )
  }

  const { host, port, chunkSize, maxConnections, backlog } = parsed.data
  return {
    host,
    port: port ?? DEFAULT_PORT,
    chunkSize: chunkSize ?? DEFAULT_CHUNK_SIZE,
    maxConnections,
    backlog,
  }
}

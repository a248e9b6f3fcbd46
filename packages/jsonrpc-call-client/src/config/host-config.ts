/**
 * @file Host Configuration
 *
 * Address, port and optional credentials of the JSON-RPC host. Input coming
 * from outside the program (user settings, environment) is validated with
 * zod before it reaches the transport.
 *
 * @example
 * ```typescript
 * const config = parseHostConfig({ address: '192.168.1.20', httpPort: 8080 })
 * // { address: '192.168.1.20', httpPort: 8080, scheme: 'http' }
 *
 * const fromEnv = hostConfigFromEnv(process.env)
 * ```
 */

import { z } from 'zod'

// =============================================================================
// Schema
// =============================================================================

/**
 * Schema of a host configuration. `scheme` defaults to `http`; empty
 * username or password strings are kept and simply disable authentication.
 */
export const hostConfigSchema = z.object({
  address: z.string().trim().min(1, 'address must not be empty'),
  httpPort: z.coerce.number().int().min(1).max(65535),
  scheme: z.enum(['http', 'https']).default('http'),
  username: z.string().optional(),
  password: z.string().optional(),
})

/**
 * Host configuration consumed by the transport.
 */
export type HostConfig = z.output<typeof hostConfigSchema>

/**
 * Host configuration as accepted by `parseHostConfig()`, before defaults.
 */
export type HostConfigInput = z.input<typeof hostConfigSchema>

// =============================================================================
// Helpers
// =============================================================================

/**
 * Validates a host configuration and applies defaults.
 *
 * @throws {z.ZodError} If the input is not a valid configuration
 */
export function parseHostConfig(input: unknown): HostConfig {
  return hostConfigSchema.parse(input)
}

/**
 * Reads a host configuration from environment variables:
 * `<prefix>HOST`, `<prefix>PORT`, `<prefix>SCHEME`, `<prefix>USERNAME` and
 * `<prefix>PASSWORD`.
 *
 * @throws {z.ZodError} If the variables do not form a valid configuration
 */
export function hostConfigFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
  prefix = 'JSONRPC_'
): HostConfig {
  return parseHostConfig({
    address: env[`${prefix}HOST`],
    httpPort: env[`${prefix}PORT`],
    scheme: env[`${prefix}SCHEME`] || undefined,
    username: env[`${prefix}USERNAME`],
    password: env[`${prefix}PASSWORD`],
  })
}

/**
 * True if both username and password are set and non-empty, i.e. requests
 * should carry HTTP Basic authentication.
 */
export function hasCredentials(
  config: Pick<HostConfig, 'username' | 'password'>
): config is Pick<HostConfig, 'username' | 'password'> & {
  username: string
  password: string
} {
  return Boolean(config.username) && Boolean(config.password)
}

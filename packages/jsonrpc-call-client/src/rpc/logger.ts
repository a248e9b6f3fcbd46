/**
 * @file Logging Types
 *
 * The transport and client log through this interface so applications can
 * route output to their own logging infrastructure.
 */

/**
 * Log levels supported by the logger.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Logger interface for transport and client output.
 *
 * All methods are optional; missing methods are no-ops.
 *
 * @example
 * ```typescript
 * const structuredLogger: JsonRpcLogger = {
 *   debug: (msg, data) => console.debug(JSON.stringify({ level: 'debug', msg, ...data })),
 *   warn: (msg, data) => console.warn(JSON.stringify({ level: 'warn', msg, ...data })),
 * }
 * ```
 */
export interface JsonRpcLogger {
  /** Requests and raw responses */
  debug?: (message: string, data?: Record<string, unknown>) => void
  info?: (message: string, data?: Record<string, unknown>) => void
  /** Classified failures */
  warn?: (message: string, data?: Record<string, unknown>) => void
  error?: (message: string, data?: Record<string, unknown>) => void
}

/**
 * Creates a console-backed logger that prefixes every message.
 */
export function createConsoleLogger(prefix = 'jsonrpc'): JsonRpcLogger {
  return {
    debug: (msg, data) => console.debug(`[${prefix}] ${msg}`, data ?? ''),
    info: (msg, data) => console.info(`[${prefix}] ${msg}`, data ?? ''),
    warn: (msg, data) => console.warn(`[${prefix}] ${msg}`, data ?? ''),
    error: (msg, data) => console.error(`[${prefix}] ${msg}`, data ?? ''),
  }
}

/**
 * Logs through `logger` if it implements `level`.
 * @internal
 */
export function log(
  logger: JsonRpcLogger | undefined,
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>
): void {
  logger?.[level]?.(message, data)
}

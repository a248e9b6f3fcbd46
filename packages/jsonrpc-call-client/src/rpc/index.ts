/**
 * @file RPC Module Exports
 *
 * Transport, wire types, errors and logging for talking to a JSON-RPC host.
 *
 * @example
 * ```typescript
 * import { HttpTransport, ApiError, ApiErrorCode } from 'jsonrpc-call-client/rpc'
 *
 * const transport = new HttpTransport({ connectTimeout: 2000 })
 * ```
 */

// =============================================================================
// HTTP Transport Exports
// =============================================================================

export {
  HttpTransport,
  buildUrl,
  parseResponse,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
} from './http-transport.js'

export type { HttpTransportOptions, RequestContext } from './http-transport.js'

// =============================================================================
// Wire Types
// =============================================================================

export { JSON_RPC_VERSION, JSON_RPC_PATH } from './types.js'

export type {
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcErrorObject,
} from './types.js'

// =============================================================================
// Error Classes
// =============================================================================

export { ApiError, ApiErrorCode, isApiError } from './errors.js'

export type { ApiErrorOptions } from './errors.js'

// =============================================================================
// Logging
// =============================================================================

export { createConsoleLogger } from './logger.js'

export type { JsonRpcLogger, LogLevel } from './logger.js'

/**
 * @file JSON-RPC Wire Types
 *
 * Request and response envelopes exchanged with the `/jsonrpc` endpoint.
 *
 * @see https://www.jsonrpc.org/specification
 */

import type { JsonObject, JsonValue } from '../call/json.js'

// =============================================================================
// Request
// =============================================================================

/**
 * JSON-RPC 2.0 request envelope.
 *
 * `jsonrpc`, `id` and `method` are fixed when the call is created. `params`
 * is only present once a parameter has been added.
 *
 * @example
 * ```typescript
 * const request: JsonRpcRequest = {
 *   jsonrpc: '2.0',
 *   id: '-4962768465676381896',
 *   method: 'Application.GetProperties',
 *   params: { properties: ['version'] },
 * }
 * ```
 */
export interface JsonRpcRequest {
  /** JSON-RPC protocol version, always "2.0" */
  readonly jsonrpc: '2.0'
  /** Correlation identifier */
  readonly id: string
  /** Fully qualified method name, e.g. "Namespace.Action" */
  readonly method: string
  /** Named parameters */
  params?: JsonObject
}

// =============================================================================
// Response
// =============================================================================

/**
 * Structured JSON-RPC error member.
 *
 * @see https://www.jsonrpc.org/specification#error_object
 */
export interface JsonRpcErrorObject {
  /** Error code */
  code: number
  /** Human-readable error message */
  message: string
  /** Additional error data */
  data?: JsonValue
}

/**
 * JSON-RPC response envelope as received from the server.
 *
 * Servers send either `result` or `error`. Older servers send `error` as a
 * plain string. Only envelopes carrying a non-null `result` are handed back
 * by the transport, so this type describes those.
 */
export interface JsonRpcResponse extends JsonObject {
  result: JsonValue
}

/** Protocol version sent with every request */
export const JSON_RPC_VERSION = '2.0'

/** Path of the JSON-RPC endpoint on the host */
export const JSON_RPC_PATH = '/jsonrpc'

/**
 * @file Package Entry Point
 *
 * Typed JSON-RPC calls over HTTP. Each remote method is a subclass of
 * `AbstractCall` that builds its own request and parses its own result;
 * `JsonRpcClient` (or `HttpTransport` directly) carries it to the host.
 *
 * @packageDocumentation
 */

// =============================================================================
// Calls
// =============================================================================

export { AbstractCall } from './call/abstract-call.js'
export type { CallResult, ParameterValue } from './call/abstract-call.js'

export { findValue, isJsonObject } from './call/json.js'
export type { JsonValue, JsonObject, JsonArray, JsonPrimitive } from './call/json.js'

export { isJsonModel } from './call/model.js'
export type { JsonModel } from './call/model.js'

export { randomLongId, sequentialIds } from './call/id-generator.js'
export type { IdGenerator } from './call/id-generator.js'

// =============================================================================
// Configuration
// =============================================================================

export {
  hostConfigSchema,
  parseHostConfig,
  hostConfigFromEnv,
  hasCredentials,
} from './config/host-config.js'
export type { HostConfig, HostConfigInput } from './config/host-config.js'

// =============================================================================
// Client
// =============================================================================

export { JsonRpcClient } from './client.js'
export type { JsonRpcClientOptions } from './client.js'

// =============================================================================
// Transport
// =============================================================================

export * from './rpc/index.js'

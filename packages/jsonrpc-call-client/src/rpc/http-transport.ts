/**
 * @file HTTP Transport Implementation
 *
 * Performs one HTTP POST to `<scheme>://<host>:<port>/jsonrpc` per call and
 * turns the outcome into either the parsed response envelope or an
 * `ApiError`. There is no retrying, batching or pipelining: every
 * `execute()` settles only after its own round trip has completed.
 *
 * @example Basic Usage
 * ```typescript
 * import { HttpTransport } from 'jsonrpc-call-client/rpc'
 *
 * const transport = new HttpTransport({ logger: createConsoleLogger() })
 * const config = parseHostConfig({ address: 'localhost', httpPort: 8080 })
 *
 * const response = await transport.execute(config, call.getRequest())
 * if (response) {
 *   call.setResponse(response)
 * }
 * ```
 *
 * @see https://www.jsonrpc.org/specification
 */

import { z } from 'zod'
import { ApiError, ApiErrorCode } from './errors.js'
import { log, type JsonRpcLogger } from './logger.js'
import { JSON_RPC_PATH, type JsonRpcRequest, type JsonRpcResponse } from './types.js'
import { hasCredentials, type HostConfig } from '../config/host-config.js'
import { isJsonObject, type JsonObject } from '../call/json.js'

// ============================================================================
// Type Definitions
// ============================================================================

/** Connect and read timeout used when none is configured */
export const DEFAULT_TIMEOUT = 5000

/** User agent sent when none is configured */
export const DEFAULT_USER_AGENT = 'jsonrpc-call-client'

/**
 * Configuration options for HttpTransport.
 *
 * @example
 * ```typescript
 * const options: HttpTransportOptions = {
 *   connectTimeout: 2000,
 *   readTimeout: 10000,
 *   userAgent: 'media-remote/1.4',
 * }
 * ```
 */
export interface HttpTransportOptions {
  /**
   * Time allowed until the response headers have arrived, in milliseconds.
   *
   * @default 5000
   */
  connectTimeout?: number

  /**
   * Time allowed for reading the response body, in milliseconds.
   *
   * @default 5000
   */
  readTimeout?: number

  /**
   * Value of the `User-Agent` header.
   *
   * @default 'jsonrpc-call-client'
   */
  userAgent?: string

  /**
   * Receives the outgoing calls and raw responses at `debug` level and
   * failures at `warn` level. Credentials are never logged.
   */
  logger?: JsonRpcLogger
}

/**
 * Request context attached to errors and log entries.
 */
export interface RequestContext {
  requestId?: string
  method?: string
}

type TimeoutPhase = 'connect' | 'read'

/**
 * Shape of the `error` member: a plain message or a JSON-RPC error object.
 */
const responseErrorSchema = z.union([
  z.string(),
  z
    .object({
      code: z.number(),
      message: z.string(),
    })
    .passthrough(),
])

/** undici and libuv codes of a connect/read timeout */
const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
])

// ============================================================================
// HttpTransport Class
// ============================================================================

/**
 * HTTP transport for JSON-RPC 2.0 calls.
 *
 * - POST with `Content-Type: application/json` and a fixed `User-Agent`
 * - HTTP Basic authentication when the host has username and password
 * - Connect and read timeouts (5 seconds each by default)
 * - Redirects are reported, not followed
 * - Every failure becomes an `ApiError`
 */
export class HttpTransport {
  private readonly connectTimeout: number

  private readonly readTimeout: number

  private readonly userAgent: string

  private readonly logger?: JsonRpcLogger

  constructor(options: HttpTransportOptions = {}) {
    this.connectTimeout = options.connectTimeout ?? DEFAULT_TIMEOUT
    this.readTimeout = options.readTimeout ?? DEFAULT_TIMEOUT
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
    this.logger = options.logger
  }

  /**
   * Posts the request to the host and parses the response.
   *
   * @returns The whole response envelope, or `null` if the server answered
   * with `"result": null`
   *
   * @throws {ApiError} For every failure: bad URL, network error, timeout,
   * non-200 status, undecodable or unparsable body, `error` member, or a
   * response without `result`
   */
  async execute(
    config: HostConfig,
    request: JsonRpcRequest
  ): Promise<JsonRpcResponse | null> {
    const context: RequestContext = {
      requestId: request.id,
      method: request.method,
    }

    try {
      const url = buildUrl(config)
      const body = encodeRequest(request, context)

      log(this.logger, 'debug', 'CALL', { ...context, url: url.href, body })
      const text = await this.postRequest(url, config, body, context)
      log(this.logger, 'debug', 'Response', { ...context, body: text })

      return parseResponse(text, context)
    } catch (error) {
      if (error instanceof ApiError) {
        log(this.logger, 'warn', 'Request failed', {
          ...context,
          code: error.code,
          message: error.message,
        })
      }
      throw error
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * Executes the HTTP round trip and returns the body text.
   * Timers are released on every exit path.
   * @internal
   */
  private async postRequest(
    url: URL,
    config: HostConfig,
    body: string,
    context: RequestContext
  ): Promise<string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': this.userAgent,
    }

    if (hasCredentials(config)) {
      const token = Buffer.from(`${config.username}:${config.password}`, 'utf8').toString('base64')
      headers['Authorization'] = `Basic ${token}`
    }

    const controller = new AbortController()
    let timeoutId: ReturnType<typeof setTimeout> | undefined
    let expired: TimeoutPhase | undefined

    const clearTimer = () => {
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId)
        timeoutId = undefined
      }
    }

    const startTimer = (phase: TimeoutPhase, ms: number) => {
      clearTimer()
      timeoutId = setTimeout(() => {
        expired = phase
        controller.abort(phase)
      }, ms)
    }

    try {
      startTimer('connect', this.connectTimeout)

      let response: Response
      try {
        response = await fetch(url, {
          method: 'POST',
          headers,
          body,
          redirect: 'manual',
          signal: controller.signal,
        })
      } catch (error) {
        throw this.classifyNetworkError(error, expired, context)
      }
      clearTimer()

      if (response.status !== 200) {
        await response.body?.cancel().catch((error: unknown) => {
          log(this.logger, 'debug', 'Failed to release response body', { ...context, error })
        })
        throw ApiError.fromHttpStatus(response.status, context)
      }

      startTimer('read', this.readTimeout)
      let bytes: ArrayBuffer
      try {
        bytes = await response.arrayBuffer()
      } catch (error) {
        throw this.classifyNetworkError(error, expired, context)
      }
      clearTimer()

      return decodeResponse(bytes, context)
    } finally {
      clearTimer()
    }
  }

  /**
   * Maps a rejected `fetch()` or body read to an `ApiError`.
   * @internal
   */
  private classifyNetworkError(
    error: unknown,
    expired: TimeoutPhase | undefined,
    context: RequestContext
  ): ApiError {
    const cause = toError(error)

    if (expired === 'connect') {
      return new ApiError(
        ApiErrorCode.IO_SOCKETTIMEOUT,
        `Connect timed out after ${this.connectTimeout}ms`,
        { ...context, cause }
      )
    }
    if (expired === 'read') {
      return new ApiError(
        ApiErrorCode.IO_SOCKETTIMEOUT,
        `Read timed out after ${this.readTimeout}ms`,
        { ...context, cause }
      )
    }

    const code = systemErrorCode(error)
    const message = rootMessage(cause)

    if (code === 'ECONNREFUSED') {
      return new ApiError(ApiErrorCode.IO_EXCEPTION_WHILE_OPENING, message, { ...context, cause })
    }
    if (code !== undefined && TIMEOUT_CODES.has(code)) {
      return new ApiError(ApiErrorCode.IO_SOCKETTIMEOUT, message, { ...context, cause })
    }
    if (code === 'ERR_INVALID_URL') {
      return new ApiError(ApiErrorCode.MALFORMED_URL, message, { ...context, cause })
    }
    return new ApiError(ApiErrorCode.IO_EXCEPTION, message, { ...context, cause })
  }
}

// ============================================================================
// Request and Response Helpers
// ============================================================================

/**
 * Builds the endpoint URL of a host.
 *
 * @throws {ApiError} `MALFORMED_URL` if the configuration does not form a URL
 *
 * @example
 * ```typescript
 * buildUrl({ scheme: 'http', address: 'localhost', httpPort: 8080 }).href
 * // 'http://localhost:8080/jsonrpc'
 * ```
 */
export function buildUrl(
  config: Pick<HostConfig, 'scheme' | 'address' | 'httpPort'>
): URL {
  // IPv6 literals need brackets inside a URL
  const host =
    config.address.includes(':') && !config.address.startsWith('[')
      ? `[${config.address}]`
      : config.address

  try {
    return new URL(`${config.scheme}://${host}:${config.httpPort}${JSON_RPC_PATH}`)
  } catch (error) {
    const cause = toError(error)
    throw new ApiError(ApiErrorCode.MALFORMED_URL, cause.message, { cause })
  }
}

/**
 * Parses a response body.
 *
 * @returns The envelope, or `null` if it carries `"result": null`
 *
 * @throws {ApiError} `JSON_EXCEPTION` if the body is not a JSON object,
 * `API_ERROR` if it carries an `error` member, `RESPONSE_ERROR` if it
 * carries neither `result` nor `error`
 *
 * @example
 * ```typescript
 * parseResponse('{"id":"1","result":{"version":1}}') // { id: '1', result: { version: 1 } }
 * parseResponse('{"id":"1","result":null}') // null
 * parseResponse('{"id":"1","error":"fail"}') // throws ApiError 'Error: fail'
 * ```
 */
export function parseResponse(
  text: string,
  context: RequestContext = {}
): JsonRpcResponse | null {
  let node: unknown
  try {
    node = JSON.parse(text)
  } catch (error) {
    const cause = toError(error)
    throw new ApiError(ApiErrorCode.JSON_EXCEPTION, `Parse error: ${cause.message}`, {
      ...context,
      cause,
    })
  }

  if (!isJsonObject(node)) {
    throw new ApiError(
      ApiErrorCode.JSON_EXCEPTION,
      'Parse error: response is not a JSON object',
      context
    )
  }

  // "error": null is sent next to a result by some servers
  if (node.error !== undefined && node.error !== null) {
    throw toApiError(node.error, context)
  }

  if (!hasResult(node)) {
    throw new ApiError(
      ApiErrorCode.RESPONSE_ERROR,
      'Neither result nor error object found in response.',
      context
    )
  }

  if (node.result === null) {
    return null
  }

  return node
}

function hasResult(node: JsonObject): node is JsonRpcResponse {
  return Object.hasOwn(node, 'result')
}

function toApiError(error: unknown, context: RequestContext): ApiError {
  const parsed = responseErrorSchema.safeParse(error)
  if (!parsed.success) {
    return new ApiError(ApiErrorCode.RESPONSE_ERROR, 'Malformed error object in response.', context)
  }
  if (typeof parsed.data === 'string') {
    return new ApiError(ApiErrorCode.API_ERROR, `Error: ${parsed.data}`, context)
  }
  return new ApiError(
    ApiErrorCode.API_ERROR,
    `Error ${parsed.data.code}: ${parsed.data.message}`,
    { ...context, rpcCode: parsed.data.code }
  )
}

function encodeRequest(request: JsonRpcRequest, context: RequestContext): string {
  try {
    return JSON.stringify(request)
  } catch (error) {
    throw new ApiError(ApiErrorCode.UNSUPPORTED_ENCODING, 'Unable to convert request to UTF-8', {
      ...context,
      cause: toError(error),
    })
  }
}

function decodeResponse(bytes: ArrayBuffer, context: RequestContext): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
  } catch (error) {
    throw new ApiError(
      ApiErrorCode.UNSUPPORTED_ENCODING,
      'Unable to convert HTTP response to UTF-8',
      { ...context, cause: toError(error) }
    )
  }
}

// ============================================================================
// Error Helpers
// ============================================================================

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

/**
 * Finds the first `code` string along the cause chain, e.g. `ECONNREFUSED`
 * under undici's `TypeError: fetch failed`.
 */
function systemErrorCode(error: unknown): string | undefined {
  let current: unknown = error
  while (current instanceof Error) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code
    }
    current = current.cause
  }
  return undefined
}

/**
 * Message of the innermost error along the cause chain.
 */
function rootMessage(error: Error): string {
  let current = error
  while (current.cause instanceof Error) {
    current = current.cause
  }
  return current.message
}

/**
 * @file Transport Error Classes
 *
 * Every failure of a JSON-RPC round trip surfaces as an `ApiError` carrying
 * one of the `ApiErrorCode` kinds. Network failures keep the underlying
 * error as `cause`.
 *
 * @example
 * ```typescript
 * import { ApiError, ApiErrorCode } from './errors.js'
 *
 * try {
 *   await transport.execute(config, call.getRequest())
 * } catch (error) {
 *   if (error instanceof ApiError) {
 *     switch (error.code) {
 *       case ApiErrorCode.HTTP_UNAUTHORIZED:
 *         console.log('Check username and password')
 *         break
 *       case ApiErrorCode.IO_EXCEPTION_WHILE_OPENING:
 *         console.log('Host is not reachable')
 *         break
 *       default:
 *         console.log(error.message)
 *     }
 *   }
 * }
 * ```
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Kinds of failure a JSON-RPC round trip can end in.
 */
export enum ApiErrorCode {
  /** The host configuration does not form a valid URL */
  MALFORMED_URL = 'MALFORMED_URL',
  /** The connection could not be opened (refused) */
  IO_EXCEPTION_WHILE_OPENING = 'IO_EXCEPTION_WHILE_OPENING',
  /** Connect or read timeout expired */
  IO_SOCKETTIMEOUT = 'IO_SOCKETTIMEOUT',
  /** Any other network failure */
  IO_EXCEPTION = 'IO_EXCEPTION',
  /** The request or response could not be converted to or from UTF-8 */
  UNSUPPORTED_ENCODING = 'UNSUPPORTED_ENCODING',
  /** 400 */
  HTTP_BAD_REQUEST = 'HTTP_BAD_REQUEST',
  /** 401 */
  HTTP_UNAUTHORIZED = 'HTTP_UNAUTHORIZED',
  /** 403 */
  HTTP_FORBIDDEN = 'HTTP_FORBIDDEN',
  /** 404 */
  HTTP_NOT_FOUND = 'HTTP_NOT_FOUND',
  /** 1xx */
  HTTP_INFO = 'HTTP_INFO',
  /** 2xx other than 200 */
  HTTP_SUCCESS = 'HTTP_SUCCESS',
  /** 3xx */
  HTTP_REDIRECTION = 'HTTP_REDIRECTION',
  /** 4xx other than 400, 401, 403 and 404 */
  HTTP_CLIENT_ERROR = 'HTTP_CLIENT_ERROR',
  /** 5xx */
  HTTP_SERVER_ERROR = 'HTTP_SERVER_ERROR',
  /** Any status outside 100-599 */
  HTTP_UNKNOWN = 'HTTP_UNKNOWN',
  /** The response body is not a JSON object */
  JSON_EXCEPTION = 'JSON_EXCEPTION',
  /** The response carries an `error` member */
  API_ERROR = 'API_ERROR',
  /** The response carries neither `result` nor `error` */
  RESPONSE_ERROR = 'RESPONSE_ERROR',
}

const TRANSPORT_CODES: ReadonlySet<ApiErrorCode> = new Set([
  ApiErrorCode.MALFORMED_URL,
  ApiErrorCode.IO_EXCEPTION_WHILE_OPENING,
  ApiErrorCode.IO_SOCKETTIMEOUT,
  ApiErrorCode.IO_EXCEPTION,
])

const HTTP_CODES: ReadonlySet<ApiErrorCode> = new Set([
  ApiErrorCode.HTTP_BAD_REQUEST,
  ApiErrorCode.HTTP_UNAUTHORIZED,
  ApiErrorCode.HTTP_FORBIDDEN,
  ApiErrorCode.HTTP_NOT_FOUND,
  ApiErrorCode.HTTP_INFO,
  ApiErrorCode.HTTP_SUCCESS,
  ApiErrorCode.HTTP_REDIRECTION,
  ApiErrorCode.HTTP_CLIENT_ERROR,
  ApiErrorCode.HTTP_SERVER_ERROR,
  ApiErrorCode.HTTP_UNKNOWN,
])

/**
 * Request context attached to an error.
 */
export interface ApiErrorOptions {
  /** Correlation id of the failed request */
  requestId?: string
  /** The RPC method that was being called */
  method?: string
  /** HTTP status code, for the HTTP kinds */
  status?: number
  /** Code of a structured JSON-RPC error member, for `API_ERROR` */
  rpcCode?: number
  /** The original cause of this error */
  cause?: Error
}

// =============================================================================
// ApiError
// =============================================================================

/**
 * The single failure type thrown by the transport.
 *
 * @example
 * ```typescript
 * throw new ApiError(ApiErrorCode.RESPONSE_ERROR, 'Neither result nor error object found in response.', {
 *   requestId: '42',
 *   method: 'JSONRPC.Version',
 * })
 * ```
 */
export class ApiError extends Error {
  /** Kind of failure */
  readonly code: ApiErrorCode

  /** The request ID associated with this error, if available */
  readonly requestId?: string

  /** The RPC method that was being called */
  readonly method?: string

  /** The HTTP status code, for the HTTP kinds */
  readonly status?: number

  /** The JSON-RPC error code, when the server sent a structured error */
  readonly rpcCode?: number

  /** The original cause of this error, if any */
  override readonly cause?: Error

  constructor(code: ApiErrorCode, message: string, options?: ApiErrorOptions) {
    super(message)
    this.name = 'ApiError'
    this.code = code
    this.requestId = options?.requestId
    this.method = options?.method
    this.status = options?.status
    this.rpcCode = options?.rpcCode
    this.cause = options?.cause

    // Maintains proper stack trace for where error was thrown (V8 engines)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ApiError)
    }
  }

  /**
   * Returns true for failures below HTTP: bad URL, refused connection,
   * timeouts and other network errors.
   */
  isTransportFailure(): boolean {
    return TRANSPORT_CODES.has(this.code)
  }

  /**
   * Returns true if the server answered with a status other than 200.
   */
  isHttpError(): boolean {
    return HTTP_CODES.has(this.code)
  }

  /**
   * Classifies a non-200 HTTP status.
   *
   * @example
   * ```typescript
   * ApiError.fromHttpStatus(503).code // ApiErrorCode.HTTP_SERVER_ERROR
   * ApiError.fromHttpStatus(404).message // 'Server says "404 Not Found".'
   * ```
   */
  static fromHttpStatus(
    status: number,
    options?: Pick<ApiErrorOptions, 'requestId' | 'method'>
  ): ApiError {
    const context = { ...options, status }
    switch (status) {
      case 400:
        return new ApiError(ApiErrorCode.HTTP_BAD_REQUEST, 'Server says "400 Bad HTTP request".', context)
      case 401:
        return new ApiError(ApiErrorCode.HTTP_UNAUTHORIZED, 'Server says "401 Unauthorized".', context)
      case 403:
        return new ApiError(ApiErrorCode.HTTP_FORBIDDEN, 'Server says "403 Forbidden".', context)
      case 404:
        return new ApiError(ApiErrorCode.HTTP_NOT_FOUND, 'Server says "404 Not Found".', context)
    }

    if (status >= 100 && status < 200) {
      return new ApiError(
        ApiErrorCode.HTTP_INFO,
        `Server returned informational code ${status} instead of 200.`,
        context
      )
    }
    if (status >= 200 && status < 300) {
      return new ApiError(
        ApiErrorCode.HTTP_SUCCESS,
        `Server returned success code ${status} instead of 200.`,
        context
      )
    }
    if (status >= 300 && status < 400) {
      return new ApiError(
        ApiErrorCode.HTTP_REDIRECTION,
        `Server returned redirection code ${status} instead of 200.`,
        context
      )
    }
    if (status >= 400 && status < 500) {
      return new ApiError(ApiErrorCode.HTTP_CLIENT_ERROR, `Server returned client error ${status}.`, context)
    }
    if (status >= 500 && status < 600) {
      return new ApiError(ApiErrorCode.HTTP_SERVER_ERROR, `Server returned server error ${status}.`, context)
    }
    return new ApiError(ApiErrorCode.HTTP_UNKNOWN, `Server returned unspecified code ${status}.`, context)
  }
}

/**
 * Type guard for `ApiError`, optionally of a given kind.
 */
export function isApiError(value: unknown, code?: ApiErrorCode): value is ApiError {
  return value instanceof ApiError && (code === undefined || value.code === code)
}

/**
 * @file Abstract Call
 *
 * Base class of every remote method implementation. A subclass represents
 * one method of the JSON-RPC API and does two things:
 * 1. Builds the request envelope sent to the server
 * 2. Parses the `result` member of the response into model objects
 *
 * Methods return either a single item or a list of items. `getResult()` and
 * `getResults()` both work regardless of which one the method returns: for
 * a list method `getResult()` yields the first item, for a single-item
 * method `getResults()` yields a one-element array.
 *
 * A subclass therefore implements:
 * - `getName()` returning the full method name
 * - `returnsList()` returning whether the method returns a list
 * - `parseMany()` if it does, **or** `parseOne()` if it does not
 *
 * @example
 * ```typescript
 * class GetVersion extends AbstractCall<Version> {
 *   constructor() {
 *     super()
 *     this.addParameter('properties', ['version'])
 *   }
 *
 *   getName(): string {
 *     return 'Application.GetProperties'
 *   }
 *
 *   protected returnsList(): boolean {
 *     return false
 *   }
 *
 *   protected override parseOne(result: JsonValue | undefined): Version | null {
 *     return result === undefined ? null : versionSchema.parse(result)
 *   }
 * }
 *
 * const call = await client.call(new GetVersion())
 * console.log(call.getResult())
 * ```
 */

import { findValue, type JsonObject, type JsonValue } from './json.js'
import { isJsonModel, type JsonModel } from './model.js'
import { randomLongId, type IdGenerator } from './id-generator.js'
import { JSON_RPC_VERSION, type JsonRpcRequest } from '../rpc/types.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Values accepted by `addParameter()`.
 * Integers and floating point numbers are both `number`.
 */
export type ParameterValue =
  | string
  | number
  | boolean
  | JsonModel
  | readonly string[]
  | readonly JsonModel[]
  | Readonly<Record<string, string>>

/**
 * Parsed result held by a call. Exactly one shape is ever stored, decided
 * by `returnsList()`.
 */
export type CallResult<T> =
  | { readonly kind: 'single'; readonly value: T | null }
  | { readonly kind: 'many'; readonly values: (T | null)[] | null }

function isParameterList(
  value: ParameterValue
): value is readonly string[] | readonly JsonModel[] {
  return Array.isArray(value)
}

// =============================================================================
// AbstractCall Class
// =============================================================================

export abstract class AbstractCall<T> {
  /** Name of the node holding the result in a response */
  static readonly RESULT = 'result'

  /** Name of the node holding pagination limits in a request */
  static readonly LIMITS = 'limits'

  /**
   * JSON request object sent to the API.
   *
   * @example `{"jsonrpc": "2.0", "method": "Application.GetProperties", "id": "1", "params": {"properties": ["version"]}}`
   */
  private readonly request: JsonRpcRequest

  private result: CallResult<T> | undefined

  /**
   * Creates the standard structure of the request. No network activity.
   *
   * @param nextId - Source of the correlation id
   */
  protected constructor(nextId: IdGenerator = randomLongId) {
    this.request = {
      jsonrpc: JSON_RPC_VERSION,
      id: nextId(),
      method: this.getName(),
    }
  }

  /**
   * Full name of the method, e.g. "AudioLibrary.GetSongDetails".
   */
  abstract getName(): string

  /**
   * True if the method returns a list of items, false for a single item.
   * Decides whether `parseMany()` or `parseOne()` is used.
   */
  protected abstract returnsList(): boolean

  /**
   * Parses the result of a method returning a single item.
   *
   * @param _result - The `result` node of the response
   */
  protected parseOne(_result: JsonValue | undefined): T | null {
    return null
  }

  /**
   * Parses the result of a method returning a list of items.
   *
   * @param _result - The `result` node of the response
   */
  protected parseMany(_result: JsonValue | undefined): T[] | null {
    return null
  }

  // ===========================================================================
  // Request
  // ===========================================================================

  /**
   * Returns the request envelope sent to the server.
   */
  getRequest(): JsonRpcRequest {
    return this.request
  }

  /**
   * Returns the generated correlation id of the request.
   */
  getId(): string {
    return this.request.id
  }

  /**
   * Adds a parameter to the request.
   *
   * `null` and `undefined` are skipped, so are empty arrays and empty
   * mappings. `false`, `0` and `''` are written. Model objects are written
   * in their JSON form.
   */
  protected addParameter(
    name: string,
    value: ParameterValue | null | undefined
  ): void {
    if (value === null || value === undefined) {
      return
    }

    if (isParameterList(value)) {
      if (value.length === 0) {
        return
      }
      const items: JsonValue[] = []
      for (const element of value) {
        items.push(typeof element === 'string' ? element : element.toJsonNode())
      }
      this.getParameters()[name] = items
      return
    }

    if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      this.getParameters()[name] = value
      return
    }

    if (isJsonModel(value)) {
      this.getParameters()[name] = value.toJsonNode()
      return
    }

    const entries = Object.entries(value)
    if (entries.length === 0) {
      return
    }
    const props: JsonObject = {}
    for (const [key, entry] of entries) {
      props[key] = entry
    }
    this.getParameters()[name] = props
  }

  /**
   * Returns the parameter bag, attaching it to the request on first use.
   */
  protected getParameters(): JsonObject {
    const existing = this.request.params
    if (existing) {
      return existing
    }
    const parameters: JsonObject = {}
    this.request.params = parameters
    return parameters
  }

  // ===========================================================================
  // Response
  // ===========================================================================

  /**
   * Parses the response once it has arrived.
   *
   * @param response - Root node of the response, containing `result`
   */
  setResponse(response: JsonValue): void {
    const result = this.parseResult(response)
    if (this.returnsList()) {
      this.result = { kind: 'many', values: this.parseMany(result) }
    } else {
      this.result = { kind: 'single', value: this.parseOne(result) }
    }
  }

  /**
   * Adopts the parsed result of another call, e.g. a previous page of the
   * same listing.
   */
  copyResponse(call: AbstractCall<T>): void {
    if (this.returnsList()) {
      this.result = { kind: 'many', values: call.getResults() }
    } else {
      this.result = { kind: 'single', value: call.getResult() }
    }
  }

  /**
   * True once a response has been parsed or copied.
   */
  hasResponse(): boolean {
    return this.result !== undefined
  }

  /**
   * Returns the result as a single item.
   *
   * For a list method this is the first item, or `null` if the server
   * returned no list at all.
   *
   * @throws {RangeError} If the list method returned an empty list
   */
  getResult(): T | null {
    const result = this.requireResult()
    if (result.kind === 'single') {
      return result.value
    }
    if (result.values === null) {
      return null
    }
    if (result.values.length === 0) {
      throw new RangeError(`${this.getName()} returned an empty list`)
    }
    return result.values[0] ?? null
  }

  /**
   * Returns the result as a list of items.
   *
   * For a single-item method this is a new array holding that item only.
   * `null` means the list method returned no list, as opposed to `[]`.
   */
  getResults(): (T | null)[] | null {
    const result = this.requireResult()
    if (result.kind === 'many') {
      return result.values
    }
    return [result.value]
  }

  // ===========================================================================
  // Parsing Helpers
  // ===========================================================================

  /**
   * Gets the `result` node from a response.
   */
  protected parseResult(node: JsonValue): JsonValue | undefined {
    return findValue(node, AbstractCall.RESULT)
  }

  /**
   * Gets the array stored under `key` anywhere in `node`.
   *
   * @returns The array, or `null` if the key is missing or JSON null
   * @throws {TypeError} If the key holds something other than an array
   */
  protected parseResults(node: JsonValue, key: string): JsonValue[] | null {
    const value = findValue(node, key)
    if (value === undefined || value === null) {
      return null
    }
    if (!Array.isArray(value)) {
      throw new TypeError(`Expected "${key}" to be an array`)
    }
    return value
  }

  toString(): string {
    return `${this.getName()}(id=${this.getId()})`
  }

  private requireResult(): CallResult<T> {
    if (this.result === undefined) {
      throw new Error(`No response has been set for ${this.getName()}`)
    }
    return this.result
  }
}

/**
 * @file JSON Value Types
 *
 * Types for parsed JSON values and the structural field search used to
 * locate the `result` member of a JSON-RPC response.
 */

/** A JSON scalar */
export type JsonPrimitive = string | number | boolean | null

/** A JSON array */
export type JsonArray = JsonValue[]

/** A JSON object */
export interface JsonObject {
  [key: string]: JsonValue
}

/** Any value produced by `JSON.parse` */
export type JsonValue = JsonPrimitive | JsonArray | JsonObject

/**
 * Returns true if the value is a JSON object (not an array, not null).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Searches the whole tree for a field named `key` and returns its value.
 *
 * First match wins, depth-first in document order: for every object field
 * the name is compared first, then the field's value is searched before the
 * next field is visited. Arrays are searched element by element.
 *
 * A field holding JSON `null` is a match and yields `null`. A tree without
 * such a field yields `undefined`.
 *
 * @example
 * ```typescript
 * findValue({ id: '1', result: { version: 1 } }, 'version') // 1
 * findValue({ id: '1', result: null }, 'result') // null
 * findValue({ id: '1' }, 'result') // undefined
 * ```
 */
export function findValue(node: JsonValue, key: string): JsonValue | undefined {
  if (Array.isArray(node)) {
    for (const element of node) {
      const found = findValue(element, key)
      if (found !== undefined) {
        return found
      }
    }
    return undefined
  }

  if (!isJsonObject(node)) {
    return undefined
  }

  for (const [name, value] of Object.entries(node)) {
    if (name === key) {
      return value
    }
    const found = findValue(value, key)
    if (found !== undefined) {
      return found
    }
  }
  return undefined
}

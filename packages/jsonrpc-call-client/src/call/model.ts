/**
 * @file Model Contract
 *
 * Calls never know the concrete model classes they return. They only need
 * nested parameter objects to convert themselves to JSON.
 */

import type { JsonValue } from './json.js'

/**
 * A model object that can be sent as a request parameter.
 *
 * @example
 * ```typescript
 * class Limits implements JsonModel {
 *   constructor(private start: number, private end: number) {}
 *
 *   toJsonNode(): JsonValue {
 *     return { start: this.start, end: this.end }
 *   }
 * }
 * ```
 */
export interface JsonModel {
  toJsonNode(): JsonValue
}

export function isJsonModel(value: unknown): value is JsonModel {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toJsonNode' in value &&
    typeof value.toJsonNode === 'function'
  )
}

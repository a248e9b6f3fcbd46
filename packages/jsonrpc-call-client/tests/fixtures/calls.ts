/**
 * Calls and models used across the test suites.
 */

import { z } from 'zod'
import { AbstractCall } from '../../src/call/abstract-call.js'
import type { ParameterValue } from '../../src/call/abstract-call.js'
import type { IdGenerator } from '../../src/call/id-generator.js'
import type { JsonValue } from '../../src/call/json.js'
import type { JsonModel } from '../../src/call/model.js'

export const versionSchema = z.object({
  major: z.number().int(),
  minor: z.number().int(),
})

export type Version = z.infer<typeof versionSchema>

export const movieSchema = z.object({
  movieid: z.number().int(),
  label: z.string(),
})

export type Movie = z.infer<typeof movieSchema>

export class Limits implements JsonModel {
  constructor(
    private readonly start: number,
    private readonly end: number
  ) {}

  toJsonNode(): JsonValue {
    return { start: this.start, end: this.end }
  }
}

/**
 * Single-item call: `{"result": {"version": {...}}}`.
 */
export class GetVersion extends AbstractCall<Version> {
  constructor(nextId?: IdGenerator) {
    super(nextId)
    this.addParameter('properties', ['version'])
  }

  getName(): string {
    return 'Application.GetProperties'
  }

  protected returnsList(): boolean {
    return false
  }

  protected override parseOne(result: JsonValue | undefined): Version | null {
    if (result === undefined || result === null) {
      return null
    }
    return versionSchema.parse(this.parseVersionNode(result))
  }

  private parseVersionNode(result: JsonValue): JsonValue {
    if (typeof result === 'object' && result !== null && !Array.isArray(result)) {
      return result.version ?? null
    }
    return null
  }
}

/**
 * List call: `{"result": {"limits": {...}, "movies": [...]}}`.
 */
export class GetMovies extends AbstractCall<Movie> {
  constructor(limits?: Limits, nextId?: IdGenerator) {
    super(nextId)
    this.addParameter(AbstractCall.LIMITS, limits)
  }

  getName(): string {
    return 'VideoLibrary.GetMovies'
  }

  protected returnsList(): boolean {
    return true
  }

  protected override parseMany(result: JsonValue | undefined): Movie[] | null {
    if (result === undefined) {
      return null
    }
    const movies = this.parseResults(result, 'movies')
    return movies === null ? null : movies.map((movie) => movieSchema.parse(movie))
  }
}

/**
 * Call exposing `addParameter()` so tests can feed it every value shape.
 */
export class ParameterProbe extends AbstractCall<string> {
  constructor(nextId?: IdGenerator) {
    super(nextId)
  }

  getName(): string {
    return 'Test.Probe'
  }

  protected returnsList(): boolean {
    return false
  }

  protected override parseOne(result: JsonValue | undefined): string | null {
    return typeof result === 'string' ? result : null
  }

  set(name: string, value: ParameterValue | null | undefined): this {
    this.addParameter(name, value)
    return this
  }

  parameters() {
    return this.getParameters()
  }

  results(node: JsonValue, key: string) {
    return this.parseResults(node, key)
  }
}

/**
 * List call keeping raw strings, used for shape and copy tests.
 */
export class ListLabels extends AbstractCall<string> {
  constructor(nextId?: IdGenerator) {
    super(nextId)
  }

  getName(): string {
    return 'Test.ListLabels'
  }

  protected returnsList(): boolean {
    return true
  }

  protected override parseMany(result: JsonValue | undefined): string[] | null {
    if (result === undefined || result === null) {
      return null
    }
    if (!Array.isArray(result)) {
      throw new TypeError('Expected an array of labels')
    }
    return result.map((entry) => String(entry))
  }
}

/**
 * A call that does not override either parse function.
 */
export class Ping extends AbstractCall<string> {
  constructor(nextId?: IdGenerator) {
    super(nextId)
  }

  getName(): string {
    return 'JSONRPC.Ping'
  }

  protected returnsList(): boolean {
    return false
  }
}

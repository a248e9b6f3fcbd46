/**
 * @file JSON-RPC Client
 *
 * Binds a host configuration to a transport and runs calls end to end:
 * the call's request goes out through the transport and the response comes
 * back into the call.
 *
 * @example
 * ```typescript
 * const client = new JsonRpcClient({ address: 'localhost', httpPort: 8080 })
 *
 * const movies = await client.call(new GetMovies(new Limits(0, 25)))
 * for (const movie of movies.getResults() ?? []) {
 *   console.log(movie)
 * }
 * ```
 */

import { AbstractCall } from './call/abstract-call.js'
import { parseHostConfig, type HostConfig, type HostConfigInput } from './config/host-config.js'
import { HttpTransport } from './rpc/http-transport.js'
import { log, type JsonRpcLogger } from './rpc/logger.js'

/**
 * Options for `JsonRpcClient`.
 */
export interface JsonRpcClientOptions {
  /**
   * Transport executing the requests. A new `HttpTransport` sharing the
   * client's logger is created when omitted.
   */
  transport?: Pick<HttpTransport, 'execute'>

  /** Logger for client events, also handed to the default transport */
  logger?: JsonRpcLogger
}

export class JsonRpcClient {
  private readonly config: HostConfig

  private readonly transport: Pick<HttpTransport, 'execute'>

  private readonly logger?: JsonRpcLogger

  /**
   * @param config - Host configuration, validated on construction
   * @throws {z.ZodError} If the configuration is invalid
   */
  constructor(config: HostConfigInput, options: JsonRpcClientOptions = {}) {
    this.config = parseHostConfig(config)
    this.logger = options.logger
    this.transport = options.transport ?? new HttpTransport({ logger: options.logger })
  }

  /**
   * Returns the validated host configuration.
   */
  getConfig(): HostConfig {
    return this.config
  }

  /**
   * Executes a call and stores the parsed result on it.
   *
   * If the server answers with `"result": null` the call stores a null
   * result: `getResult()` is null, `getResults()` is null for a list method
   * and `[null]` otherwise.
   *
   * @returns The same call, for chaining
   * @throws {ApiError} Transport and protocol failures, unchanged
   */
  async call<TCall extends AbstractCall<unknown>>(call: TCall): Promise<TCall> {
    const response = await this.transport.execute(this.config, call.getRequest())

    if (response === null) {
      log(this.logger, 'debug', 'Call returned no data', {
        requestId: call.getId(),
        method: call.getName(),
      })
      call.setResponse({ [AbstractCall.RESULT]: null })
      return call
    }

    call.setResponse(response)
    return call
  }
}

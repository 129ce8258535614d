// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { Exchange, ExchangePattern, type Headers } from './Exchange.js'
import { ExchangeFuture } from './ExchangeFuture.js'
import { ExecutionError } from './RoutingErrors.js'
import type { RoutingContext } from './RoutingContext.js'

/**
 * Sends messages to endpoints on behalf of code outside of any route.
 *
 * Request methods use InOut exchanges and answer the result body; send
 * methods use InOnly exchanges. A failed exchange rejects with an
 * ExecutionError whose cause is the exchange failure.
 */
export class ProducerTemplate {
  constructor(private readonly _context: RoutingContext) {}

  /**
   * Sends the exchange and answers it once it is complete.
   * Rejects only when the endpoint URI cannot be resolved.
   */
  async send(uri: string, exchange: Exchange): Promise<Exchange> {
    const endpoint = this._context.endpoint(uri)
    await endpoint.send(exchange)
    return exchange
  }

  async requestBody(uri: string, body: unknown, headers: Headers = {}): Promise<unknown> {
    const exchange = await this.send(uri, new Exchange(ExchangePattern.InOut, body, headers))
    return this.resultOf(exchange)
  }

  async sendBody(uri: string, body: unknown, headers: Headers = {}): Promise<void> {
    const exchange = await this.send(uri, new Exchange(ExchangePattern.InOnly, body, headers))
    this.resultOf(exchange)
  }

  asyncRequestBody(uri: string, body: unknown, headers: Headers = {}): ExchangeFuture<unknown> {
    return new ExchangeFuture(this.requestBody(uri, body, headers))
  }

  asyncSendBody(uri: string, body: unknown, headers: Headers = {}): ExchangeFuture<void> {
    return new ExchangeFuture(this.sendBody(uri, body, headers))
  }

  private resultOf(exchange: Exchange): unknown {
    const failure = exchange.failure()
    if (failure) {
      throw new ExecutionError(
        `Exception occurred during execution on the exchange: ${exchange}`,
        failure,
        exchange.id()
      )
    }
    return exchange.result()
  }
}

// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Logger } from 'domo-actors'
import { type Exchange, RoutingHeaders } from './Exchange.js'
import { type ExceptionPolicy, matches } from './ExceptionPolicy.js'
import { type Processor, processFully } from './Processor.js'

/**
 * Wraps the target of a route and applies its exception policies to
 * failed exchanges: redelivery first, then handling.
 *
 * Every redelivery stamps the exchange with the `Redelivered` and
 * `RedeliveryCounter` headers before processing it again.
 */
export class RedeliveryErrorHandler implements Processor {
  constructor(
    private readonly _target: Processor,
    private readonly _policies: readonly ExceptionPolicy[],
    private readonly _logger: Logger,
    private readonly _defaultRedeliveryDelay: number = 0
  ) {}

  async process(exchange: Exchange): Promise<void> {
    let redeliveries = 0

    for (;;) {
      await processFully(this._target, exchange)

      const failure = exchange.failure()
      if (!failure) {
        return
      }

      const policy = this.policyFor(failure)
      if (!policy) {
        return
      }

      if (redeliveries < (policy.maximumRedeliveries ?? 0)) {
        redeliveries++
        this._logger.debug(`Redelivering ${exchange} attempt ${redeliveries} after: ${failure.message}`)

        exchange.reset()
        exchange.setHeader(RoutingHeaders.Redelivered, true)
        exchange.setHeader(RoutingHeaders.RedeliveryCounter, redeliveries)

        await this.pause(policy.redeliveryDelay ?? this._defaultRedeliveryDelay)
        continue
      }

      exchange.setHeader(RoutingHeaders.RedeliveryExhausted, true)

      if (policy.handled) {
        this.handle(exchange, policy, failure)
      }
      return
    }
  }

  private handle(exchange: Exchange, policy: ExceptionPolicy, failure: Error): void {
    try {
      const result = policy.transform ? policy.transform(failure, exchange) : exchange.getBody()
      exchange.setResult(result)
    } catch (error: unknown) {
      const errorObj = error instanceof Error ? error : new Error(String(error))
      this._logger.error(`Exception policy transform failed: ${errorObj.message}`, errorObj)
      exchange.setFailure(errorObj)
    }
  }

  private policyFor(failure: Error): ExceptionPolicy | undefined {
    return this._policies.find(policy => matches(policy, failure))
  }

  private async pause(delay: number): Promise<void> {
    if (delay > 0) {
      await new Promise(resolve => setTimeout(resolve, delay))
    }
  }
}

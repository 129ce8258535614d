// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Cancellable, Logger, Scheduled, Scheduler } from 'domo-actors'
import { TimeoutError } from '../routing/RoutingErrors.js'
import { isAck, isFailure, ResponseProtocol } from './Acknowledgement.js'
import { UnexpectedResponseError } from './BridgeErrors.js'

export type Resolution =
  | { kind: 'reply', value: unknown }
  | { kind: 'ack' }
  | { kind: 'failure', error: Error }
  | { kind: 'timeout', error: TimeoutError }

/**
 * Waits for the response of the consumer actor to one exchange.
 *
 * The first of a response, a failure or the deadline settles the waiter;
 * anything arriving afterwards is discarded. The deadline is enforced by
 * the stage scheduler whether or not the actor is still alive.
 */
export class ExchangeWaiter implements Scheduled<string> {
  private _resolution?: Resolution
  private _complete: (resolution: Resolution) => void = () => {}
  private readonly _outcome: Promise<Resolution>
  private readonly _deadline: number
  private readonly _timer: Cancellable

  constructor(
    private readonly _correlationId: string,
    private readonly _endpointUri: string,
    private readonly _protocol: ResponseProtocol,
    private readonly _timeout: number,
    scheduler: Scheduler,
    private readonly _logger: Logger
  ) {
    this._outcome = new Promise<Resolution>(resolve => {
      this._complete = resolve
    })
    this._deadline = Date.now() + _timeout
    this._timer = scheduler.scheduleOnce(this, _correlationId, _timeout, 0)
  }

  correlationId(): string {
    return this._correlationId
  }

  /**
   * Epoch milliseconds after which the waiter times out.
   */
  deadline(): number {
    return this._deadline
  }

  isPending(): boolean {
    return this._resolution === undefined
  }

  resolution(): Resolution | undefined {
    return this._resolution
  }

  outcome(): Promise<Resolution> {
    return this._outcome
  }

  /**
   * Settles with the actor's response: Ack, a Failure, or (auto-reply only)
   * any other value as the reply. Answers false if already settled.
   */
  respond(response: unknown): boolean {
    if (isAck(response)) {
      return this.settle({ kind: 'ack' })
    }
    if (isFailure(response)) {
      return this.settle({ kind: 'failure', error: response.cause })
    }
    if (this._protocol === ResponseProtocol.ManualAck) {
      return this.settle({ kind: 'failure', error: new UnexpectedResponseError(this._endpointUri, response) })
    }
    return this.settle({ kind: 'reply', value: response })
  }

  fail(error: Error): boolean {
    return this.settle({ kind: 'failure', error })
  }

  //================================
  // Scheduled
  //================================

  intervalSignal(_scheduled: Scheduled<string>, _correlationId: string): void {
    this.settle({ kind: 'timeout', error: new TimeoutError(this.timeoutMessage(), this._timeout) })
  }

  //================================
  // internal
  //================================

  private settle(resolution: Resolution): boolean {
    if (this._resolution) {
      this._logger.debug(
        `ExchangeWaiter: Discarding late ${resolution.kind} for exchange ${this._correlationId}; already ${this._resolution.kind}`
      )
      return false
    }

    this._resolution = resolution
    this._timer.cancel()
    this._complete(resolution)

    return true
  }

  private timeoutMessage(): string {
    if (this._protocol === ResponseProtocol.ManualAck) {
      return `Failed to get Ack or Failure from the consumer at [${this._endpointUri}]: ` +
        `no acknowledgement received within the reply timeout of ${this._timeout}ms`
    }
    return `Failed to get reply from the consumer at [${this._endpointUri}]: ` +
      `no reply received within the reply timeout of ${this._timeout}ms`
  }
}

// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { Actor, type ActorProtocol } from 'domo-actors'
import { Exchange, ExchangePattern } from '../routing/Exchange.js'
import { Failure } from './Acknowledgement.js'
import { Envelope } from './Envelope.js'
import { RouteBridge } from './RouteBridge.js'

/**
 * The protocol of every producer actor.
 */
export interface Producer extends ActorProtocol {
  /**
   * Sends the message to the producer's endpoint and answers the
   * transformed response.
   */
  produce(message: unknown): Promise<unknown>
}

/**
 * An actor that sends its messages to an endpoint.
 *
 * By default each message is sent as a request and the response Envelope,
 * or a Failure when the exchange failed, is answered to the sender.
 * Oneway producers send InOnly exchanges and answer an Envelope with no body.
 */
export abstract class ProducerActor extends Actor implements Producer {
  constructor() {
    super()
  }

  abstract endpointUri(): string

  oneway(): boolean {
    return false
  }

  async produce(message: unknown): Promise<unknown> {
    const envelope = this.transformOutgoing(message)
    const pattern = this.oneway() ? ExchangePattern.InOnly : ExchangePattern.InOut
    const exchange = new Exchange(pattern, envelope.body(), envelope.headers())

    try {
      await RouteBridge.of(this.stage()).template().send(this.endpointUri(), exchange)
    } catch (error: unknown) {
      exchange.setFailure(error instanceof Error ? error : new Error(String(error)))
    }

    const failure = exchange.failure()
    if (failure) {
      this.logger().debug(`${this.type()}: Exchange to [${this.endpointUri()}] failed: ${failure.message}`)
      return this.transformResponse(new Failure(failure))
    }

    return this.transformResponse(Envelope.of(exchange.result(), exchange.headers()))
  }

  /**
   * Turns the message into the Envelope to send. A message that is not
   * already an Envelope becomes the body of one.
   */
  protected transformOutgoing(message: unknown): Envelope {
    return message instanceof Envelope ? message : Envelope.of(message)
  }

  protected transformResponse(response: Envelope | Failure): unknown {
    return response
  }
}

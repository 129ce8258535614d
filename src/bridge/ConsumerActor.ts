// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { Actor, type ActorProtocol } from 'domo-actors'
import type { ExceptionPolicy } from '../routing/ExceptionPolicy.js'
import type { RouteDefinition } from '../routing/RouteDefinition.js'
import { Ack, Failure, type ResponseProtocol } from './Acknowledgement.js'
import type { ConsumerSettings } from './ConsumerAdapter.js'
import type { Envelope } from './Envelope.js'
import { RouteBridge } from './RouteBridge.js'

/**
 * The protocol of every consumer actor.
 */
export interface Consumer extends ActorProtocol {
  /**
   * Handles one envelope consumed from the endpoint.
   *
   * Answer the reply (AutoReply), Ack or a Failure; answer undefined to
   * respond later with reply(), acknowledge() or fail().
   */
  receive(envelope: Envelope): Promise<unknown>
}

/**
 * An actor that consumes the messages of an endpoint.
 *
 * When the actor starts, a route from endpointUri() to the actor is created
 * and activated; when it stops, the route is removed. Restarts by its
 * supervisor keep the route, so messages keep flowing to the same address.
 *
 * ```typescript
 * class EchoConsumer extends ConsumerActor {
 *   endpointUri(): string { return 'direct:echo' }
 *
 *   async receive(envelope: Envelope): Promise<unknown> {
 *     return `received ${envelope.bodyAs(BodyTypes.string)}`
 *   }
 * }
 * ```
 *
 * Override replyTimeout(), responseProtocol(), blocking(), errorPassing(),
 * exceptionPolicies() or onRouteDefinition() to change how the exchanges
 * are handled. Each defaults to the RouteBridge configuration.
 */
export abstract class ConsumerActor extends Actor implements Consumer {
  private _bridge?: RouteBridge

  constructor() {
    super()
  }

  abstract endpointUri(): string

  abstract receive(envelope: Envelope): Promise<unknown>

  //================================
  // consumer settings
  //================================

  /**
   * Milliseconds to wait for the response to each exchange.
   */
  replyTimeout(): number {
    return this.bridge().config().replyTimeout
  }

  responseProtocol(): ResponseProtocol {
    return this.bridge().config().responseProtocol
  }

  /**
   * Whether exchanges complete within the routing call (true), or are
   * suspended and completed when the response arrives (false).
   */
  blocking(): boolean {
    return this.bridge().config().blocking
  }

  /**
   * Whether an error thrown by receive() fails the exchange at once.
   */
  errorPassing(): boolean {
    return false
  }

  exceptionPolicies(): ExceptionPolicy[] {
    return []
  }

  /**
   * Customizes the route definition before the route is created.
   * Invoked once per activation.
   */
  onRouteDefinition(definition: RouteDefinition): RouteDefinition {
    return definition
  }

  //================================
  // lifecycle
  //================================

  async start(): Promise<void> {
    await super.start()

    this._bridge = RouteBridge.of(this.stage())

    await this._bridge.registerConsumer(this.address(), this.selfAs<Consumer>(), this.consumerSettings())
  }

  async beforeStop(): Promise<void> {
    await super.beforeStop()

    if (this._bridge) {
      await this._bridge.deregisterConsumer(this.address())
    }
  }

  //================================
  // out-of-band responses
  //================================

  /**
   * Replies to the envelope's exchange after receive() answered undefined.
   * Answers false when the exchange is no longer pending.
   */
  protected reply(envelope: Envelope, value: unknown): boolean {
    const correlationId = envelope.correlationId()
    if (correlationId === undefined) {
      return false
    }
    return this.bridge().respond(this.address(), correlationId, value)
  }

  protected acknowledge(envelope: Envelope): boolean {
    return this.reply(envelope, Ack)
  }

  protected fail(envelope: Envelope, error: Error): boolean {
    return this.reply(envelope, new Failure(error))
  }

  //================================
  // internal
  //================================

  protected bridge(): RouteBridge {
    return this._bridge ?? RouteBridge.of(this.stage())
  }

  private consumerSettings(): ConsumerSettings {
    return {
      endpointUri: this.endpointUri(),
      replyTimeout: this.replyTimeout(),
      responseProtocol: this.responseProtocol(),
      blocking: this.blocking(),
      errorPassing: this.errorPassing(),
      exceptionPolicies: this.exceptionPolicies(),
      onRouteDefinition: definition => this.onRouteDefinition(definition)
    }
  }
}

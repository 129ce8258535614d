// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Address, Logger, Scheduler } from 'domo-actors'
import { uuidv7 } from 'uuidv7'
import type { Exchange } from '../routing/Exchange.js'
import type { ExceptionPolicy } from '../routing/ExceptionPolicy.js'
import type { Processor } from '../routing/Processor.js'
import type { Route } from '../routing/Route.js'
import { RouteDefinition } from '../routing/RouteDefinition.js'
import type { RoutingContext } from '../routing/RoutingContext.js'
import { RouteCreationError } from '../routing/RoutingErrors.js'
import { Ack, ResponseProtocol } from './Acknowledgement.js'
import { ActivationState, type ActivationTracker } from './ActivationTracker.js'
import { ActorUnavailableError } from './BridgeErrors.js'
import { Envelope } from './Envelope.js'
import { ExchangeWaiter, type Resolution } from './ExchangeWaiter.js'

/**
 * The actor side of a consumer: where envelopes are delivered.
 * Normally the consumer actor's own proxy.
 */
export interface EnvelopeReceiver {
  receive(envelope: Envelope): Promise<unknown>

  isStopped(): boolean
}

export interface ConsumerSettings {
  readonly endpointUri: string
  readonly replyTimeout: number
  readonly responseProtocol: ResponseProtocol
  readonly blocking: boolean

  /**
   * When true, an error thrown by the actor while handling an envelope
   * fails the exchange at once (and so reaches the exception policies).
   * Otherwise the error is left to supervision and the exchange waits for
   * a response until its reply timeout.
   */
  readonly errorPassing: boolean

  readonly exceptionPolicies: readonly ExceptionPolicy[]

  /**
   * Invoked once, when the route is built, to customize its definition.
   */
  readonly onRouteDefinition?: (definition: RouteDefinition) => RouteDefinition
}

/**
 * Connects one consumer actor to the routing middleware.
 *
 * The adapter owns the consumer's route and is the route's processor:
 * each inbound exchange becomes an Envelope delivered to the actor, and
 * an ExchangeWaiter completes the exchange with the actor's response,
 * its failure, or a timeout.
 *
 * Routes are bound to the actor's address and proxy, so restarts of the
 * actor leave the route untouched; only deactivate() removes it.
 */
export class ConsumerAdapter implements Processor {
  private readonly _waiters = new Map<string, ExchangeWaiter>()
  private _route?: Route

  constructor(
    private readonly _actorId: Address,
    private readonly _receiver: EnvelopeReceiver,
    private readonly _settings: ConsumerSettings,
    private readonly _context: RoutingContext,
    private readonly _tracker: ActivationTracker,
    private readonly _scheduler: Scheduler,
    private readonly _logger: Logger
  ) {}

  actorId(): Address {
    return this._actorId
  }

  settings(): ConsumerSettings {
    return this._settings
  }

  route(): Route | undefined {
    return this._route
  }

  /**
   * Answers the number of exchanges still waiting for the actor.
   */
  pendingCount(): number {
    return this._waiters.size
  }

  //================================
  // lifecycle
  //================================

  /**
   * Builds and starts the consumer's route. A failure to do so is recorded
   * with the ActivationTracker, where awaitActivation() observes it.
   */
  async activate(): Promise<void> {
    this._tracker.activating(this._actorId)

    let route: Route
    try {
      route = await this._context.addRoute(this.routeDefinition())
    } catch (error: unknown) {
      const failure = error instanceof RouteCreationError
        ? error
        : new RouteCreationError(this.routeId(), this._settings.endpointUri, error)

      this._logger.error(`ConsumerAdapter: ${failure.message}`, failure)
      if (this._tracker.stateOf(this._actorId) === ActivationState.Activating) {
        this._tracker.failedToActivate(this._actorId, failure)
      }
      return
    }

    if (this._tracker.stateOf(this._actorId) !== ActivationState.Activating) {
      await this._context.removeRoute(route.id())
      return
    }

    this._route = route
    this._tracker.activated(this._actorId)
    this._logger.log(`ConsumerAdapter: Consumer ${this._actorId.valueAsString()} activated on [${this._settings.endpointUri}]`)
  }

  /**
   * Removes the consumer's route. Exchanges still in flight are left to
   * their reply timeouts.
   */
  async deactivate(): Promise<void> {
    const state = this._tracker.stateOf(this._actorId)
    if (state !== ActivationState.Activating && state !== ActivationState.Active) {
      return
    }

    this._tracker.deactivating(this._actorId)

    const route = this._route
    this._route = undefined

    if (route) {
      try {
        await this._context.removeRoute(route.id())
      } catch (error: unknown) {
        const errorObj = error instanceof Error ? error : new Error(String(error))
        this._logger.error(`ConsumerAdapter: Failed to remove route ${route.id()}: ${errorObj.message}`, errorObj)
      }
    }

    this._tracker.deactivated(this._actorId)
    this._logger.log(`ConsumerAdapter: Consumer ${this._actorId.valueAsString()} deactivated from [${this._settings.endpointUri}]`)
  }

  //================================
  // Processor
  //================================

  async process(exchange: Exchange): Promise<void> {
    if (this._receiver.isStopped()) {
      exchange.setFailure(new ActorUnavailableError(this._settings.endpointUri))
      return
    }

    const waiter = this.arm()
    this.dispatch(exchange, Envelope.fromExchange(exchange, waiter.correlationId()), waiter)

    if (this._settings.blocking) {
      this.complete(exchange, await waiter.outcome())
      return
    }

    exchange.suspend()
    waiter.outcome().then(resolution => {
      this.complete(exchange, resolution)
      exchange.resume()
    })
  }

  /**
   * Responds to the pending exchange correlated by the id, as when the
   * actor acknowledges or replies outside of its receive() result.
   * Answers false when no such exchange is pending.
   */
  respond(correlationId: string, response: unknown): boolean {
    const waiter = this._waiters.get(correlationId)
    if (!waiter) {
      this._logger.debug(`ConsumerAdapter: No pending exchange ${correlationId} on [${this._settings.endpointUri}]`)
      return false
    }
    return waiter.respond(response)
  }

  //================================
  // internal
  //================================

  private arm(): ExchangeWaiter {
    const correlationId = uuidv7()
    const waiter = new ExchangeWaiter(
      correlationId,
      this._settings.endpointUri,
      this._settings.responseProtocol,
      this._settings.replyTimeout,
      this._scheduler,
      this._logger
    )

    this._waiters.set(correlationId, waiter)
    waiter.outcome().then(() => this._waiters.delete(correlationId))

    return waiter
  }

  private dispatch(exchange: Exchange, envelope: Envelope, waiter: ExchangeWaiter): void {
    const response = this._receiver.receive(envelope)

    if (this._settings.responseProtocol === ResponseProtocol.AutoReply && !exchange.isInOut()) {
      waiter.respond(Ack)
    }

    response.then(
      value => {
        if (value !== undefined && waiter.isPending()) {
          this.respond(waiter.correlationId(), value)
        }
      },
      (error: unknown) => this.receiverFailed(waiter, error)
    )
  }

  private receiverFailed(waiter: ExchangeWaiter, error: unknown): void {
    const errorObj = error instanceof Error ? error : new Error(String(error))

    if (this._settings.errorPassing) {
      waiter.fail(errorObj)
      return
    }

    this._logger.debug(
      `ConsumerAdapter: Consumer at [${this._settings.endpointUri}] failed on exchange ${waiter.correlationId()}: ` +
      `${errorObj.message}; awaiting a response until the reply timeout`
    )
  }

  private complete(exchange: Exchange, resolution: Resolution): void {
    switch (resolution.kind) {
      case 'reply':
        exchange.setResult(resolution.value)
        break
      case 'ack':
        exchange.setResult(undefined)
        break
      case 'failure':
      case 'timeout':
        exchange.setFailure(resolution.error)
        break
    }
  }

  private routeDefinition(): RouteDefinition {
    const definition = RouteDefinition.from(this._settings.endpointUri)
      .withRouteId(this.routeId())
      .withExceptionPolicies(this._settings.exceptionPolicies)
      .process(this)

    const customize = this._settings.onRouteDefinition
    return customize ? customize(definition) : definition
  }

  private routeId(): string {
    return `consumer-${this._actorId.valueAsString()}`
  }
}

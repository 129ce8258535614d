// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Address, Logger, Stage } from 'domo-actors'
import type { Headers } from '../routing/Exchange.js'
import type { ProducerTemplate } from '../routing/ProducerTemplate.js'
import { RoutingContext } from '../routing/RoutingContext.js'
import { type ActivationState, ActivationTracker } from './ActivationTracker.js'
import { type BridgeConfig, BridgeConfigs } from './BridgeConfig.js'
import { DuplicateConsumerError } from './BridgeErrors.js'
import { ConsumerAdapter, type ConsumerSettings, type EnvelopeReceiver } from './ConsumerAdapter.js'

/**
 * Anything that has an actor address, such as an actor proxy.
 */
export interface Addressable {
  address(): Address
}

/**
 * The bridge between the actors of one Stage and the routing middleware.
 *
 * One bridge exists per stage, registered as a stage value. Consumer actors
 * find it with RouteBridge.of() when they start; callers use it to await
 * consumer activation and to send messages to endpoints.
 *
 * ```typescript
 * const bridge = RouteBridge.start(stage(), { replyTimeout: 5_000 })
 * const echo = stage().actorFor<Consumer>(echoProtocol, definition)
 * await bridge.awaitActivation(echo)
 * const reply = await bridge.sendTo('direct:echo', 'hello')
 * ```
 */
export class RouteBridge {
  static readonly RegisteredName = 'actor-route-bridge'

  private readonly _context: RoutingContext
  private readonly _template: ProducerTemplate
  private readonly _tracker = new ActivationTracker()
  private readonly _consumers = new Map<string, ConsumerAdapter>()
  private _shutdown = false

  private constructor(
    private readonly _stage: Stage,
    private readonly _config: BridgeConfig
  ) {
    this._context = new RoutingContext(_stage.logger(), _config.redeliveryDelay)
    this._template = this._context.createProducerTemplate()
  }

  /**
   * Creates the bridge of the stage with the config overrides applied to
   * BridgeConfigs.DEFAULT, replacing any bridge already registered.
   */
  static start(stage: Stage, config: Partial<BridgeConfig> = {}): RouteBridge {
    const bridge = new RouteBridge(stage, BridgeConfigs.from(config))
    stage.registerValue(RouteBridge.RegisteredName, bridge)
    return bridge
  }

  /**
   * Answers the bridge of the stage, starting one with the default
   * configuration when none is registered.
   */
  static of(stage: Stage): RouteBridge {
    return RouteBridge.registeredOn(stage) ?? RouteBridge.start(stage)
  }

  private static registeredOn(stage: Stage): RouteBridge | undefined {
    try {
      return stage.registeredValue<RouteBridge>(RouteBridge.RegisteredName)
    } catch {
      return undefined
    }
  }

  config(): BridgeConfig {
    return this._config
  }

  context(): RoutingContext {
    return this._context
  }

  template(): ProducerTemplate {
    return this._template
  }

  tracker(): ActivationTracker {
    return this._tracker
  }

  logger(): Logger {
    return this._stage.logger()
  }

  //================================
  // consumers
  //================================

  /**
   * Creates the adapter of the consumer actor and activates its route.
   * Route creation failures do not reject; they are reported through
   * awaitActivation().
   */
  async registerConsumer(actorId: Address, receiver: EnvelopeReceiver, settings: ConsumerSettings): Promise<ConsumerAdapter> {
    const key = actorId.valueAsString()

    if (this._consumers.has(key)) {
      throw new DuplicateConsumerError(key)
    }

    const adapter = new ConsumerAdapter(
      actorId,
      receiver,
      settings,
      this._context,
      this._tracker,
      this._stage.scheduler(),
      this._stage.logger()
    )

    this._consumers.set(key, adapter)
    await adapter.activate()

    return adapter
  }

  /**
   * Deactivates the consumer's route and forgets the consumer.
   */
  async deregisterConsumer(actorId: Address): Promise<void> {
    const key = actorId.valueAsString()
    const adapter = this._consumers.get(key)

    if (!adapter) {
      return
    }

    this._consumers.delete(key)
    await adapter.deactivate()
  }

  consumer(actor: Addressable): ConsumerAdapter | undefined {
    return this._consumers.get(actor.address().valueAsString())
  }

  consumerCount(): number {
    return this._consumers.size
  }

  /**
   * Responds out of band to an exchange pending on the consumer.
   * Answers false when the consumer or the exchange is unknown.
   */
  respond(actorId: Address, correlationId: string, response: unknown): boolean {
    const adapter = this._consumers.get(actorId.valueAsString())
    if (!adapter) {
      this.logger().debug(`RouteBridge: No consumer ${actorId.valueAsString()} for response to ${correlationId}`)
      return false
    }
    return adapter.respond(correlationId, response)
  }

  //================================
  // callers
  //================================

  activationState(actor: Addressable): ActivationState {
    return this._tracker.stateOf(actor.address())
  }

  awaitActivation(actor: Addressable, timeoutMs: number = this._config.activationTimeout): Promise<void> {
    return this._tracker.awaitActivation(actor.address(), timeoutMs)
  }

  awaitDeactivation(actor: Addressable, timeoutMs: number = this._config.activationTimeout): Promise<void> {
    return this._tracker.awaitDeactivation(actor.address(), timeoutMs)
  }

  /**
   * Answers the number of Active consumers. Routes added to the routing
   * context directly are not counted; see context().routeCount().
   */
  routeCount(): number {
    return this._tracker.routeCount()
  }

  /**
   * Sends the body to the endpoint as a request and answers the reply.
   * Rejects with an ExecutionError when the exchange fails.
   */
  sendTo(uri: string, body: unknown, headers: Headers = {}): Promise<unknown> {
    return this._template.requestBody(uri, body, headers)
  }

  isShutdown(): boolean {
    return this._shutdown
  }

  /**
   * Deactivates every consumer, stops the routing context and removes the
   * bridge from its stage.
   */
  async shutdown(): Promise<void> {
    if (this._shutdown) {
      return
    }
    this._shutdown = true

    for (const adapter of Array.from(this._consumers.values())) {
      await adapter.deactivate()
    }
    this._consumers.clear()

    await this._context.stop()

    if (RouteBridge.registeredOn(this._stage) === this) {
      this._stage.deregisterValue(RouteBridge.RegisteredName)
    }

    this.logger().log('RouteBridge: Shut down')
  }
}

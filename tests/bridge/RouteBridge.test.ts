// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { type Address, Uuid7Address, stage } from 'domo-actors'
import { ResponseProtocol } from '@/bridge/Acknowledgement'
import { ActivationState } from '@/bridge/ActivationTracker'
import { DuplicateConsumerError } from '@/bridge/BridgeErrors'
import { BridgeConfigs } from '@/bridge/BridgeConfig'
import type { ConsumerSettings, EnvelopeReceiver } from '@/bridge/ConsumerAdapter'
import type { Envelope } from '@/bridge/Envelope'
import { RouteBridge } from '@/bridge/RouteBridge'
import { RouteDefinition } from '@/routing/RouteDefinition'

class EchoReceiver implements EnvelopeReceiver {
  async receive(envelope: Envelope): Promise<unknown> {
    return `${envelope.body()} from ${envelope.header('sender')}`
  }

  isStopped(): boolean {
    return false
  }
}

function settingsFor(endpointUri: string): ConsumerSettings {
  return {
    endpointUri,
    replyTimeout: 1_000,
    responseProtocol: ResponseProtocol.AutoReply,
    blocking: false,
    errorPassing: false,
    exceptionPolicies: []
  }
}

describe('RouteBridge', () => {
  let bridge: RouteBridge
  let consumerId: Address

  beforeEach(() => {
    bridge = RouteBridge.start(stage(), BridgeConfigs.TESTING)
    consumerId = Uuid7Address.unique()
  })

  afterEach(async () => {
    await bridge.shutdown()
  })

  describe('registration on the stage', () => {
    it('should answer the registered bridge', () => {
      expect(RouteBridge.of(stage())).toBe(bridge)
      expect(bridge.config()).toEqual(BridgeConfigs.TESTING)
    })

    it('should start a default bridge after shutdown', async () => {
      await bridge.shutdown()

      const next = RouteBridge.of(stage())

      expect(next).not.toBe(bridge)
      expect(next.config()).toEqual(BridgeConfigs.DEFAULT)
      await next.shutdown()
    })

    it('should not deregister a replacing bridge', async () => {
      const replacing = RouteBridge.start(stage(), { replyTimeout: 50 })

      await bridge.shutdown()

      expect(RouteBridge.of(stage())).toBe(replacing)
      await replacing.shutdown()
    })
  })

  describe('consumers', () => {
    it('should register and activate a consumer', async () => {
      const adapter = await bridge.registerConsumer(consumerId, new EchoReceiver(), settingsFor('direct:echo'))

      expect(bridge.consumer({ address: () => consumerId })).toBe(adapter)
      expect(bridge.consumerCount()).toBe(1)
      expect(bridge.activationState({ address: () => consumerId })).toBe(ActivationState.Active)
      expect(bridge.routeCount()).toBe(1)
    })

    it('should count Active consumers only', async () => {
      await bridge.context().addRoute(RouteDefinition.from('direct:in').to('direct:out'))

      expect(bridge.routeCount()).toBe(0)

      await bridge.registerConsumer(consumerId, new EchoReceiver(), settingsFor('direct:echo'))

      expect(bridge.routeCount()).toBe(1)
      expect(bridge.context().routeCount()).toBe(2)
    })

    it('should reject a second registration of the same consumer', async () => {
      await bridge.registerConsumer(consumerId, new EchoReceiver(), settingsFor('direct:echo'))

      await expect(
        bridge.registerConsumer(consumerId, new EchoReceiver(), settingsFor('direct:other'))
      ).rejects.toBeInstanceOf(DuplicateConsumerError)
    })

    it('should deregister and deactivate a consumer', async () => {
      await bridge.registerConsumer(consumerId, new EchoReceiver(), settingsFor('direct:echo'))

      await bridge.deregisterConsumer(consumerId)

      expect(bridge.consumerCount()).toBe(0)
      expect(bridge.activationState({ address: () => consumerId })).toBe(ActivationState.Inactive)
      expect(bridge.routeCount()).toBe(0)
    })

    it('should ignore deregistration of an unknown consumer', async () => {
      await expect(bridge.deregisterConsumer(consumerId)).resolves.toBeUndefined()
    })

    it('should not respond for an unknown consumer', () => {
      expect(bridge.respond(consumerId, 'c-1', 'late')).toBe(false)
    })
  })

  describe('callers', () => {
    it('should send a request with headers', async () => {
      await bridge.registerConsumer(consumerId, new EchoReceiver(), settingsFor('direct:echo'))

      expect(await bridge.sendTo('direct:echo', 'hello', { sender: 'tester' })).toBe('hello from tester')
    })
  })

  describe('shutdown', () => {
    it('should deactivate every consumer', async () => {
      const otherId = Uuid7Address.unique()
      await bridge.registerConsumer(consumerId, new EchoReceiver(), settingsFor('direct:one'))
      await bridge.registerConsumer(otherId, new EchoReceiver(), settingsFor('direct:two'))

      await bridge.shutdown()

      expect(bridge.isShutdown()).toBe(true)
      expect(bridge.consumerCount()).toBe(0)
      expect(bridge.routeCount()).toBe(0)
      expect(bridge.activationState({ address: () => otherId })).toBe(ActivationState.Inactive)
    })
  })
})

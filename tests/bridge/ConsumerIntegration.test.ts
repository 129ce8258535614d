// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { type ActorProtocol, stage } from 'domo-actors'
import { Ack, Failure, ResponseProtocol } from '@/bridge/Acknowledgement'
import { BodyTypes } from '@/bridge/BodyTypes'
import { BridgeConfigs } from '@/bridge/BridgeConfig'
import { type Consumer, ConsumerActor } from '@/bridge/ConsumerActor'
import type { Envelope } from '@/bridge/Envelope'
import { RouteBridge } from '@/bridge/RouteBridge'
import { Exchange, ExchangePattern } from '@/routing/Exchange'
import { type ExceptionPolicy, Transforms } from '@/routing/ExceptionPolicy'
import type { RouteDefinition } from '@/routing/RouteDefinition'
import { ExecutionError, RouteCreationError, TimeoutError } from '@/routing/RoutingErrors'
import { TestProtocol } from '../support/TestProtocol'
import { causeOf, rejectionOf } from '../support/Rejections'

// ============================================================================
// Test Consumers
// ============================================================================

class TestConsumer extends ConsumerActor {
  constructor(private readonly uri: string) {
    super()
  }

  endpointUri(): string {
    return this.uri
  }

  async receive(_envelope: Envelope): Promise<unknown> {
    return undefined
  }
}

class ReceivedConsumer extends ConsumerActor {
  constructor(private readonly uri: string) {
    super()
  }

  endpointUri(): string {
    return this.uri
  }

  async receive(envelope: Envelope): Promise<unknown> {
    return `received ${envelope.bodyAs(BodyTypes.string)}`
  }
}

class BlockingConsumer extends ReceivedConsumer {
  blocking(): boolean {
    return true
  }
}

class SlowConsumer extends ConsumerActor {
  endpointUri(): string {
    return 'direct:a3'
  }

  replyTimeout(): number {
    return 10
  }

  async receive(_envelope: Envelope): Promise<unknown> {
    await new Promise(resolve => setTimeout(resolve, 200))
    return 'done'
  }
}

interface Restartable extends Consumer {
  explode(): Promise<void>
}

class RestartingConsumer extends ConsumerActor implements Restartable {
  constructor(private readonly restarts: Error[]) {
    super()
  }

  endpointUri(): string {
    return 'direct:a2'
  }

  async receive(envelope: Envelope): Promise<unknown> {
    return `received ${envelope.bodyAs(BodyTypes.string)}`
  }

  async explode(): Promise<void> {
    throw new Error('explode')
  }

  afterRestart(reason: Error): void {
    super.afterRestart(reason)
    this.restarts.push(reason)
  }
}

class ErrorThrowingConsumer extends ConsumerActor {
  constructor(private readonly uri: string) {
    super()
  }

  endpointUri(): string {
    return this.uri
  }

  errorPassing(): boolean {
    return true
  }

  async receive(envelope: Envelope): Promise<unknown> {
    throw new Error(`error: ${envelope.body()}`)
  }

  onRouteDefinition(definition: RouteDefinition): RouteDefinition {
    return definition.onException(Error).handled(true).transform(Transforms.exceptionMessage).end()
  }
}

class FailingOnceConsumer extends ConsumerActor {
  constructor(
    private readonly uri: string,
    private readonly policies: ExceptionPolicy[] = []
  ) {
    super()
  }

  endpointUri(): string {
    return this.uri
  }

  errorPassing(): boolean {
    return true
  }

  exceptionPolicies(): ExceptionPolicy[] {
    return this.policies
  }

  async receive(envelope: Envelope): Promise<unknown> {
    if (envelope.isRedelivered()) {
      return `accepted: ${envelope.body()}`
    }
    throw new Error(`rejected: ${envelope.body()}`)
  }
}

class RedeliveringOnceConsumer extends FailingOnceConsumer {
  onRouteDefinition(definition: RouteDefinition): RouteDefinition {
    return definition.onException(Error).maximumRedeliveries(1).end()
  }
}

type ManualAckBehavior = (envelope: Envelope) => unknown

class ManualAckConsumer extends ConsumerActor {
  constructor(
    private readonly behavior: ManualAckBehavior,
    private readonly timeout: number = 1_000
  ) {
    super()
  }

  endpointUri(): string {
    return 'direct:manual-ack'
  }

  responseProtocol(): ResponseProtocol {
    return ResponseProtocol.ManualAck
  }

  replyTimeout(): number {
    return this.timeout
  }

  async receive(envelope: Envelope): Promise<unknown> {
    return this.behavior(envelope)
  }
}

interface AcknowledgeLater extends Consumer {
  acknowledgeAll(): Promise<number>
  pending(): Promise<number>
}

class AcknowledgeLaterConsumer extends ConsumerActor implements AcknowledgeLater {
  private readonly unacknowledged: Envelope[] = []

  endpointUri(): string {
    return 'direct:ack-later'
  }

  responseProtocol(): ResponseProtocol {
    return ResponseProtocol.ManualAck
  }

  async receive(envelope: Envelope): Promise<unknown> {
    this.unacknowledged.push(envelope)
    return undefined
  }

  async pending(): Promise<number> {
    return this.unacknowledged.length
  }

  async acknowledgeAll(): Promise<number> {
    return this.unacknowledged.splice(0).filter(envelope => this.acknowledge(envelope)).length
  }
}

// ============================================================================
// Tests
// ============================================================================

describe('Consumer integration', () => {
  let bridge: RouteBridge
  const launched: ActorProtocol[] = []

  beforeEach(() => {
    bridge = RouteBridge.start(stage(), BridgeConfigs.TESTING)
  })

  afterEach(async () => {
    for (const consumer of launched.splice(0)) {
      if (!consumer.isStopped()) {
        await consumer.stop()
      }
    }
    await bridge.shutdown()
  })

  function launch<T extends Consumer>(typeName: string, create: () => ConsumerActor): T {
    const consumer = stage().actorFor<T>(new TestProtocol(typeName, create))
    launched.push(consumer)
    return consumer
  }

  async function start<T extends Consumer>(typeName: string, create: () => ConsumerActor): Promise<T> {
    const consumer = launch<T>(typeName, create)
    await bridge.awaitActivation(consumer, 1_000)
    return consumer
  }

  describe('activation', () => {
    it('should fail activation with RouteCreationError for an invalid endpoint', async () => {
      const consumer = launch<Consumer>('TestConsumer', () => new TestConsumer('some invalid uri'))

      await expect(bridge.awaitActivation(consumer, 1_000)).rejects.toBeInstanceOf(RouteCreationError)
    })

    it('should fail activation for an endpoint of an unknown component', async () => {
      const consumer = launch<Consumer>('TestConsumer', () => new TestConsumer('file://target/abcde'))

      const failure = await rejectionOf(bridge.awaitActivation(consumer, 1_000), RouteCreationError)

      expect(failure.endpointUri).toBe('file://target/abcde')
    })

    it('should fail activation of a second consumer of the same direct endpoint', async () => {
      await start<Consumer>('TestConsumer', () => new TestConsumer('direct:shared'))
      const second = launch<Consumer>('TestConsumer', () => new TestConsumer('direct:shared'))

      await expect(bridge.awaitActivation(second, 1_000)).rejects.toThrow('already has a consumer')
      expect(bridge.routeCount()).toBe(1)
    })

    it('should unregister the route when the consumer stops', async () => {
      const consumer = await start<Consumer>('TestConsumer', () => new TestConsumer('direct:test-actor'))

      expect(bridge.routeCount()).toBeGreaterThan(0)

      await consumer.stop()
      await bridge.awaitDeactivation(consumer, 1_000)

      expect(bridge.routeCount()).toBe(0)
      expect(bridge.consumer(consumer)).toBeUndefined()
    })
  })

  describe('request/reply', () => {
    it('should support in-out messaging', async () => {
      await start<Consumer>('ReceivedConsumer', () => new ReceivedConsumer('direct:a1'))

      expect(await bridge.sendTo('direct:a1', 'some message')).toBe('received some message')
    })

    it('should time out if the consumer is slow', async () => {
      await start<Consumer>('SlowConsumer', () => new SlowConsumer())

      const failure = await rejectionOf(bridge.sendTo('direct:a3', 'some msg 3'), ExecutionError)

      expect(failure.cause).toBeInstanceOf(TimeoutError)
    })

    it('should process messages even after actor restart', async () => {
      const restarts: Error[] = []
      const consumer = await start<Restartable>('RestartingConsumer', () => new RestartingConsumer(restarts))

      await expect(consumer.explode()).rejects.toThrow('explode')
      await vi.waitFor(() => expect(restarts).toHaveLength(1))

      expect(await bridge.sendTo('direct:a2', 'xyz')).toBe('received xyz')
      expect(bridge.routeCount()).toBe(1)
    })

    it('should answer concurrent requests with their own replies', async () => {
      await start<Consumer>('ReceivedConsumer', () => new ReceivedConsumer('direct:concurrent'))

      const replies = await Promise.all(['one', 'two', 'three'].map(body => bridge.sendTo('direct:concurrent', body)))

      expect(replies).toEqual(['received one', 'received two', 'received three'])
    })

    it('should complete exchanges asynchronously when non-blocking', async () => {
      await start<Consumer>('ReceivedConsumer', () => new ReceivedConsumer('direct:non-blocking'))

      const exchange = await bridge.template().send('direct:non-blocking', new Exchange(ExchangePattern.InOut, 'x'))

      expect(exchange.isAsync()).toBe(true)
      expect(exchange.result()).toBe('received x')
    })

    it('should complete exchanges within processing when blocking', async () => {
      await start<Consumer>('BlockingConsumer', () => new BlockingConsumer('direct:blocking'))

      const exchange = await bridge.template().send('direct:blocking', new Exchange(ExchangePattern.InOut, 'y'))

      expect(exchange.isAsync()).toBe(false)
      expect(exchange.result()).toBe('received y')
    })
  })

  describe('error handling', () => {
    it('should support error handling through route modification', async () => {
      await start<Consumer>('ErrorThrowingConsumer', () => new ErrorThrowingConsumer('direct:error-handler-test'))

      expect(await bridge.sendTo('direct:error-handler-test', 'hello')).toBe('error: hello')
    })

    it('should support redelivery through route modification', async () => {
      await start<Consumer>('RedeliveringOnceConsumer', () => new RedeliveringOnceConsumer('direct:failing-once-consumer'))

      expect(await bridge.sendTo('direct:failing-once-consumer', 'hello')).toBe('accepted: hello')
    })

    it('should support redelivery through exception policies', async () => {
      await start<Consumer>('FailingOnceConsumer', () => new FailingOnceConsumer(
        'direct:failing-once-policies',
        [{ on: Error, maximumRedeliveries: 1 }]
      ))

      expect(await bridge.sendTo('direct:failing-once-policies', 'hello')).toBe('accepted: hello')
    })

    it('should fail with the consumer error when no policy applies', async () => {
      await start<Consumer>('FailingOnceConsumer', () => new FailingOnceConsumer('direct:failing-no-policy'))

      const failure = await rejectionOf(bridge.sendTo('direct:failing-no-policy', 'hello'), ExecutionError)

      expect(failure.cause).toHaveProperty('message', 'rejected: hello')
    })
  })

  describe('manual acknowledgement', () => {
    it('should support manual Ack', async () => {
      await start<Consumer>('ManualAckConsumer', () => new ManualAckConsumer(() => Ack))

      const result = await bridge.template().asyncSendBody('direct:manual-ack', 'some message').get(1_000)

      expect(result).toBeUndefined()
    })

    it('should handle manual Ack failure', async () => {
      const someException = new Error('e1')
      await start<Consumer>('ManualAckConsumer', () => new ManualAckConsumer(() => new Failure(someException)))

      const failure = await rejectionOf(bridge.template().asyncSendBody('direct:manual-ack', 'some message').get(1_000), ExecutionError)

      expect(causeOf(failure.cause)).toBe(someException)
    })

    it('should time out with a readable message if manual Ack is not received', async () => {
      await start<Consumer>('ManualAckConsumer', () => new ManualAckConsumer(() => undefined, 10))

      const failure = await rejectionOf(bridge.template().asyncSendBody('direct:manual-ack', 'some message').get(1_000), ExecutionError)

      expect(causeOf(failure.cause)).toBeInstanceOf(TimeoutError)
      expect(causeOf(failure.cause)).toHaveProperty('message', expect.stringContaining('Failed to get Ack'))
    })

    it('should reject plain replies', async () => {
      await start<Consumer>('ManualAckConsumer', () => new ManualAckConsumer(() => 'plain reply'))

      const failure = await rejectionOf(bridge.template().asyncSendBody('direct:manual-ack', 'some message').get(1_000), ExecutionError)

      expect(causeOf(failure.cause)).toHaveProperty(
        'message',
        'Expected Ack or Failure from the consumer at [direct:manual-ack], but got a response of type string'
      )
    })

    it('should accept an acknowledgement sent after receive', async () => {
      const consumer = await start<AcknowledgeLater>('AcknowledgeLaterConsumer', () => new AcknowledgeLaterConsumer())

      const future = bridge.template().asyncSendBody('direct:ack-later', 'some message')
      await vi.waitFor(async () => expect(await consumer.pending()).toBe(1))

      expect(await consumer.acknowledgeAll()).toBe(1)
      await expect(future.get(1_000)).resolves.toBeUndefined()
    })
  })
})

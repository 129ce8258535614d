// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { describe, it, expect, beforeEach } from 'vitest'
import { stage } from 'domo-actors'
import { Ack, Failure, ResponseProtocol } from '@/bridge/Acknowledgement'
import { UnexpectedResponseError } from '@/bridge/BridgeErrors'
import { ExchangeWaiter } from '@/bridge/ExchangeWaiter'
import { TimeoutError } from '@/routing/RoutingErrors'
import { CapturingLogger } from '../support/CapturingLogger'

describe('ExchangeWaiter', () => {
  let logger: CapturingLogger

  beforeEach(() => {
    logger = new CapturingLogger()
  })

  function waiterFor(protocol: ResponseProtocol, timeout: number = 1_000): ExchangeWaiter {
    return new ExchangeWaiter('c-1', 'direct:orders', protocol, timeout, stage().scheduler(), logger)
  }

  describe('auto-reply', () => {
    it('should resolve with the reply', async () => {
      const waiter = waiterFor(ResponseProtocol.AutoReply)

      expect(waiter.isPending()).toBe(true)
      expect(waiter.respond('received some message')).toBe(true)

      expect(await waiter.outcome()).toEqual({ kind: 'reply', value: 'received some message' })
      expect(waiter.isPending()).toBe(false)
    })

    it('should resolve with Ack', async () => {
      const waiter = waiterFor(ResponseProtocol.AutoReply)

      waiter.respond(Ack)

      expect(await waiter.outcome()).toEqual({ kind: 'ack' })
    })

    it('should resolve with the cause of a Failure', async () => {
      const waiter = waiterFor(ResponseProtocol.AutoReply)
      const error = new Error('e1')

      waiter.respond(new Failure(error))

      const resolution = await waiter.outcome()
      expect(resolution.kind).toBe('failure')
      expect(resolution.kind === 'failure' && resolution.error).toBe(error)
    })

    it('should time out without a response', async () => {
      const waiter = waiterFor(ResponseProtocol.AutoReply, 10)

      const resolution = await waiter.outcome()

      expect(resolution.kind).toBe('timeout')
      if (resolution.kind !== 'timeout') {
        return
      }
      expect(resolution.error).toBeInstanceOf(TimeoutError)
      expect(resolution.error.message).toBe(
        'Failed to get reply from the consumer at [direct:orders]: no reply received within the reply timeout of 10ms'
      )
      expect(resolution.error.timeout).toBe(10)
    })
  })

  describe('manual ack', () => {
    it('should resolve with Ack', async () => {
      const waiter = waiterFor(ResponseProtocol.ManualAck)

      waiter.respond(Ack)

      expect(await waiter.outcome()).toEqual({ kind: 'ack' })
    })

    it('should fail a plain response with UnexpectedResponseError', async () => {
      const waiter = waiterFor(ResponseProtocol.ManualAck)

      waiter.respond('not an ack')

      const resolution = await waiter.outcome()
      expect(resolution.kind).toBe('failure')
      if (resolution.kind !== 'failure') {
        return
      }
      expect(resolution.error).toBeInstanceOf(UnexpectedResponseError)
      expect(resolution.error.message).toBe(
        'Expected Ack or Failure from the consumer at [direct:orders], but got a response of type string'
      )
    })

    it('should time out asking for an acknowledgement', async () => {
      const waiter = waiterFor(ResponseProtocol.ManualAck, 10)

      const resolution = await waiter.outcome()

      expect(resolution.kind).toBe('timeout')
      expect(resolution.kind === 'timeout' && resolution.error.message).toBe(
        'Failed to get Ack or Failure from the consumer at [direct:orders]: ' +
        'no acknowledgement received within the reply timeout of 10ms'
      )
    })
  })

  describe('single resolution', () => {
    it('should keep the first response', async () => {
      const waiter = waiterFor(ResponseProtocol.AutoReply)

      expect(waiter.respond('first')).toBe(true)
      expect(waiter.respond('second')).toBe(false)
      expect(waiter.fail(new Error('late'))).toBe(false)

      expect(await waiter.outcome()).toEqual({ kind: 'reply', value: 'first' })
      expect(waiter.resolution()).toEqual({ kind: 'reply', value: 'first' })
      expect(logger.messages('debug')).toEqual([
        'ExchangeWaiter: Discarding late reply for exchange c-1; already reply',
        'ExchangeWaiter: Discarding late failure for exchange c-1; already reply'
      ])
    })

    it('should discard responses after a timeout', async () => {
      const waiter = waiterFor(ResponseProtocol.AutoReply, 10)

      await waiter.outcome()

      expect(waiter.respond('too late')).toBe(false)
      expect(waiter.resolution()?.kind).toBe('timeout')
    })

    it('should not time out after a response', async () => {
      const waiter = waiterFor(ResponseProtocol.AutoReply, 10)

      waiter.respond('in time')
      await new Promise(resolve => setTimeout(resolve, 30))

      expect(waiter.resolution()).toEqual({ kind: 'reply', value: 'in time' })
      expect(logger.messages('debug')).toEqual([])
    })

    it('should resolve with a failure', async () => {
      const waiter = waiterFor(ResponseProtocol.AutoReply)
      const error = new Error('actor failed')

      expect(waiter.fail(error)).toBe(true)

      expect(await waiter.outcome()).toEqual({ kind: 'failure', error })
    })
  })

  it('should expose correlation id and deadline', () => {
    const before = Date.now()
    const waiter = waiterFor(ResponseProtocol.AutoReply, 500)

    expect(waiter.correlationId()).toBe('c-1')
    expect(waiter.deadline()).toBeGreaterThanOrEqual(before + 500)
    expect(waiter.deadline()).toBeLessThanOrEqual(Date.now() + 500)

    waiter.respond(Ack)
  })
})

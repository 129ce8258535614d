// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Component, Endpoint, EndpointConsumer } from './Component.js'
import type { EndpointUri } from './EndpointUri.js'
import type { Exchange } from './Exchange.js'
import { type Processor, processFully } from './Processor.js'
import { NoConsumerAvailableError } from './RoutingErrors.js'

/**
 * In-memory, call-through transport: a send on `direct:name` runs the
 * route consuming `direct:name` within the sender's own promise chain.
 *
 * Each direct endpoint accepts a single consumer at a time. Only endpoints
 * with a started consumer are kept; any other URI resolves to a fresh
 * endpoint that fails its exchanges with NoConsumerAvailableError.
 */
export class DirectComponent implements Component {
  private readonly _bound = new Map<string, DirectEndpoint>()

  scheme(): string {
    return 'direct'
  }

  endpoint(uri: EndpointUri): Endpoint {
    return this._bound.get(uri.key()) ?? new DirectEndpoint(uri, this)
  }

  /**
   * Answers the number of endpoints that have a started consumer.
   */
  boundCount(): number {
    return this._bound.size
  }

  bind(endpoint: DirectEndpoint): void {
    const key = endpoint.uri().key()
    const bound = this._bound.get(key)
    if (bound && bound !== endpoint) {
      throw new Error(`Endpoint [${key}] already has a consumer`)
    }
    this._bound.set(key, endpoint)
  }

  unbind(endpoint: DirectEndpoint): void {
    const key = endpoint.uri().key()
    if (this._bound.get(key) === endpoint) {
      this._bound.delete(key)
    }
  }
}

class DirectEndpoint implements Endpoint {
  private _consumer?: DirectConsumer

  constructor(
    private readonly _uri: EndpointUri,
    private readonly _component: DirectComponent
  ) {}

  uri(): EndpointUri {
    return this._uri
  }

  createConsumer(processor: Processor): EndpointConsumer {
    if (this._consumer) {
      throw new Error(`Endpoint [${this._uri.key()}] already has a consumer`)
    }
    return new DirectConsumer(this, processor)
  }

  async send(exchange: Exchange): Promise<void> {
    const consumer = this._consumer
    if (!consumer) {
      exchange.setFailure(new NoConsumerAvailableError(this._uri.toString()))
      return
    }
    await processFully(consumer.processor(), exchange)
  }

  bind(consumer: DirectConsumer): void {
    if (this._consumer && this._consumer !== consumer) {
      throw new Error(`Endpoint [${this._uri.key()}] already has a consumer`)
    }
    this._component.bind(this)
    this._consumer = consumer
  }

  unbind(consumer: DirectConsumer): void {
    if (this._consumer === consumer) {
      this._consumer = undefined
      this._component.unbind(this)
    }
  }
}

class DirectConsumer implements EndpointConsumer {
  constructor(
    private readonly _endpoint: DirectEndpoint,
    private readonly _processor: Processor
  ) {}

  processor(): Processor {
    return this._processor
  }

  async start(): Promise<void> {
    this._endpoint.bind(this)
  }

  async stop(): Promise<void> {
    this._endpoint.unbind(this)
  }
}

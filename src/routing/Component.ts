// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { EndpointUri } from './EndpointUri.js'
import type { Exchange } from './Exchange.js'
import type { Processor } from './Processor.js'

/**
 * Receives exchanges arriving at an endpoint and hands them to a route.
 */
export interface EndpointConsumer {
  start(): Promise<void>

  stop(): Promise<void>
}

/**
 * An addressable source and destination of exchanges.
 */
export interface Endpoint {
  uri(): EndpointUri

  /**
   * Creates a consumer feeding arriving exchanges to the processor.
   * Fails when the endpoint cannot accept another consumer.
   */
  createConsumer(processor: Processor): EndpointConsumer

  /**
   * Sends the exchange to this endpoint. The outcome is recorded on the
   * exchange itself.
   */
  send(exchange: Exchange): Promise<void>
}

/**
 * Factory of endpoints for one URI scheme.
 */
export interface Component {
  scheme(): string

  endpoint(uri: EndpointUri): Endpoint
}

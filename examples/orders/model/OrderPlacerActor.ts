// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Definition, Protocol } from 'domo-actors'
import { Envelope, type Failure, ProducerActor } from '../../../src/index.js'
import type { OrderPlacer } from './OrderTypes.js'

export class OrderPlacerActor extends ProducerActor implements OrderPlacer {
  endpointUri(): string {
    return 'direct:orders'
  }

  protected transformResponse(response: Envelope | Failure): unknown {
    return response instanceof Envelope ? response.body() : `Order failed: ${response.cause.message}`
  }
}

export const OrderPlacerProtocol: Protocol = {
  instantiator: () => ({
    instantiate: (_definition: Definition) => new OrderPlacerActor()
  }),
  type: () => 'OrderPlacer'
}

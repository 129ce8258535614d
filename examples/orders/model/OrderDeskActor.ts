// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Definition, Protocol } from 'domo-actors'
import {
  ConsumerActor,
  type Envelope,
  type ExceptionPolicy,
  Transforms
} from '../../../src/index.js'
import type { Order, OrderConfirmation, OrderDesk } from './OrderTypes.js'

export class InvalidOrderError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidOrderError'
  }
}

export class OrderDeskActor extends ConsumerActor implements OrderDesk {
  private _nextOrderNumber = 1

  endpointUri(): string {
    return 'direct:orders'
  }

  errorPassing(): boolean {
    return true
  }

  // Invalid orders are answered with the validation message instead of failing the caller.
  exceptionPolicies(): ExceptionPolicy[] {
    return [{ on: InvalidOrderError, handled: true, transform: Transforms.exceptionMessage }]
  }

  async receive(envelope: Envelope): Promise<unknown> {
    const order = this.orderFrom(envelope.body())

    const confirmation: OrderConfirmation = {
      orderNumber: this._nextOrderNumber++,
      item: order.item,
      quantity: order.quantity
    }

    this.logger().log(`OrderDesk: Took order ${confirmation.orderNumber} for ${order.quantity} x ${order.item}`)

    return confirmation
  }

  async ordersTaken(): Promise<number> {
    return this._nextOrderNumber - 1
  }

  private orderFrom(body: unknown): Order {
    if (typeof body !== 'object' || body === null) {
      throw new InvalidOrderError('An order must name an item and a quantity')
    }
    const item: unknown = Reflect.get(body, 'item')
    const quantity: unknown = Reflect.get(body, 'quantity')

    if (typeof item !== 'string' || item.trim().length === 0) {
      throw new InvalidOrderError('An order must name an item')
    }
    if (typeof quantity !== 'number' || !Number.isInteger(quantity) || quantity <= 0) {
      throw new InvalidOrderError(`Cannot order ${String(quantity)} of ${item}`)
    }

    return { item: item.trim(), quantity }
  }
}

export const OrderDeskProtocol: Protocol = {
  instantiator: () => ({
    instantiate: (_definition: Definition) => new OrderDeskActor()
  }),
  type: () => 'OrderDesk'
}

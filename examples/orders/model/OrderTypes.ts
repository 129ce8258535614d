// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Consumer, Producer } from '../../../src/index.js'

export interface Order {
  item: string
  quantity: number
}

export interface OrderConfirmation {
  orderNumber: number
  item: string
  quantity: number
}

/**
 * Takes orders arriving on direct:orders.
 */
export interface OrderDesk extends Consumer {
  ordersTaken(): Promise<number>
}

/**
 * Places orders with the order desk.
 */
export interface OrderPlacer extends Producer {}

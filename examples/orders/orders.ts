// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import * as readline from 'readline'
import { stage } from 'domo-actors'
import { RouteBridge } from '../../src/index.js'
import { OrderDeskProtocol } from './model/OrderDeskActor.js'
import { OrderPlacerProtocol } from './model/OrderPlacerActor.js'
import type { OrderDesk, OrderPlacer } from './model/OrderTypes.js'

/**
 * Order Desk CLI
 *
 * Interactive command-line interface showing actors behind endpoints:
 * - An OrderDesk consumer actor answering requests on direct:orders
 * - An OrderPlacer producer actor sending orders to that endpoint
 * - Requests sent straight from outside the actor system
 * - Invalid orders answered through an exception policy
 */

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout
})

function prompt(question: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(question, resolve)
  })
}

function showMenu(): void {
  console.log('\n')
  console.log('╔════════════════════════════════════════╗')
  console.log('║          Order Desk Example            ║')
  console.log('╠════════════════════════════════════════╣')
  console.log('║  1. Place Order Through Producer       ║')
  console.log('║  2. Place Order From Outside           ║')
  console.log('║  3. Orders Taken                       ║')
  console.log('║  0. Exit                               ║')
  console.log('╚════════════════════════════════════════╝\n')
}

async function readOrder(): Promise<{ item: string, quantity: number }> {
  const item = await prompt('Item: ')
  const quantity = Number(await prompt('Quantity: '))
  return { item, quantity }
}

async function main(): Promise<void> {
  const bridge = RouteBridge.start(stage(), { replyTimeout: 5_000 })

  const desk = stage().actorFor<OrderDesk>(OrderDeskProtocol)
  const placer = stage().actorFor<OrderPlacer>(OrderPlacerProtocol)

  await bridge.awaitActivation(desk)

  for (;;) {
    showMenu()
    const choice = (await prompt('Choice: ')).trim()

    try {
      switch (choice) {
        case '1':
          console.log(await placer.produce(await readOrder()))
          break
        case '2':
          console.log(await bridge.sendTo('direct:orders', await readOrder()))
          break
        case '3':
          console.log(`Orders taken: ${await desk.ordersTaken()}`)
          break
        case '0':
          await placer.stop()
          await desk.stop()
          await bridge.shutdown()
          rl.close()
          return
        default:
          console.log(`Unknown choice: ${choice}`)
      }
    } catch (error: unknown) {
      console.log(`Error: ${error instanceof Error ? error.message : String(error)}`)
    }
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})

// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Exchange } from './Exchange.js'

/**
 * Processes one exchange.
 *
 * A processor either completes the exchange before its returned promise
 * settles, or suspends it (see Exchange.suspend()) and resumes it later.
 * Failures are reported through Exchange.setFailure(), not by rejecting.
 */
export interface Processor {
  process(exchange: Exchange): Promise<void>
}

/**
 * Runs the processor and waits for a suspended exchange to be resumed.
 */
export async function processFully(processor: Processor, exchange: Exchange): Promise<void> {
  try {
    await processor.process(exchange)
  } catch (error: unknown) {
    exchange.setFailure(error instanceof Error ? error : new Error(String(error)))
    exchange.resume()
  }

  await exchange.resumption()
}

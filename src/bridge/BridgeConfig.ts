// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { z } from 'zod'
import { ResponseProtocol } from './Acknowledgement.js'

/**
 * Bridge-wide defaults. Each consumer may override the per-consumer values.
 */
export const BridgeConfigSchema = z.object({
  /** Milliseconds a consumer waits for the actor's reply or acknowledgement. */
  replyTimeout: z.number().int().positive(),

  /** Milliseconds awaitActivation() and awaitDeactivation() wait by default. */
  activationTimeout: z.number().int().positive(),

  responseProtocol: z.nativeEnum(ResponseProtocol),

  /** Whether consumers complete exchanges within the processing call. */
  blocking: z.boolean(),

  /** Milliseconds between redelivery attempts when a policy sets none. */
  redeliveryDelay: z.number().int().nonnegative()
})

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>

/**
 * Predefined bridge configurations.
 */
export class BridgeConfigs {
  /**
   * Default configuration: one minute reply timeout, ten seconds
   * activation timeout, auto-reply, non-blocking consumers.
   */
  static readonly DEFAULT: BridgeConfig = {
    replyTimeout: 60_000,
    activationTimeout: 10_000,
    responseProtocol: ResponseProtocol.AutoReply,
    blocking: false,
    redeliveryDelay: 0
  }

  /**
   * Short timeouts for tests.
   */
  static readonly TESTING: BridgeConfig = {
    ...BridgeConfigs.DEFAULT,
    replyTimeout: 1_000,
    activationTimeout: 1_000
  }

  /**
   * Answers DEFAULT with the overrides applied, validated.
   * Throws a ZodError for invalid values.
   */
  static from(overrides: Partial<BridgeConfig> = {}, base: BridgeConfig = BridgeConfigs.DEFAULT): BridgeConfig {
    return BridgeConfigSchema.parse({ ...base, ...overrides })
  }
}

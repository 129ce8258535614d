// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { z } from 'zod'
import type { Exchange } from './Exchange.js'

/**
 * Any Error subclass, used to match failures by type.
 */
export type ErrorClass = abstract new (...args: never[]) => Error

export type ErrorPredicate = (error: Error) => boolean

export type ExceptionMatcher = ErrorClass | ErrorPredicate

/**
 * Computes the result of an exchange whose failure was handled.
 */
export type ExceptionTransform = (error: Error, exchange: Exchange) => unknown

/**
 * How a route reacts to a failed exchange whose error matches `on`.
 *
 * ```typescript
 * const policies: ExceptionPolicy[] = [
 *   { on: ValidationError, handled: true, transform: Transforms.exceptionMessage },
 *   { on: Error, maximumRedeliveries: 2, redeliveryDelay: 50 }
 * ]
 * ```
 *
 * The first policy whose matcher accepts the error applies. Redeliveries run
 * first; once they are exhausted, a `handled` policy turns the failure into a
 * successful result, otherwise the failure reaches the caller.
 */
export interface ExceptionPolicy {
  readonly on: ExceptionMatcher
  handled?: boolean
  transform?: ExceptionTransform
  maximumRedeliveries?: number
  redeliveryDelay?: number
}

const ExceptionPolicySettingsSchema = z.object({
  handled: z.boolean().optional(),
  maximumRedeliveries: z.number().int().nonnegative().optional(),
  redeliveryDelay: z.number().nonnegative().optional()
})

/**
 * Verifies the settings of the policy, throwing a ZodError when invalid.
 */
export function validateExceptionPolicy(policy: ExceptionPolicy): ExceptionPolicy {
  ExceptionPolicySettingsSchema.parse({
    handled: policy.handled,
    maximumRedeliveries: policy.maximumRedeliveries,
    redeliveryDelay: policy.redeliveryDelay
  })
  return policy
}

export function isErrorClass(matcher: ExceptionMatcher): matcher is ErrorClass {
  return matcher === Error || matcher.prototype instanceof Error
}

export function matches(policy: ExceptionPolicy, error: Error): boolean {
  const matcher = policy.on
  return isErrorClass(matcher) ? error instanceof matcher : matcher(error)
}

/**
 * Common transforms for handled failures.
 */
export const Transforms = {
  exceptionMessage: (error: Error): string => error.message,
  inboundBody: (_error: Error, exchange: Exchange): unknown => exchange.getBody()
}

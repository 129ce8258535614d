// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { z } from 'zod'

/**
 * A conversion of an envelope body or header to `T`.
 *
 * Any zod schema accepting unknown input qualifies, so structured bodies
 * are converted with the application's own schemas:
 *
 * ```typescript
 * const Order = z.object({ id: z.string(), quantity: z.number().int() })
 * const order = envelope.bodyAs(Order)
 * ```
 */
export type BodyType<T> = z.ZodType<T, z.ZodTypeDef, unknown>

const decoder = new TextDecoder()
const encoder = new TextEncoder()

const scalar = z.union([z.string(), z.number(), z.boolean(), z.bigint()])

/**
 * Built-in conversions for the common scalar types.
 */
export const BodyTypes = {
  /** Scalars by their string form, bytes decoded as UTF-8. */
  string: z.union([
    scalar.transform(value => String(value)),
    z.instanceof(Uint8Array).transform(bytes => decoder.decode(bytes))
  ]),

  /** Numbers, and strings holding a number. */
  number: z.union([
    z.number(),
    z.string().trim().min(1).pipe(z.coerce.number())
  ]).pipe(z.number().finite()),

  /** Booleans, and the strings "true" and "false". */
  boolean: z.union([
    z.boolean(),
    z.enum(['true', 'false']).transform(value => value === 'true')
  ]),

  /** Bytes as-is, strings encoded as UTF-8. */
  bytes: z.union([
    z.instanceof(Uint8Array),
    z.string().transform(value => encoder.encode(value))
  ])
} satisfies Record<string, BodyType<unknown>>

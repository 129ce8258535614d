// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { ExecutionError, TimeoutError } from './RoutingErrors.js'

/**
 * The pending result of an exchange sent asynchronously.
 *
 * get() rejects with an ExecutionError wrapping the failure of the send,
 * or with a TimeoutError when the result is not available in time.
 */
export class ExchangeFuture<T> {
  private _done = false

  constructor(private readonly _pending: Promise<T>) {
    this._pending.then(
      () => { this._done = true },
      () => { this._done = true }
    )
  }

  isDone(): boolean {
    return this._done
  }

  get(timeoutMs?: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            reject(new TimeoutError(`Exchange result not available within ${timeoutMs}ms`, timeoutMs))
          }, timeoutMs)

      this._pending.then(
        value => {
          clearTimeout(timer)
          resolve(value)
        },
        (error: unknown) => {
          clearTimeout(timer)
          const reason = error instanceof Error ? error.message : String(error)
          reject(new ExecutionError(`Exchange failed: ${reason}`, error))
        }
      )
    })
  }
}

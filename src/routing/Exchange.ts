// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { uuidv7 } from 'uuidv7'

/**
 * Message exchange patterns supported by the routing middleware.
 */
export enum ExchangePattern {
  /** Fire-and-forget: the caller only learns whether delivery succeeded. */
  InOnly = 'InOnly',
  /** Request/reply: the caller receives the result body. */
  InOut = 'InOut'
}

/**
 * Header names stamped by the routing middleware.
 */
export const RoutingHeaders = {
  Redelivered: 'Redelivered',
  RedeliveryCounter: 'RedeliveryCounter',
  RedeliveryExhausted: 'RedeliveryExhausted'
} as const

export type Headers = Readonly<Record<string, unknown>>

/**
 * One inbound request/response unit handled by the routing middleware.
 *
 * An exchange holds the inbound body and headers, and at most one outcome:
 * a result set through setResult() or a failure set through setFailure().
 * A processor that cannot complete the exchange within its own call marks
 * it asynchronous with suspend(), and completes it later with resume().
 */
export class Exchange {
  private readonly _id: string = uuidv7()
  private readonly _pattern: ExchangePattern
  private readonly _body: unknown
  private readonly _headers: Map<string, unknown>
  private _result: unknown = undefined
  private _hasResult = false
  private _failure?: Error
  private _async = false
  private _suspension?: { resumed: Promise<void>, resume: () => void }

  constructor(pattern: ExchangePattern, body: unknown, headers: Headers = {}) {
    this._pattern = pattern
    this._body = body
    this._headers = new Map(Object.entries(headers))
  }

  id(): string {
    return this._id
  }

  pattern(): ExchangePattern {
    return this._pattern
  }

  isInOut(): boolean {
    return this._pattern === ExchangePattern.InOut
  }

  getBody(): unknown {
    return this._body
  }

  getHeader(name: string): unknown {
    return this._headers.get(name)
  }

  hasHeader(name: string): boolean {
    return this._headers.has(name)
  }

  setHeader(name: string, value: unknown): void {
    this._headers.set(name, value)
  }

  headers(): Headers {
    return Object.fromEntries(this._headers)
  }

  //================================
  // outcome
  //================================

  setResult(value: unknown): void {
    this._result = value
    this._hasResult = true
    this._failure = undefined
  }

  result(): unknown {
    return this._result
  }

  hasResult(): boolean {
    return this._hasResult
  }

  setFailure(error: Error): void {
    this._failure = error
    this._result = undefined
    this._hasResult = false
  }

  failure(): Error | undefined {
    return this._failure
  }

  isFailed(): boolean {
    return this._failure !== undefined
  }

  /**
   * Forgets any outcome so the exchange can be processed again, as done
   * before a redelivery attempt.
   */
  reset(): void {
    this._failure = undefined
    this._result = undefined
    this._hasResult = false
  }

  //================================
  // asynchronous completion
  //================================

  /**
   * Returns whether this exchange has ever been completed asynchronously.
   */
  isAsync(): boolean {
    return this._async
  }

  isSuspended(): boolean {
    return this._suspension !== undefined
  }

  /**
   * Marks this exchange as completing outside of the current processor call.
   * The route waits for resume() before looking at the outcome.
   */
  suspend(): void {
    if (this._suspension) {
      return
    }

    let resume: () => void = () => {}
    const resumed = new Promise<void>(resolve => {
      resume = resolve
    })

    this._async = true
    this._suspension = { resumed, resume }
  }

  resume(): void {
    const suspension = this._suspension
    if (suspension) {
      this._suspension = undefined
      suspension.resume()
    }
  }

  /**
   * Answers a promise that settles once the exchange is no longer suspended.
   */
  resumption(): Promise<void> {
    return this._suspension ? this._suspension.resumed : Promise.resolve()
  }

  toString(): string {
    return `Exchange[${this._id} ${this._pattern}]`
  }
}

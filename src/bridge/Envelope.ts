// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { type Exchange, type Headers, RoutingHeaders } from '../routing/Exchange.js'
import { type BodyType, BodyTypes } from './BodyTypes.js'
import { TypeConversionError } from './BridgeErrors.js'

/**
 * Immutable message delivered to consumer actors: the body and headers of
 * an inbound exchange, plus the correlation id of the exchange it answers.
 *
 * ```typescript
 * async receive(envelope: Envelope): Promise<unknown> {
 *   return 'received ' + envelope.bodyAs(BodyTypes.string)
 * }
 * ```
 */
export class Envelope {
  private readonly _body: unknown
  private readonly _headers: Headers
  private readonly _correlationId?: string

  constructor(body: unknown, headers: Headers = {}, correlationId?: string) {
    this._body = body
    this._headers = Object.freeze({ ...headers })
    this._correlationId = correlationId
  }

  /**
   * Answers an envelope carrying the body and headers of the exchange,
   * correlated with it.
   */
  static fromExchange(exchange: Exchange, correlationId: string): Envelope {
    return new Envelope(exchange.getBody(), exchange.headers(), correlationId)
  }

  static of(body: unknown, headers: Headers = {}): Envelope {
    return new Envelope(body, headers)
  }

  body(): unknown {
    return this._body
  }

  /**
   * Answers the body converted by the given type, e.g. BodyTypes.string.
   * Throws TypeConversionError when the body cannot be converted.
   */
  bodyAs<T>(type: BodyType<T>): T {
    const converted = type.safeParse(this._body)
    if (!converted.success) {
      throw new TypeConversionError('body', this._body, converted.error)
    }
    return converted.data
  }

  headers(): Headers {
    return this._headers
  }

  headerNames(): string[] {
    return Object.keys(this._headers)
  }

  hasHeader(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this._headers, name)
  }

  header(name: string): unknown {
    return this.hasHeader(name) ? this._headers[name] : undefined
  }

  /**
   * Answers the converted header value, or undefined when the header is
   * absent. Throws TypeConversionError when a present value cannot be
   * converted.
   */
  headerAs<T>(name: string, type: BodyType<T>): T | undefined {
    if (!this.hasHeader(name)) {
      return undefined
    }

    const value = this._headers[name]
    const converted = type.safeParse(value)
    if (!converted.success) {
      throw new TypeConversionError(`header ${name}`, value, converted.error)
    }
    return converted.data
  }

  correlationId(): string | undefined {
    return this._correlationId
  }

  /**
   * Whether the routing middleware redelivered this message after a failure.
   * Only a header converting to true means redelivered; an absent header,
   * false, or any value that is not a boolean does not.
   */
  isRedelivered(): boolean {
    const converted = BodyTypes.boolean.safeParse(this.header(RoutingHeaders.Redelivered))
    return converted.success && converted.data
  }

  /**
   * Answers the redelivery attempt, or 0 when the header is absent or not
   * a number.
   */
  redeliveryCount(): number {
    const converted = BodyTypes.number.safeParse(this.header(RoutingHeaders.RedeliveryCounter))
    return converted.success ? converted.data : 0
  }

  //================================
  // copies
  //================================

  withBody(body: unknown): Envelope {
    return new Envelope(body, this._headers, this._correlationId)
  }

  mapBody<A, B>(type: BodyType<A>, transform: (body: A) => B): Envelope {
    return this.withBody(transform(this.bodyAs(type)))
  }

  withHeaders(headers: Headers): Envelope {
    return new Envelope(this._body, headers, this._correlationId)
  }

  addHeader(name: string, value: unknown): Envelope {
    return this.addHeaders({ [name]: value })
  }

  addHeaders(headers: Headers): Envelope {
    return this.withHeaders({ ...this._headers, ...headers })
  }

  withoutHeader(name: string): Envelope {
    const headers: Record<string, unknown> = { ...this._headers }
    delete headers[name]
    return this.withHeaders(headers)
  }

  equals(other: Envelope): boolean {
    const names = this.headerNames()
    return this._body === other._body &&
      names.length === other.headerNames().length &&
      names.every(name => other.hasHeader(name) && other.header(name) === this.header(name))
  }

  toString(): string {
    return `Envelope[body: ${String(this._body)} headers: ${this.headerNames().join(', ')}]`
  }
}

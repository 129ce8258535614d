// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * How a consumer actor answers the exchanges delivered to it.
 */
export enum ResponseProtocol {
  /**
   * The actor's response is the result of the exchange. One-way exchanges
   * are acknowledged as soon as the message reaches the actor's mailbox.
   */
  AutoReply = 'AutoReply',

  /**
   * The actor must explicitly respond with Ack or a Failure; any other
   * response fails the exchange.
   */
  ManualAck = 'ManualAck'
}

/**
 * Positive acknowledgement: completes the exchange with no result.
 */
export const Ack: unique symbol = Symbol('Ack')

export type Acknowledgement = typeof Ack

/**
 * Negative acknowledgement: fails the exchange with `cause`.
 */
export class Failure {
  constructor(readonly cause: Error) {}

  toString(): string {
    return `Failure(${this.cause.message})`
  }
}

export function isAck(response: unknown): response is Acknowledgement {
  return response === Ack
}

export function isFailure(response: unknown): response is Failure {
  return response instanceof Failure
}

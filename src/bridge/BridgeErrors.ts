// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

export type BridgeErrorCode =
  | 'TYPE_CONVERSION_FAILED'
  | 'UNEXPECTED_RESPONSE'
  | 'ACTOR_UNAVAILABLE'
  | 'ILLEGAL_ACTIVATION_STATE'
  | 'DUPLICATE_CONSUMER'

/**
 * Base error for failures raised by the bridge itself, as opposed to the
 * routing middleware or the actors.
 */
export class BridgeError extends Error {
  readonly code: BridgeErrorCode

  constructor(message: string, code: BridgeErrorCode, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'BridgeError'
    this.code = code
  }
}

/**
 * A body or header value could not be converted to the requested type.
 */
export class TypeConversionError extends BridgeError {
  readonly value: unknown

  constructor(description: string, value: unknown, cause?: unknown) {
    super(`Cannot convert ${description} of type ${typeOf(value)}`, 'TYPE_CONVERSION_FAILED', cause)
    this.name = 'TypeConversionError'
    this.value = value
  }
}

/**
 * A manual-ack consumer responded with something other than Ack or Failure.
 */
export class UnexpectedResponseError extends BridgeError {
  readonly response: unknown

  constructor(endpointUri: string, response: unknown) {
    super(
      `Expected Ack or Failure from the consumer at [${endpointUri}], but got a response of type ${typeOf(response)}`,
      'UNEXPECTED_RESPONSE'
    )
    this.name = 'UnexpectedResponseError'
    this.response = response
  }
}

export class ActorUnavailableError extends BridgeError {
  constructor(endpointUri: string) {
    super(`The consumer actor of [${endpointUri}] is stopped and cannot receive messages`, 'ACTOR_UNAVAILABLE')
    this.name = 'ActorUnavailableError'
  }
}

export class ActivationStateError extends BridgeError {
  constructor(actorId: string, from: string, to: string) {
    super(`Consumer ${actorId} cannot move from ${from} to ${to}`, 'ILLEGAL_ACTIVATION_STATE')
    this.name = 'ActivationStateError'
  }
}

export class DuplicateConsumerError extends BridgeError {
  constructor(actorId: string) {
    super(`Consumer ${actorId} is already registered`, 'DUPLICATE_CONSUMER')
    this.name = 'DuplicateConsumerError'
  }
}

function typeOf(value: unknown): string {
  if (value === null) {
    return 'null'
  }
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'object'
  }
  return typeof value
}

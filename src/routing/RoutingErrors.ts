// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Typed errors raised by the routing middleware.
 *
 * All of them extend {@link RoutingError}, which carries a machine-readable
 * `code` and keeps the original error in the standard `cause` property.
 */

export type RoutingErrorCode =
  | 'ROUTE_CREATION_FAILED'
  | 'ENDPOINT_RESOLUTION_FAILED'
  | 'NO_CONSUMER_AVAILABLE'
  | 'EXECUTION_FAILED'
  | 'TIMEOUT'

export class RoutingError extends Error {
  readonly code: RoutingErrorCode

  constructor(message: string, code: RoutingErrorCode, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'RoutingError'
    this.code = code
  }
}

/**
 * A route could not be built, typically because its endpoint URI is invalid
 * or names an unknown component.
 */
export class RouteCreationError extends RoutingError {
  readonly routeId: string
  readonly endpointUri: string

  constructor(routeId: string, endpointUri: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : ''
    super(`Failed to create route ${routeId} from [${endpointUri}]${reason}`, 'ROUTE_CREATION_FAILED', cause)
    this.name = 'RouteCreationError'
    this.routeId = routeId
    this.endpointUri = endpointUri
  }
}

export class EndpointResolutionError extends RoutingError {
  readonly endpointUri: string

  constructor(endpointUri: string, reason: string) {
    super(`Failed to resolve endpoint [${endpointUri}] due to: ${reason}`, 'ENDPOINT_RESOLUTION_FAILED')
    this.name = 'EndpointResolutionError'
    this.endpointUri = endpointUri
  }
}

export class NoConsumerAvailableError extends RoutingError {
  readonly endpointUri: string

  constructor(endpointUri: string) {
    super(`No consumers available on endpoint [${endpointUri}]`, 'NO_CONSUMER_AVAILABLE')
    this.name = 'NoConsumerAvailableError'
    this.endpointUri = endpointUri
  }
}

/**
 * Wraps the failure of an exchange (or of a pending exchange result) for the
 * caller. The original error is always the `cause`.
 */
export class ExecutionError extends RoutingError {
  readonly exchangeId?: string

  constructor(message: string, cause: unknown, exchangeId?: string) {
    super(message, 'EXECUTION_FAILED', cause)
    this.name = 'ExecutionError'
    this.exchangeId = exchangeId
  }
}

export class TimeoutError extends RoutingError {
  readonly timeout: number

  constructor(message: string, timeout: number) {
    super(message, 'TIMEOUT')
    this.name = 'TimeoutError'
    this.timeout = timeout
  }
}

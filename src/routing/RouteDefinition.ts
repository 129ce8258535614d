// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import {
  type ExceptionMatcher,
  type ExceptionPolicy,
  type ExceptionTransform,
  validateExceptionPolicy
} from './ExceptionPolicy.js'
import type { Processor } from './Processor.js'

/**
 * Where a route sends its exchanges: a processor, or another endpoint.
 */
export type RouteTarget =
  | { kind: 'processor', processor: Processor }
  | { kind: 'endpoint', uri: string }

/**
 * Describes a route before it is built by the RoutingContext:
 * the endpoint it consumes, its target and its exception policies.
 *
 * ```typescript
 * const definition = RouteDefinition.from('direct:orders')
 *   .to('direct:audit')
 *
 * definition.onException(TransientError).maximumRedeliveries(3).end()
 * ```
 */
export class RouteDefinition {
  private _routeId?: string
  private _target?: RouteTarget
  private readonly _policies: ExceptionPolicy[] = []

  private constructor(private readonly _fromUri: string) {}

  static from(uri: string): RouteDefinition {
    return new RouteDefinition(uri)
  }

  fromUri(): string {
    return this._fromUri
  }

  routeId(): string | undefined {
    return this._routeId
  }

  withRouteId(routeId: string): RouteDefinition {
    this._routeId = routeId
    return this
  }

  process(processor: Processor): RouteDefinition {
    this._target = { kind: 'processor', processor }
    return this
  }

  to(uri: string): RouteDefinition {
    this._target = { kind: 'endpoint', uri }
    return this
  }

  target(): RouteTarget | undefined {
    return this._target
  }

  /**
   * Starts an exception policy for errors accepted by the matcher.
   * Finish with end() to continue with the route definition.
   */
  onException(on: ExceptionMatcher): ExceptionPolicyBuilder {
    const policy: ExceptionPolicy = { on }
    this._policies.push(policy)
    return new ExceptionPolicyBuilder(this, policy)
  }

  withExceptionPolicies(policies: readonly ExceptionPolicy[]): RouteDefinition {
    for (const policy of policies) {
      this._policies.push({ ...validateExceptionPolicy(policy) })
    }
    return this
  }

  exceptionPolicies(): readonly ExceptionPolicy[] {
    return this._policies.map(policy => validateExceptionPolicy(policy))
  }
}

export class ExceptionPolicyBuilder {
  constructor(
    private readonly _definition: RouteDefinition,
    private readonly _policy: ExceptionPolicy
  ) {}

  handled(handled: boolean = true): ExceptionPolicyBuilder {
    this._policy.handled = handled
    return this
  }

  transform(transform: ExceptionTransform): ExceptionPolicyBuilder {
    this._policy.transform = transform
    return this
  }

  maximumRedeliveries(maximumRedeliveries: number): ExceptionPolicyBuilder {
    this._policy.maximumRedeliveries = maximumRedeliveries
    return this
  }

  redeliveryDelay(redeliveryDelay: number): ExceptionPolicyBuilder {
    this._policy.redeliveryDelay = redeliveryDelay
    return this
  }

  end(): RouteDefinition {
    validateExceptionPolicy(this._policy)
    return this._definition
  }
}

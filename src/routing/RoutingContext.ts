// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Logger } from 'domo-actors'
import type { Component, Endpoint } from './Component.js'
import { DirectComponent } from './DirectComponent.js'
import { EndpointUri } from './EndpointUri.js'
import type { Processor } from './Processor.js'
import { ProducerTemplate } from './ProducerTemplate.js'
import { RedeliveryErrorHandler } from './RedeliveryErrorHandler.js'
import { Route } from './Route.js'
import type { RouteDefinition } from './RouteDefinition.js'
import { EndpointResolutionError, RouteCreationError } from './RoutingErrors.js'

/**
 * The in-process routing middleware.
 *
 * Holds the registered components, resolves endpoint URIs and owns the
 * running routes. The `direct` component is always available.
 *
 * ```typescript
 * const context = new RoutingContext(stage().logger())
 * await context.addRoute(RouteDefinition.from('direct:in').to('direct:out'))
 * ```
 */
export class RoutingContext {
  private readonly _components = new Map<string, Component>()
  private readonly _routes = new Map<string, Route>()
  private _nextRouteId = 1
  private _stopped = false

  constructor(
    private readonly _logger: Logger,
    private readonly _defaultRedeliveryDelay: number = 0
  ) {
    this.addComponent(new DirectComponent())
  }

  logger(): Logger {
    return this._logger
  }

  addComponent(component: Component): void {
    this._components.set(component.scheme(), component)
  }

  component(scheme: string): Component | undefined {
    return this._components.get(scheme)
  }

  /**
   * Resolves the URI to an endpoint of a registered component.
   * Throws EndpointResolutionError for malformed URIs and unknown schemes.
   */
  endpoint(uri: string): Endpoint {
    const endpointUri = EndpointUri.parse(uri)
    const component = this._components.get(endpointUri.scheme())
    if (!component) {
      throw new EndpointResolutionError(uri, `no component found with scheme: ${endpointUri.scheme()}`)
    }
    return component.endpoint(endpointUri)
  }

  /**
   * Builds and starts the route. Any failure, including an invalid endpoint
   * URI, is reported as a RouteCreationError.
   */
  async addRoute(definition: RouteDefinition): Promise<Route> {
    const routeId = definition.routeId() ?? `route-${this._nextRouteId++}`

    try {
      if (this._stopped) {
        throw new Error('routing context is stopped')
      }
      if (this._routes.has(routeId)) {
        throw new Error(`a route with id ${routeId} already exists`)
      }

      const endpoint = this.endpoint(definition.fromUri())
      const errorHandler = new RedeliveryErrorHandler(
        this.targetOf(definition),
        definition.exceptionPolicies(),
        this._logger,
        this._defaultRedeliveryDelay
      )
      const route = new Route(routeId, endpoint, endpoint.createConsumer(errorHandler))

      await route.start()
      this._routes.set(routeId, route)
      this._logger.log(`RoutingContext: Started ${route}`)

      return route
    } catch (error: unknown) {
      throw new RouteCreationError(routeId, definition.fromUri(), error)
    }
  }

  /**
   * Stops and removes the route. Answers false when no such route exists.
   */
  async removeRoute(routeId: string): Promise<boolean> {
    const route = this._routes.get(routeId)
    if (!route) {
      return false
    }

    this._routes.delete(routeId)
    await route.stop()
    this._logger.log(`RoutingContext: Removed ${route}`)

    return true
  }

  route(routeId: string): Route | undefined {
    return this._routes.get(routeId)
  }

  routes(): Route[] {
    return Array.from(this._routes.values())
  }

  routeCount(): number {
    return this._routes.size
  }

  createProducerTemplate(): ProducerTemplate {
    return new ProducerTemplate(this)
  }

  isStopped(): boolean {
    return this._stopped
  }

  async stop(): Promise<void> {
    if (this._stopped) {
      return
    }
    this._stopped = true

    for (const routeId of Array.from(this._routes.keys())) {
      try {
        await this.removeRoute(routeId)
      } catch (error: unknown) {
        const errorObj = error instanceof Error ? error : new Error(String(error))
        this._logger.error(`RoutingContext: Failed to stop route ${routeId}: ${errorObj.message}`, errorObj)
      }
    }
  }

  private targetOf(definition: RouteDefinition): Processor {
    const target = definition.target()

    if (!target) {
      throw new Error('route has no target')
    }

    if (target.kind === 'processor') {
      return target.processor
    }

    const endpoint = this.endpoint(target.uri)
    return {
      process: (exchange) => endpoint.send(exchange)
    }
  }
}

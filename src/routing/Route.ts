// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Endpoint, EndpointConsumer } from './Component.js'

export enum RouteStatus {
  Started = 'Started',
  Stopped = 'Stopped'
}

/**
 * A built route: exchanges arriving at its endpoint flow through its
 * error handler into its target.
 */
export class Route {
  private _status: RouteStatus = RouteStatus.Stopped

  constructor(
    private readonly _id: string,
    private readonly _endpoint: Endpoint,
    private readonly _consumer: EndpointConsumer
  ) {}

  id(): string {
    return this._id
  }

  endpoint(): Endpoint {
    return this._endpoint
  }

  status(): RouteStatus {
    return this._status
  }

  async start(): Promise<void> {
    if (this._status === RouteStatus.Started) {
      return
    }
    await this._consumer.start()
    this._status = RouteStatus.Started
  }

  async stop(): Promise<void> {
    if (this._status === RouteStatus.Stopped) {
      return
    }
    await this._consumer.stop()
    this._status = RouteStatus.Stopped
  }

  toString(): string {
    return `Route[${this._id} from: ${this._endpoint.uri()} ${this._status}]`
  }
}

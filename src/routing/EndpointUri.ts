// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { EndpointResolutionError } from './RoutingErrors.js'

const URI_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):([^?\s]+)(?:\?(\S*))?$/

/**
 * A parsed endpoint URI of the form `scheme:path?name=value&...`,
 * e.g. `direct:orders` or `direct:orders?timeout=500`.
 */
export class EndpointUri {
  private constructor(
    private readonly _uri: string,
    private readonly _scheme: string,
    private readonly _path: string,
    private readonly _parameters: ReadonlyMap<string, string>
  ) {}

  static parse(uri: string): EndpointUri {
    const match = URI_PATTERN.exec(uri.trim())
    if (!match) {
      throw new EndpointResolutionError(uri, 'not a valid endpoint URI, expected scheme:path')
    }

    const [, scheme, path, query] = match
    const parameters = new Map(new URLSearchParams(query ?? '').entries())

    return new EndpointUri(uri.trim(), scheme.toLowerCase(), path, parameters)
  }

  scheme(): string {
    return this._scheme
  }

  path(): string {
    return this._path
  }

  parameter(name: string): string | undefined {
    return this._parameters.get(name)
  }

  parameters(): ReadonlyMap<string, string> {
    return this._parameters
  }

  /**
   * The URI without parameters. Endpoints are keyed by it.
   */
  key(): string {
    return `${this._scheme}:${this._path}`
  }

  toString(): string {
    return this._uri
  }
}

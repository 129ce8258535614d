// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Address } from 'domo-actors'
import { type RouteCreationError, TimeoutError } from '../routing/RoutingErrors.js'
import { ActivationStateError } from './BridgeErrors.js'

export enum ActivationState {
  Unregistered = 'Unregistered',
  Activating = 'Activating',
  Active = 'Active',
  Failed = 'Failed',
  Deactivating = 'Deactivating',
  Inactive = 'Inactive'
}

type Verdict = { settled: true, error?: Error } | { settled: false }

interface Watcher {
  evaluate(entry: ActivationEntry): Verdict
  settle(verdict: Verdict): void
}

interface ActivationEntry {
  state: ActivationState
  error?: RouteCreationError
  readonly watchers: Set<Watcher>
}

const Pending: Verdict = { settled: false }
const Settled: Verdict = { settled: true }

/**
 * Registry of the route activation state of every consumer, keyed by the
 * consumer actor's address.
 *
 * Consumer adapters report transitions; callers wait for them with
 * awaitActivation() and awaitDeactivation(). Waiters are woken by the
 * transitions themselves.
 *
 * Inactive and Failed consumers are remembered until more than
 * `retainedLimit` of them are, after which the oldest without waiters are
 * forgotten and read as Unregistered again. Entries created only to be
 * waited on are forgotten when their last waiter leaves.
 *
 * Transitions:
 * - Unregistered/Inactive -> Activating
 * - Activating -> Active | Failed
 * - Activating/Active -> Deactivating
 * - Deactivating -> Inactive
 */
export class ActivationTracker {
  static readonly DefaultRetainedLimit = 1_000

  private readonly _entries = new Map<string, ActivationEntry>()
  private readonly _retired = new Set<string>()

  constructor(private readonly _retainedLimit: number = ActivationTracker.DefaultRetainedLimit) {}

  /**
   * Answers the number of consumers whose state is remembered.
   */
  trackedCount(): number {
    return this._entries.size
  }

  stateOf(actorId: Address): ActivationState {
    return this._entries.get(keyOf(actorId))?.state ?? ActivationState.Unregistered
  }

  /**
   * Answers the number of Active consumers, each routing one endpoint.
   */
  routeCount(): number {
    let count = 0
    for (const entry of this._entries.values()) {
      if (entry.state === ActivationState.Active) {
        count++
      }
    }
    return count
  }

  //================================
  // awaiting
  //================================

  /**
   * Resolves once the consumer is Active. Rejects with the recorded
   * RouteCreationError when its route could not be built, or with a
   * TimeoutError when it is still not Active after `timeoutMs`.
   */
  awaitActivation(actorId: Address, timeoutMs: number): Promise<void> {
    return this.awaitVerdict(actorId, timeoutMs, 'activation', entry => {
      switch (entry.state) {
        case ActivationState.Active:
          return Settled
        case ActivationState.Failed:
          return { settled: true, error: entry.error }
        default:
          return Pending
      }
    })
  }

  /**
   * Resolves once the consumer is Inactive, or immediately when it Failed
   * to activate and so never accepted traffic. Rejects with a TimeoutError
   * otherwise.
   */
  awaitDeactivation(actorId: Address, timeoutMs: number): Promise<void> {
    return this.awaitVerdict(actorId, timeoutMs, 'deactivation', entry => {
      switch (entry.state) {
        case ActivationState.Inactive:
        case ActivationState.Failed:
          return Settled
        default:
          return Pending
      }
    })
  }

  //================================
  // transitions
  //================================

  activating(actorId: Address): void {
    this.transition(actorId, ActivationState.Activating, [ActivationState.Unregistered, ActivationState.Inactive])
  }

  activated(actorId: Address): void {
    this.transition(actorId, ActivationState.Active, [ActivationState.Activating])
  }

  failedToActivate(actorId: Address, error: RouteCreationError): void {
    this.transition(actorId, ActivationState.Failed, [ActivationState.Activating], error)
  }

  deactivating(actorId: Address): void {
    this.transition(actorId, ActivationState.Deactivating, [ActivationState.Activating, ActivationState.Active])
  }

  deactivated(actorId: Address): void {
    this.transition(actorId, ActivationState.Inactive, [ActivationState.Deactivating])
  }

  //================================
  // internal
  //================================

  private entryOf(actorId: Address): ActivationEntry {
    const key = keyOf(actorId)
    let entry = this._entries.get(key)
    if (!entry) {
      entry = { state: ActivationState.Unregistered, watchers: new Set() }
      this._entries.set(key, entry)
    }
    return entry
  }

  private transition(
    actorId: Address,
    to: ActivationState,
    from: ActivationState[],
    error?: RouteCreationError
  ): void {
    const entry = this.entryOf(actorId)

    if (!from.includes(entry.state)) {
      throw new ActivationStateError(keyOf(actorId), entry.state, to)
    }

    entry.state = to
    entry.error = error

    for (const watcher of Array.from(entry.watchers)) {
      const verdict = watcher.evaluate(entry)
      if (verdict.settled) {
        watcher.settle(verdict)
      }
    }

    const key = keyOf(actorId)
    this._retired.delete(key)
    if (isRetired(entry.state)) {
      this._retired.add(key)
      this.pruneRetired()
    }
  }

  private pruneRetired(): void {
    for (const key of this._retired) {
      if (this._retired.size <= this._retainedLimit) {
        return
      }
      this._retired.delete(key)

      const entry = this._entries.get(key)
      if (entry && isRetired(entry.state) && entry.watchers.size === 0) {
        this._entries.delete(key)
      }
    }
  }

  private release(key: string, entry: ActivationEntry, watcher: Watcher): void {
    entry.watchers.delete(watcher)
    if (entry.state === ActivationState.Unregistered && entry.watchers.size === 0 && this._entries.get(key) === entry) {
      this._entries.delete(key)
    }
  }

  private awaitVerdict(
    actorId: Address,
    timeoutMs: number,
    awaited: string,
    evaluate: (entry: ActivationEntry) => Verdict
  ): Promise<void> {
    const entry = this.entryOf(actorId)
    const immediate = evaluate(entry)

    if (immediate.settled) {
      return immediate.error ? Promise.reject(immediate.error) : Promise.resolve()
    }

    return new Promise<void>((resolve, reject) => {
      const watcher: Watcher = {
        evaluate,
        settle: (verdict: Verdict) => {
          clearTimeout(timer)
          this.release(keyOf(actorId), entry, watcher)
          if (verdict.settled && verdict.error) {
            reject(verdict.error)
          } else {
            resolve()
          }
        }
      }

      const timer = setTimeout(() => {
        this.release(keyOf(actorId), entry, watcher)
        reject(new TimeoutError(
          `Consumer ${keyOf(actorId)} did not complete ${awaited} within ${timeoutMs}ms; it is ${entry.state}`,
          timeoutMs
        ))
      }, timeoutMs)

      entry.watchers.add(watcher)
    })
  }
}

function isRetired(state: ActivationState): boolean {
  return state === ActivationState.Inactive || state === ActivationState.Failed
}

function keyOf(actorId: Address): string {
  return actorId.valueAsString()
}

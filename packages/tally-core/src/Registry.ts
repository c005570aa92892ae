// Registry: category id -> Tracker.
//
// - Categories are created lazily on the first `category(id)` call (counter starts at 0) and never removed.
// - Ids are compared with effect's Equal/Hash: primitives by value, Data.* values and Equal implementers
//   structurally, other objects by reference.
// - readCounts() reads each counter independently; there is no cross-category consistency.

import { Context, Inspectable, Layer, MutableHashMap, Option, type Order } from 'effect'
import * as Counter from './Counter.js'
import * as Tracker from './Tracker.js'
import { resolveReleaseCheck, type ReleaseCheck } from './internal/release.js'

export type CountEntry<Id> = readonly [id: Id, count: number]

export interface Registry<Id> extends Inspectable.Inspectable {
  readonly label: string

  /**
   * Returns the tracker for `id`, creating its counter on first use.
   * Equal ids always yield the same tracker.
   */
  readonly category: (id: Id) => Tracker.Tracker

  /**
   * Snapshot of every category requested so far, in first-request order unless `order` is given.
   */
  readonly readCounts: (order?: Order.Order<Id>) => ReadonlyArray<CountEntry<Id>>

  /**
   * Number of known categories.
   */
  readonly size: number
}

export interface RegistryOptions<Id> {
  readonly label?: string
  /**
   * Categories to create up front, so they are reported (with 0) before anything tracks them.
   */
  readonly categories?: Iterable<Id>
  readonly releaseCheck?: ReleaseCheck
}

type Entry<Id> = {
  readonly id: Id
  readonly tracker: Tracker.Tracker
}

export const make = <Id>(options?: RegistryOptions<Id>): Registry<Id> => {
  const label = options?.label ?? 'Registry'
  const releaseCheck = resolveReleaseCheck(options?.releaseCheck)

  const byId = MutableHashMap.empty<Id, Entry<Id>>()
  // insertion order, for stable reads
  const entries: Array<Entry<Id>> = []

  const category: Registry<Id>['category'] = (id) => {
    const existing = MutableHashMap.get(byId, id)
    if (Option.isSome(existing)) return existing.value.tracker

    const entry: Entry<Id> = { id, tracker: Tracker.make(Counter.make(), { releaseCheck }) }
    MutableHashMap.set(byId, id, entry)
    entries.push(entry)
    return entry.tracker
  }

  const readCounts: Registry<Id>['readCounts'] = (order) => {
    const counts: Array<CountEntry<Id>> = entries.map((entry) => [entry.id, entry.tracker.read()] as const)
    return order ? counts.sort((a, b) => order(a[0], b[0])) : counts
  }

  for (const id of options?.categories ?? []) {
    category(id)
  }

  const toJSON = () => ({
    _id: 'Registry',
    label,
    categories: readCounts().map(([id, count]) => ({ id: Inspectable.toJSON(id), count })),
  })

  return {
    label,
    category,
    readCounts,
    get size() {
      return entries.length
    },
    toJSON,
    toString: () => Inspectable.format(toJSON()),
    [Inspectable.NodeInspectSymbol]: toJSON,
  }
}

/**
 * A service tag for a registry, so Effect programs can receive it from a Layer.
 *
 *   enum Category { Connections = 'connections', Buffers = 'buffers' }
 *   const Counts = Registry.tag<Category>('app/Counts')
 *   const CountsLive = Registry.layer(Counts)
 */
export const tag = <Id>(key: string): Context.Tag<Registry<Id>, Registry<Id>> =>
  Context.GenericTag<Registry<Id>>(key)

export const layer = <Id>(
  registryTag: Context.Tag<Registry<Id>, Registry<Id>>,
  options?: RegistryOptions<Id>,
): Layer.Layer<Registry<Id>, never, never> => Layer.sync(registryTag, () => make<Id>(options))

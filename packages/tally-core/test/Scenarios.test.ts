import { describe, it, expect } from '@effect/vitest'
import { Effect, Order } from 'effect'
import * as Tally from '../src/index.js'

enum Resource {
  Count = 'resource-count',
  Weight = 'resource-weight',
}

// a business object that carries its own accounting
class TrackedVector {
  private readonly internal: Array<string> = []
  private readonly countSentinel: Tally.Count
  private readonly weight: Tally.Size

  constructor(registry: Tally.Registry.Registry<Resource>) {
    this.countSentinel = registry.category(Resource.Count).track()
    this.weight = registry.category(Resource.Weight).trackSized(0)
  }

  push(next: string): void {
    this.internal.push(next)
    this.weight.add(next.length)
  }

  clear(): void {
    this.internal.length = 0
    this.weight.set(0)
  }

  dispose(): void {
    this.countSentinel.release()
    this.weight.release()
  }
}

describe('Scenarios', () => {
  it('one Count on A, two on B, then all dropped', () => {
    const registry = Tally.Registry.make<'A' | 'B'>({ releaseCheck: 'throw' })

    const handles = [registry.category('A').track(), registry.category('B').track(), registry.category('B').track()]
    expect(registry.readCounts(Order.string)).toEqual([
      ['A', 1],
      ['B', 2],
    ])

    for (const handle of handles) handle.release()
    expect(registry.readCounts(Order.string)).toEqual([
      ['A', 0],
      ['B', 0],
    ])
  })

  it('track_sized(0), add(5), add(-2), release', () => {
    const registry = Tally.Registry.make<'C'>({ releaseCheck: 'throw' })
    const size = registry.category('C').trackSized(0)

    size.add(5)
    size.add(-2)
    expect(registry.readCounts()).toEqual([['C', 3]])

    size.release()
    expect(registry.readCounts()).toEqual([['C', 0]])
  })

  it('a handle from one lookup is visible through another lookup of the same id', () => {
    const registry = Tally.Registry.make<string>()

    const count = registry.category('shared').track()
    const sameCategory = registry.category('shared')

    expect(sameCategory.read()).toBe(1)
    expect(count.released).toBe(false)
  })

  it('tracked business objects', () => {
    const registry = Tally.Registry.make<Resource>({ releaseCheck: 'throw' })

    const first = new TrackedVector(registry)
    first.push('hello')
    const second = new TrackedVector(registry)
    second.push('hi')
    second.push('there')

    expect(registry.readCounts(Order.string)).toEqual([
      [Resource.Count, 2],
      [Resource.Weight, 12],
    ])

    second.clear()
    expect(registry.readCounts(Order.string)).toEqual([
      [Resource.Count, 2],
      [Resource.Weight, 5],
    ])

    first.dispose()
    second.dispose()
    expect(registry.readCounts(Order.string)).toEqual([
      [Resource.Count, 0],
      [Resource.Weight, 0],
    ])
  })

  it.effect('scoped business objects release with their scope', () =>
    Effect.gen(function* () {
      const registry = Tally.Registry.make<Resource>({ releaseCheck: 'throw' })
      const counts = registry.category(Resource.Count)

      yield* Effect.forEach(
        [1, 2, 3],
        () =>
          Effect.scoped(
            Effect.gen(function* () {
              yield* Tally.Tracker.scoped(counts)
              expect(counts.read()).toBe(1)
            }),
          ),
        { discard: true },
      )

      expect(registry.readCounts()).toEqual([[Resource.Count, 0]])
    }),
  )
})

import { Effect, type Scope } from 'effect'
import * as Counter from './Counter.js'
import { Count, Size } from './Handle.js'
import type { Amount } from './internal/amount.js'
import { resolveReleaseCheck, type ReleaseCheck } from './internal/release.js'

/**
 * Tracker: the per-category factory for handles, bound to exactly one counter.
 *
 * Both track operations apply their delta before returning, so a read issued afterwards observes it.
 * Cache trackers where possible; Registry.category performs a lookup on every call.
 */
export interface Tracker {
  readonly counter: Counter.Counter

  /**
   * Holds 1 against the category until the returned Count is released.
   */
  readonly track: () => Count

  /**
   * Holds `initial` against the category until the returned Size is released.
   * The Size can be adjusted while alive, e.g. to follow a buffer as it grows.
   */
  readonly trackSized: (initial: Amount) => Size

  readonly read: () => number
}

export interface TrackerOptions {
  readonly releaseCheck?: ReleaseCheck
}

export const make = (counter: Counter.Counter, options?: TrackerOptions): Tracker => {
  const releaseCheck = resolveReleaseCheck(options?.releaseCheck)

  return {
    counter,
    track: () => new Count(counter, releaseCheck),
    trackSized: (initial) => new Size(counter, initial, releaseCheck),
    read: () => counter.read(),
  }
}

/**
 * Worker-side entry point: a tracker over a cell created elsewhere (see `counter.buffer`).
 */
export const attach = (buffer: SharedArrayBuffer, byteOffset = 0, options?: TrackerOptions): Tracker =>
  make(Counter.fromBuffer(buffer, byteOffset), options)

/**
 * A Count released when the surrounding Scope closes, unless it was already released inside it.
 */
export const scoped = (tracker: Tracker): Effect.Effect<Count, never, Scope.Scope> =>
  Effect.acquireRelease(
    Effect.sync(() => tracker.track()),
    (count) =>
      Effect.sync(() => {
        if (!count.released) count.release()
      }),
  )

export const scopedSized = (tracker: Tracker, initial: Amount): Effect.Effect<Size, never, Scope.Scope> =>
  Effect.acquireRelease(
    Effect.sync(() => tracker.trackSized(initial)),
    (size) =>
      Effect.sync(() => {
        if (!size.released) size.release()
      }),
  )

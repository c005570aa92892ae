// Handle: scoped claims on a counter.
//
// - Count: +1 while alive, a pure presence marker.
// - Size: an arbitrary signed contribution that can change while alive.
//
// Release is explicit (`release()`), or tied to an Effect Scope via Tracker.scoped / Tracker.scopedSized.
// A handle that is never released keeps its contribution, the same way a leaked resource would.

import { Inspectable } from 'effect'
import type { Counter } from './Counter.js'
import { toBigInt, toInt64, wrapInt64, type Amount } from './internal/amount.js'
import { reportReleased, resolveReleaseCheck, type ReleaseCheck } from './internal/release.js'

export type { ReleaseCheck } from './internal/release.js'

export class Count implements Inspectable.Inspectable {
  readonly #counter: Counter
  readonly #releaseCheck: ReleaseCheck
  #released = false

  constructor(counter: Counter, releaseCheck?: ReleaseCheck) {
    this.#counter = counter
    this.#releaseCheck = resolveReleaseCheck(releaseCheck)
    counter.incrementBy(1)
  }

  get released(): boolean {
    return this.#released
  }

  /**
   * Removes this handle's +1. Only the first call has an effect.
   */
  release(): void {
    if (this.#released) {
      reportReleased(this.#releaseCheck, 'Count', 'release')
      return
    }
    this.#released = true
    this.#counter.incrementBy(-1)
  }

  toString(): string {
    return `Count(total=${this.#counter.read()})`
  }

  toJSON(): unknown {
    return { _id: 'Count', total: this.#counter.read(), released: this.#released }
  }

  [Inspectable.NodeInspectSymbol](): unknown {
    return this.toJSON()
  }
}

export class Size implements Inspectable.Inspectable {
  readonly #counter: Counter
  readonly #releaseCheck: ReleaseCheck
  #net: bigint
  #released = false

  constructor(counter: Counter, initial: Amount, releaseCheck?: ReleaseCheck) {
    const delta = toInt64(initial)
    this.#counter = counter
    this.#releaseCheck = resolveReleaseCheck(releaseCheck)
    counter.incrementBy(delta)
    this.#net = delta
  }

  get released(): boolean {
    return this.#released
  }

  /**
   * Net contribution currently held by this handle (0 once released).
   * Exact while |value| <= Number.MAX_SAFE_INTEGER; use `valueBigInt` beyond that.
   */
  get value(): number {
    return Number(this.#net)
  }

  get valueBigInt(): bigint {
    return this.#net
  }

  add(delta: Amount): void {
    if (this.#released) {
      reportReleased(this.#releaseCheck, 'Size', 'add')
      return
    }
    this.#shift(toInt64(delta))
  }

  /**
   * Same as `add(newTotal - value)`.
   */
  set(newTotal: Amount): void {
    if (this.#released) {
      reportReleased(this.#releaseCheck, 'Size', 'set')
      return
    }
    const target = toInt64(newTotal)
    this.#shift(wrapInt64(target - this.#net))
  }

  /**
   * Same as `add(-amount)`, except that a non-negative contribution is floored at 0:
   * the handle never takes back more than it put in.
   */
  subtract(amount: Amount): void {
    if (this.#released) {
      reportReleased(this.#releaseCheck, 'Size', 'subtract')
      return
    }
    const current = this.#net
    // floor against the exact amount, before any 64-bit wrap
    const raw = current - toBigInt(amount)
    const target = current >= 0n && raw < 0n ? 0n : wrapInt64(raw)
    this.#shift(wrapInt64(target - current))
  }

  /**
   * Removes the whole net contribution. Only the first call has an effect.
   */
  release(): void {
    if (this.#released) {
      reportReleased(this.#releaseCheck, 'Size', 'release')
      return
    }
    this.#released = true
    this.#counter.incrementBy(wrapInt64(-this.#net))
    this.#net = 0n
  }

  #shift(delta: bigint): void {
    this.#counter.incrementBy(delta)
    this.#net = wrapInt64(this.#net + delta)
  }

  toString(): string {
    return `Size(local=${this.#net}, total=${this.#counter.read()})`
  }

  toJSON(): unknown {
    return { _id: 'Size', local: this.value, total: this.#counter.read(), released: this.#released }
  }

  [Inspectable.NodeInspectSymbol](): unknown {
    return this.toJSON()
  }
}

// Counter: the shared cell behind one category.
//
// - The value is a signed 64-bit integer stored in a SharedArrayBuffer and touched only through Atomics,
//   so a counter may be shared with worker_threads workers by posting its buffer.
// - Overflow wraps (two's complement): 2^63 - 1 incremented by 1 reads -2^63.

import { toInt64, type Amount } from './internal/amount.js'

export type { Amount } from './internal/amount.js'

export interface Counter {
  readonly buffer: SharedArrayBuffer
  readonly byteOffset: number

  /**
   * Atomically adds delta (may be negative).
   */
  readonly incrementBy: (delta: Amount) => void

  /**
   * Current value as a number; exact while |value| <= Number.MAX_SAFE_INTEGER.
   */
  readonly read: () => number

  readonly readBigInt: () => bigint

  readonly toString: () => string
  readonly toJSON: () => { readonly _id: 'Counter'; readonly value: number }
}

const CELL_BYTES = BigInt64Array.BYTES_PER_ELEMENT

/**
 * Views an existing cell. Throws RangeError when byteOffset is misaligned or out of range.
 */
export const fromBuffer = (buffer: SharedArrayBuffer, byteOffset = 0): Counter => {
  const cell = new BigInt64Array(buffer, byteOffset, 1)

  const incrementBy: Counter['incrementBy'] = (delta) => {
    Atomics.add(cell, 0, toInt64(delta))
  }

  const readBigInt = (): bigint => Atomics.load(cell, 0)

  const read = (): number => Number(readBigInt())

  return {
    buffer,
    byteOffset,
    incrementBy,
    read,
    readBigInt,
    toString: () => `Counter(${readBigInt()})`,
    toJSON: () => ({ _id: 'Counter', value: read() }),
  }
}

export const make = (): Counter => fromBuffer(new SharedArrayBuffer(CELL_BYTES))

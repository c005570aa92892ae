import { InvalidAmountError } from './errors.js'

/**
 * Amounts accepted by counters and handles. Numbers must be integers; both forms are reduced
 * to a signed 64-bit value (two's complement wrap).
 */
export type Amount = number | bigint

/**
 * Exact integer value of `amount`, not yet reduced to 64 bits.
 */
export const toBigInt = (amount: Amount): bigint => {
  if (typeof amount === 'bigint') return amount
  if (!Number.isInteger(amount)) {
    throw new InvalidAmountError(amount)
  }
  return BigInt(amount)
}

export const toInt64 = (amount: Amount): bigint => BigInt.asIntN(64, toBigInt(amount))

export const wrapInt64 = (value: bigint): bigint => BigInt.asIntN(64, value)

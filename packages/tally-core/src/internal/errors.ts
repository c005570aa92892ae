export type HandleKind = 'Count' | 'Size'

export type HandleOperation = 'release' | 'add' | 'set' | 'subtract'

/**
 * Raised (under `releaseCheck: "throw"`) when a handle is released twice or mutated after release.
 * The counter is left untouched either way.
 */
export class HandleReleasedError extends Error {
  readonly _tag = 'HandleReleasedError' as const

  constructor(
    readonly handle: HandleKind,
    readonly operation: HandleOperation,
  ) {
    super(
      operation === 'release'
        ? `[Tally] ${handle} handle released more than once`
        : `[Tally] ${handle}.${operation}() called after release`,
    )
    this.name = 'HandleReleasedError'
  }

  toJSON(): Record<string, unknown> {
    return {
      _tag: this._tag,
      name: this.name,
      message: this.message,
      handle: this.handle,
      operation: this.operation,
    }
  }
}

export class InvalidAmountError extends Error {
  readonly _tag = 'InvalidAmountError' as const

  constructor(readonly amount: number) {
    super(`[Tally] amount must be an integer, received ${String(amount)}`)
    this.name = 'InvalidAmountError'
  }
}

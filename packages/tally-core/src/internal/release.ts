import { isDevEnv } from './env.js'
import { HandleReleasedError, type HandleKind, type HandleOperation } from './errors.js'

/**
 * What happens when a handle is released twice or mutated after release:
 * - off: silently ignored;
 * - warn: console warning (default outside production);
 * - throw: HandleReleasedError, meant for test suites.
 */
export type ReleaseCheck = 'off' | 'warn' | 'throw'

export const defaultReleaseCheck = (): ReleaseCheck => (isDevEnv() ? 'warn' : 'off')

export const resolveReleaseCheck = (check: ReleaseCheck | undefined): ReleaseCheck =>
  check ?? defaultReleaseCheck()

export const reportReleased = (check: ReleaseCheck, handle: HandleKind, operation: HandleOperation): void => {
  switch (check) {
    case 'off':
      return
    case 'warn': {
      const error = new HandleReleasedError(handle, operation)
      // eslint-disable-next-line no-console
      console.warn(`${error.message}; the counter was not changed.`)
      return
    }
    case 'throw':
      throw new HandleReleasedError(handle, operation)
  }
}

// Public barrel for @tally/core
// Recommended usage:
//   import * as Tally from "@tally/core"
//   const registry = Tally.Registry.make<Category>()
//   const connections = registry.category(Category.Connections)
//   const handle = connections.track()

// Counter: the shared 64-bit cell behind each category
export * as Counter from './Counter.js'

// Handle: Count / Size scoped claims
export * as Handle from './Handle.js'
export { Count, Size } from './Handle.js'

// Tracker: per-category handle factory, plus Scope-bound variants
export * as Tracker from './Tracker.js'

// Registry: category -> tracker, snapshot reads, Context.Tag / Layer
export * as Registry from './Registry.js'

// Reporter: logging and Metric export of snapshots
export * as Reporter from './Reporter.js'

export type { Amount } from './internal/amount.js'
export type { ReleaseCheck } from './internal/release.js'
export { HandleReleasedError, InvalidAmountError } from './internal/errors.js'

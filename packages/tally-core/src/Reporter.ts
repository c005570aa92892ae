// Reporter: Effect glue for exporting registry counts to logs and metrics.
//
// Nothing here is needed to count things; it only reads `Registry.readCounts()`.

import { Duration, Effect, Metric, Schedule, type Order } from 'effect'
import type { CountEntry, Registry } from './Registry.js'
import { reportInterval } from './internal/config.js'

export { ReporterConfig, ReporterConfigTag, type ReporterConfigShape } from './internal/config.js'

export interface LogOptions<Id> {
  /**
   * Prefix of the log line, "tally" by default.
   */
  readonly label?: string
  readonly order?: Order.Order<Id>
  readonly formatId?: (id: Id) => string
}

export interface ReportOptions<Id> extends LogOptions<Id> {
  /**
   * Overrides the configured interval (see ReporterConfig).
   */
  readonly interval?: Duration.DurationInput
}

export interface GaugeOptions<Id> {
  readonly name?: string
  readonly formatId?: (id: Id) => string
}

export const DEFAULT_GAUGE_NAME = 'tally_live_resources'

/**
 * The gauge written by exportGauges (untagged); tag it with `category` to read one series back.
 */
export const gauge = (name: string = DEFAULT_GAUGE_NAME): Metric.Metric.Gauge<number> =>
  Metric.gauge(name, { description: 'Live resources per category' })

export const snapshot = <Id>(
  registry: Registry<Id>,
  order?: Order.Order<Id>,
): Effect.Effect<ReadonlyArray<CountEntry<Id>>> => Effect.sync(() => registry.readCounts(order))

/**
 * `a=1 b=2`, in the order given.
 */
export const format = <Id>(counts: ReadonlyArray<CountEntry<Id>>, formatId: (id: Id) => string = String): string =>
  counts.map(([id, count]) => `${formatId(id)}=${count}`).join(' ')

export const logCounts = <Id>(registry: Registry<Id>, options?: LogOptions<Id>): Effect.Effect<void> =>
  Effect.gen(function* () {
    const counts = yield* snapshot(registry, options?.order)
    const line = format(counts, options?.formatId)
    const prefix = `[${options?.label ?? 'tally'}]`

    yield* Effect.logInfo(line === '' ? prefix : `${prefix} ${line}`).pipe(
      Effect.annotateLogs('tally.categories', counts.length),
    )
  })

/**
 * Logs counts now and then every interval, until interrupted.
 */
export const report = <Id>(registry: Registry<Id>, options?: ReportOptions<Id>): Effect.Effect<void> =>
  Effect.gen(function* () {
    const interval = options?.interval !== undefined ? Duration.decode(options.interval) : yield* reportInterval

    yield* logCounts(registry, options).pipe(Effect.repeat(Schedule.spaced(interval)))
  })

/**
 * Sets one gauge per category, tagged `category=<id>`.
 */
export const exportGauges = <Id>(registry: Registry<Id>, options?: GaugeOptions<Id>): Effect.Effect<void> =>
  Effect.flatMap(snapshot(registry), (counts) => {
    const base = gauge(options?.name)
    const formatId: (id: Id) => string = options?.formatId ?? String

    return Effect.forEach(
      counts,
      ([id, count]) => Metric.set(base.pipe(Metric.tagged('category', formatId(id))), count),
      { discard: true },
    )
  })

import { Config, Context, Duration, Effect, Layer, Option } from 'effect'

export interface ReporterConfigShape {
  readonly interval: Duration.DurationInput
}

export class ReporterConfigTag extends Context.Tag('@tally/core/ReporterConfig')<
  ReporterConfigTag,
  ReporterConfigShape
>() {}

const DEFAULT_CONFIG: ReporterConfigShape = {
  interval: '10 seconds',
}

export const ReporterConfig = {
  tag: ReporterConfigTag,

  /**
   * Fixed reporting interval, taking precedence over `tally.report_interval`.
   */
  withInterval: (interval: Duration.DurationInput): Layer.Layer<ReporterConfigTag> =>
    Layer.succeed(ReporterConfigTag, { interval }),
}

const ReporterConfigFromEnv = {
  /**
   * Reporting interval, e.g. "30 seconds". Supplied through the active ConfigProvider.
   */
  interval: Config.duration('tally.report_interval').pipe(
    Config.withDefault(Duration.decode(DEFAULT_CONFIG.interval)),
  ),
}

/**
 * Resolution order: ReporterConfigTag override, then ConfigProvider, then the default.
 */
export const reportInterval: Effect.Effect<Duration.Duration, never, never> = Effect.gen(function* () {
  const override = yield* Effect.serviceOption(ReporterConfigTag)
  if (Option.isSome(override)) {
    return Duration.decode(override.value.interval)
  }
  return yield* ReporterConfigFromEnv.interval
}).pipe(Effect.orDie)

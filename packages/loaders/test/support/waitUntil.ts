import { Duration, Effect, TestClock } from 'effect'

export interface WaitUntilOptions {
  readonly maxAttempts?: number
  readonly step?: Duration.DurationInput
}

/**
 * Re-checks `predicate`, advancing the TestClock and yielding to the scheduler between attempts,
 * so forked fibers get the chance to make progress. Dies once the attempts run out.
 */
export const waitUntil = (
  predicate: () => boolean,
  options: WaitUntilOptions = {},
): Effect.Effect<void> =>
  Effect.gen(function* () {
    const maxAttempts = options.maxAttempts ?? 100
    const step = options.step ?? Duration.millis(10)

    for (let i = 0; i < maxAttempts; i++) {
      if (predicate()) return
      yield* TestClock.adjust(step)
      yield* Effect.yieldNow()
    }

    return yield* Effect.dieMessage(`waitUntil: condition not met after ${maxAttempts} attempts`)
  })

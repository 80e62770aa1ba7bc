import { Cause, Effect, TestClock, type Duration } from 'effect'

export interface WaitUntilOptions {
  readonly maxAttempts?: number
  readonly step?: Duration.DurationInput
}

/**
 * Re-runs `check` under TestContext, advancing the TestClock and yielding the
 * scheduler between attempts, until it succeeds or runs out of attempts.
 */
export const waitUntil = <A, E, R>(
  check: Effect.Effect<A, E, R>,
  options: WaitUntilOptions = {},
): Effect.Effect<A, E, R> =>
  Effect.gen(function* () {
    const maxAttempts = options.maxAttempts ?? 20
    const step = options.step ?? '10 millis'

    let lastCause: Cause.Cause<E> | undefined

    for (let i = 0; i < maxAttempts; i++) {
      const result = yield* Effect.exit(check)
      if (result._tag === 'Success') {
        return result.value
      }

      lastCause = result.cause
      // Let timers and freshly forked fibers make progress.
      yield* TestClock.adjust(step)
      yield* Effect.yieldNow()
    }

    // Fail with the cause of the last attempt.
    return yield* lastCause === undefined ? Effect.dieMessage('waitUntil: maxAttempts must be positive') : Effect.failCause(lastCause)
  })

import { describe, expect, it } from '@effect/vitest'
import { Effect, Ref } from 'effect'
import { waitUntil } from '../src/index.js'

describe('waitUntil', () => {
  it.effect('retries until the check succeeds', () =>
    Effect.gen(function* () {
      const attempts = yield* Ref.make(0)
      const check = Ref.updateAndGet(attempts, (n) => n + 1).pipe(
        Effect.flatMap((n) => (n >= 3 ? Effect.succeed('ready') : Effect.fail('not yet'))),
      )

      const result = yield* waitUntil(check)

      expect(result).toBe('ready')
      expect(yield* Ref.get(attempts)).toBe(3)
    }),
  )

  it.effect('fails with the last error once attempts run out', () =>
    Effect.gen(function* () {
      const attempts = yield* Ref.make(0)
      const check = Ref.updateAndGet(attempts, (n) => n + 1).pipe(
        Effect.flatMap((n) => Effect.fail(`attempt ${n}`)),
      )

      const error = yield* Effect.flip(waitUntil(check, { maxAttempts: 2 }))

      expect(error).toBe('attempt 2')
    }),
  )

  it.effect('advances the test clock between attempts', () =>
    Effect.gen(function* () {
      const done = yield* Ref.make(false)
      yield* Effect.fork(Effect.sleep('30 millis').pipe(Effect.zipRight(Ref.set(done, true))))

      const check = Ref.get(done).pipe(Effect.flatMap((ready) => (ready ? Effect.void : Effect.fail('pending'))))
      yield* waitUntil(check, { step: '10 millis' })

      expect(yield* Ref.get(done)).toBe(true)
    }),
  )
})

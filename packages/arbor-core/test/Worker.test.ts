import { describe, expect, it } from '@effect/vitest'
import { Chunk, Data, Effect, Equal, Fiber, Option, Stream, TestClock } from 'effect'
import * as Arbor from '../src/index.js'
import { settle } from './fixtures/settle.js'

describe('Worker', () => {
  it('compares workers by id and params', () => {
    const page = (n: number) => Arbor.Worker.make('page', () => Stream.make(n), { params: Data.struct({ n }) })

    expect(Equal.equals(page(1), page(1))).toBe(true)
    expect(Equal.equals(page(1), page(2))).toBe(false)
    expect(Equal.equals(page(1), Arbor.Worker.make('other', () => Stream.make(1), { params: Data.struct({ n: 1 }) }))).toBe(
      false,
    )
    expect(Equal.equals(Arbor.Worker.timer('delay', '10 millis'), Arbor.Worker.timer('delay', 10))).toBe(true)
    expect(Arbor.Worker.isWorker(page(1))).toBe(true)
    expect(Arbor.Worker.isWorker({ id: 'page' })).toBe(false)
  })

  it.scoped('feeds an effect result back as an action', () =>
    Effect.gen(function* () {
      const load = Arbor.Worker.fromEffect('load', Effect.succeed(42))
      const Loader = Arbor.Workflow.define<void, Option.Option<number>, never, Option.Option<number>>('Loader', {
        initialState: () => Option.none(),
        render: (_props, loaded, context) => {
          context.runWorker(load, { onOutput: (value) => Arbor.Action.setState(Option.some(value), 'loaded') })
          return loaded
        },
      })

      const host = yield* Arbor.Host.make(Loader, undefined)
      yield* settle

      expect(host.getRendering()).toEqual(Option.some(42))
      expect(host.snapshot().sideEffects).toEqual(['worker:load:'])
    }),
  )

  it.scoped('sums what stream and async iterable workers emit', () =>
    Effect.gen(function* () {
      const numbers = Arbor.Worker.fromStream('numbers', Stream.make(1, 2, 3))
      const more = Arbor.Worker.fromAsyncIterable('more', async function* () {
        yield 4
        yield 5
      })
      const add = (n: number) => Arbor.Action.update<void, number, never>('add', (total) => total + n)
      const Sum = Arbor.Workflow.define<void, number, never, number>('Sum', {
        initialState: () => 0,
        render: (_props, total, context) => {
          context.runWorker(numbers, { onOutput: add })
          context.runWorker(more, { onOutput: add })
          return total
        },
      })

      const host = yield* Arbor.Host.make(Sum, undefined)
      for (let i = 0; i < 50 && host.getRendering() !== 15; i++) {
        yield* settle
        yield* Effect.promise(() => new Promise<void>((resolve) => setImmediate(resolve)))
      }

      expect(host.getRendering()).toBe(15)
    }),
  )

  it.scoped('runs the same worker twice under distinct keys', () =>
    Effect.gen(function* () {
      const Twin = Arbor.Workflow.define<void, ReadonlyArray<string>, never, ReadonlyArray<string>>('Twin', {
        initialState: () => [],
        render: (_props, seen, context) => {
          const ping = Arbor.Worker.fromEffect('ping', Effect.succeed('pong'))
          for (const key of ['left', 'right']) {
            context.runWorker(ping, {
              key,
              onOutput: (value) => Arbor.Action.update(`seen:${key}`, (current) => [...current, `${key}:${value}`]),
            })
          }
          return seen
        },
      })

      const host = yield* Arbor.Host.make(Twin, undefined)
      yield* settle

      expect([...host.getRendering()].sort()).toEqual(['left:pong', 'right:pong'])
      expect(host.snapshot().sideEffects).toEqual(['worker:ping:left', 'worker:ping:right'])
    }),
  )

  it.scoped('fires a timer after its duration', () =>
    Effect.gen(function* () {
      const Delayed = Arbor.Workflow.define<void, boolean, never, boolean>('Delayed', {
        initialState: () => false,
        render: (_props, done, context) => {
          context.runWorker(Arbor.Worker.timer('delay', '50 millis'), {
            onOutput: () => Arbor.Action.setState<void, boolean, never>(true, 'elapsed'),
          })
          return done
        },
      })

      const host = yield* Arbor.Host.make(Delayed, undefined)
      yield* settle
      yield* TestClock.adjust('49 millis')
      yield* settle
      expect(host.getRendering()).toBe(false)

      yield* TestClock.adjust('1 millis')
      yield* settle
      expect(host.getRendering()).toBe(true)
    }),
  )

  it.scoped('aborts the promise signal when the worker is cancelled', () =>
    Effect.gen(function* () {
      const signals: Array<AbortSignal> = []
      const pending = Arbor.Worker.fromPromise<number>('pending', (signal) => {
        signals.push(signal)
        return new Promise<number>((resolve) => {
          signal.addEventListener('abort', () => resolve(0))
        })
      })
      const Waiting = Arbor.Workflow.define<{ readonly enabled: boolean }, number, never, number>('Waiting', {
        initialState: () => 0,
        render: (props, state, context) => {
          if (props.enabled) {
            context.runWorker(pending, { onOutput: (value) => Arbor.Action.setState(value + 1, 'resolved') })
          }
          return state
        },
      })

      const host = yield* Arbor.Host.make(Waiting, { enabled: true })
      yield* settle
      expect(signals.map((signal) => signal.aborted)).toEqual([false])

      host.update({ enabled: false })
      yield* settle
      expect(signals.map((signal) => signal.aborted)).toEqual([true])
      expect(host.getRendering()).toBe(0)
    }),
  )

  it.effect('bridges a callback API and cleans it up', () =>
    Effect.gen(function* () {
      const emitters: Array<Arbor.Worker.CallbackEmitter<string>> = []
      let cleaned = 0
      const worker = Arbor.Worker.fromCallback<string>('callback', (emit) => {
        emitters.push(emit)
        return () => {
          cleaned++
        }
      })

      const fiber = yield* Effect.fork(Stream.runCollect(worker.run()))
      yield* settle
      for (const emit of emitters) {
        emit.single('x')
        emit.single('y')
        emit.end()
      }

      const collected = yield* Fiber.join(fiber)
      expect(Chunk.toArray(collected)).toEqual(['x', 'y'])
      expect(cleaned).toBe(1)
    }),
  )
})

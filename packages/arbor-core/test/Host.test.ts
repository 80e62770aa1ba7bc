import { describe, expect, it } from '@effect/vitest'
import { Chunk, Effect, Fiber, Stream } from 'effect'
import * as Arbor from '../src/index.js'
import { counterOf, Parent } from './fixtures/Parent.js'
import { settle } from './fixtures/settle.js'

describe('Host', () => {
  it.scoped('streams renderings and outputs', () =>
    Effect.gen(function* () {
      const host = yield* Arbor.Host.make(Parent, { keys: ['a'] })
      const outputs = yield* Effect.fork(Stream.runCollect(host.outputs.pipe(Stream.take(1))))
      const counts = yield* Effect.fork(
        Stream.runCollect(
          host.renderings.pipe(
            Stream.map((rendering) => counterOf(rendering, 'a').count),
            Stream.take(3),
          ),
        ),
      )
      yield* settle

      counterOf(host.getRendering(), 'a').increment()
      counterOf(host.getRendering(), 'a').increment()

      expect(Chunk.toArray(yield* Fiber.join(outputs))).toEqual(['a'])
      expect(Chunk.toArray(yield* Fiber.join(counts))).toEqual([0, 5, 10])
    }),
  )

  it.scoped('picks up sinks and a runtime label from layers', () =>
    Effect.gen(function* () {
      const sessions = Arbor.Debug.makeSessionCounterSink()
      const host = yield* Arbor.Host.make(Parent, { keys: ['a', 'b'] }).pipe(
        Effect.provide(Arbor.Debug.layer([sessions.sink])),
        Effect.provide(Arbor.Debug.runtimeLabel('app')),
      )

      expect(sessions.getSnapshot()).toEqual(
        new Map([
          ['app::Parent', 1],
          ['app::Counter', 2],
        ]),
      )

      host.update({ keys: ['a'] })
      expect(sessions.getSnapshot().get('app::Counter')).toBe(1)

      host.dispose()
      expect(sessions.getSnapshot().size).toBe(0)
    }),
  )

  it.scoped('reads host defaults from RuntimeConfig', () =>
    Effect.gen(function* () {
      const ring = Arbor.Debug.makeRingBufferSink()
      const host = yield* Arbor.Host.make(Parent, { keys: ['a'] }, { observers: [ring.sink] }).pipe(
        Effect.provide(Arbor.RuntimeConfig.layer({ renderOnlyIfStateChanged: true, label: 'configured' })),
      )

      counterOf(host.getRendering(), 'a').reset()
      expect(host.renderCount()).toBe(1)
      expect(ring.getSnapshot().every((event) => event.runtimeLabel === 'configured')).toBe(true)
    }),
  )

  it.scoped('lets host options override RuntimeConfig', () =>
    Effect.gen(function* () {
      const host = yield* Arbor.Host.make(Parent, { keys: ['a'] }, { renderOnlyIfStateChanged: false }).pipe(
        Effect.provide(Arbor.RuntimeConfig.layer({ renderOnlyIfStateChanged: true })),
      )

      counterOf(host.getRendering(), 'a').reset()
      expect(host.renderCount()).toBe(2)
    }),
  )

  it('tells a debugger why the tree updated', () => {
    const recorder = Arbor.Debug.makeRecordingDebugger()
    const host = Arbor.Host.unsafeMake(Parent, { keys: ['a'] }, { debugger: recorder })
    expect(recorder.initial()?.children.map((child) => child.key)).toEqual(['a'])

    const counterInfo = {
      workflowId: 'Counter',
      sessionId: 2,
      kind: { _tag: 'didUpdate', action: 'increment', source: { _tag: 'external' } },
    }

    counterOf(host.getRendering(), 'a').increment()
    counterOf(host.getRendering(), 'a').increment()
    host.update({ keys: ['a'] })

    const [first, second, third] = recorder.updates()
    expect(first?.info).toEqual({
      workflowId: 'Parent',
      sessionId: 1,
      kind: { _tag: 'childDidUpdate', child: counterInfo },
    })
    expect(first?.snapshot.children[0]?.state).toEqual({ count: 5 })

    expect(second?.info).toEqual({
      workflowId: 'Parent',
      sessionId: 1,
      kind: { _tag: 'didUpdate', action: 'childReached:a', source: { _tag: 'subtree', child: counterInfo } },
    })
    expect(second && Arbor.Debug.originOf(second.info)).toEqual(counterInfo)

    expect(third?.info).toEqual({ workflowId: 'Parent', sessionId: 1, kind: { _tag: 'propsDidChange' } })
    expect(recorder.updates()).toHaveLength(3)
  })

  it('stops publishing after dispose', () => {
    const host = Arbor.Host.unsafeMake(Parent, { keys: ['a'] })
    const rendered: Array<number> = []
    host.subscribe(() => rendered.push(host.renderCount()))
    const increment = counterOf(host.getRendering(), 'a').increment

    host.dispose()
    increment()

    expect(host.isDisposed()).toBe(true)
    expect(rendered).toEqual([])
    expect(host.snapshot().children).toEqual([])
  })
})

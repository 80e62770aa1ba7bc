import { describe, expect, it } from '@effect/vitest'
import { Effect } from 'effect'
import * as Arbor from '../src/index.js'
import { counterOf, Parent } from './fixtures/Parent.js'

const diagnosticCodes = (events: ReadonlyArray<Arbor.Debug.Event>) =>
  events.flatMap((event) => (event.type === 'diagnostic' ? [event.code] : []))

describe('Runtime usage errors', () => {
  it('rejects two children with the same workflow and key', () => {
    const ring = Arbor.Debug.makeRingBufferSink()
    expect(() => Arbor.Host.unsafeMake(Parent, { keys: ['a', 'a'] }, { observers: [ring.sink] })).toThrow(
      Arbor.Errors.DuplicateChildKeyError,
    )
    expect(diagnosticCodes(ring.getSnapshot())).toEqual(['render::duplicate_child'])
  })

  it('keeps the previous children when a render pass fails', () => {
    const host = Arbor.Host.unsafeMake(Parent, { keys: ['a', 'b'] }, { observers: [Arbor.Debug.makeRingBufferSink().sink] })
    counterOf(host.getRendering(), 'a').increment()

    expect(() => host.update({ keys: ['b', 'b'] })).toThrow(Arbor.Errors.DuplicateChildKeyError)
    expect(host.snapshot().children.map((child) => [child.key, child.sessionId])).toEqual([
      ['a', 2],
      ['b', 3],
    ])
    expect(host.renderCount()).toBe(2)

    host.update({ keys: ['a'] })
    expect(host.snapshot().children.map((child) => [child.key, child.sessionId])).toEqual([['a', 2]])
    expect(counterOf(host.getRendering(), 'a').count).toBe(5)
  })

  it('rejects a side-effect key registered twice in one render', () => {
    const Twice = Arbor.Workflow.define<void, number, never, number>('Twice', {
      initialState: () => 0,
      render: (_props, state, context) => {
        context.runSideEffect('poll', () => Effect.void)
        context.runSideEffect('poll', () => Effect.void)
        return state
      },
    })

    expect(() => Arbor.Host.unsafeMake(Twice, undefined, { observers: [Arbor.Debug.makeRingBufferSink().sink] })).toThrow(
      Arbor.Errors.DuplicateSideEffectKeyError,
    )
  })

  it('rejects a render context used after its render returned', () => {
    const captured: Array<Arbor.Workflow.RenderContext<void, number, never>> = []
    const Leaky = Arbor.Workflow.define<void, number, never, number>('Leaky', {
      initialState: () => 0,
      render: (_props, state, context) => {
        captured.push(context)
        return state
      },
    })
    Arbor.Host.unsafeMake(Leaky, undefined, { observers: [Arbor.Debug.makeRingBufferSink().sink] })

    let thrown: unknown
    try {
      captured[0]?.makeSink()
    } catch (error) {
      thrown = error
    }
    expect(thrown).toBeInstanceOf(Arbor.Errors.StaleRenderContextError)
    expect(Arbor.Errors.isWorkflowRuntimeError(thrown) && thrown.toJSON()).toMatchObject({
      _tag: 'StaleRenderContextError',
      code: 'render::stale_context',
      workflowId: 'Leaky',
      operation: 'makeSink',
    })
  })

  it('rejects sending to a sink while rendering', () => {
    const Chatty = Arbor.Workflow.define<void, number, never, number>('Chatty', {
      initialState: () => 0,
      render: (_props, state, context) => {
        context.makeSink().send(Arbor.Action.noop())
        return state
      },
    })

    expect(() => Arbor.Host.unsafeMake(Chatty, undefined, { observers: [Arbor.Debug.makeRingBufferSink().sink] })).toThrow(
      Arbor.Errors.SinkSentDuringRenderError,
    )
  })

  it('serializes the duplicate child details', () => {
    const error = new Arbor.Errors.DuplicateChildKeyError({ workflowId: 'Parent', childId: 'Counter', key: 'a' })
    expect(error.message).toBe('[Arbor] Parent rendered child Counter with key "a" more than once in one pass')
    expect(error.toJSON()).toEqual({
      _tag: 'DuplicateChildKeyError',
      name: 'DuplicateChildKeyError',
      code: 'render::duplicate_child',
      message: '[Arbor] Parent rendered child Counter with key "a" more than once in one pass',
      workflowId: 'Parent',
      hint: 'Give each child of the same workflow a distinct key within a single render.',
      childId: 'Counter',
      key: 'a',
    })
  })
})

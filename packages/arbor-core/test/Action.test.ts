import { describe, expect, it } from '@effect/vitest'
import { Data, Equal, Option } from 'effect'
import * as Arbor from '../src/index.js'
import { increment, reset } from './fixtures/Counter.js'

describe('Action', () => {
  it('keeps the state reference when a mutation changes nothing', () => {
    const state = { items: ['a'] }
    const touch = Arbor.Action.mutate<void, { items: Array<string> }, never>('touch', (draft) => {
      if (draft.items.length > 5) {
        draft.items.pop()
      }
    })

    const result = touch.apply(state, { props: undefined })
    expect(result.state).toBe(state)
    expect(result.output).toEqual(Option.none())
  })

  it('reads props and emits from a mutation', () => {
    const first = increment.apply({ count: 0 }, { props: { step: 5 } })
    expect(first.state).toEqual({ count: 5 })
    expect(first.output).toEqual(Option.none())

    const second = increment.apply(first.state, { props: { step: 5 } })
    expect(second.state).toEqual({ count: 10 })
    expect(second.output).toEqual(Option.some('tenReached'))
  })

  it('builds the plain transitions', () => {
    expect(reset._tag).toBe('reset')
    expect(reset.apply({ count: 3 }, { props: { step: 1 } }).state).toEqual({ count: 0 })

    const sent = Arbor.Action.sendOutput<void, number, string>('ping').apply(7, { props: undefined })
    expect(sent).toEqual({ state: 7, output: Option.some('ping') })

    const idle = Arbor.Action.noop<void, number, string>()
    expect(idle._tag).toBe('noop')
    expect(idle.apply(7, { props: undefined })).toEqual({ state: 7, output: Option.none() })
  })
  it('drafts only plain state, leaving Data state to update', () => {
    const state = Data.struct({ n: 1 })
    const bumpDraft = Arbor.Action.mutate<void, { readonly n: number }, never>('bumpDraft', (draft) => {
      draft.n += 1
    })
    expect(() => bumpDraft.apply(state, { props: undefined })).toThrow(/Invalid base state/)

    const bump = Arbor.Action.update<void, { readonly n: number }, never>('bump', (current) =>
      Data.struct({ n: current.n + 1 }),
    )
    const result = bump.apply(state, { props: undefined })
    expect(Equal.equals(result.state, Data.struct({ n: 2 }))).toBe(true)
  })
})

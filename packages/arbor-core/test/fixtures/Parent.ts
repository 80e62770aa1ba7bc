import * as Arbor from '../../src/index.js'
import { Counter, type CounterRendering } from './Counter.js'

export interface ParentProps {
  readonly keys: ReadonlyArray<string>
}

export interface ParentState {
  readonly reached: ReadonlyArray<string>
}

export interface ParentRendering {
  readonly reached: ReadonlyArray<string>
  readonly counters: ReadonlyArray<{ readonly key: string; readonly counter: CounterRendering }>
}

export const childReached = (key: string) =>
  Arbor.Action.mutate<ParentProps, ParentState, string>(`childReached:${key}`, (draft, { emit }) => {
    draft.reached.push(key)
    emit(key)
  })

/**
 * One Counter (step 5) per key. Emits the key of a counter that reaches ten.
 */
export const Parent = Arbor.Workflow.define<ParentProps, ParentState, string, ParentRendering>('Parent', {
  initialState: () => ({ reached: [] }),
  render: (props, state, context) => ({
    reached: state.reached,
    counters: props.keys.map((key) => ({
      key,
      counter: context.renderChild(Counter, { step: 5 }, { key, onOutput: () => childReached(key) }),
    })),
  }),
})

export const counterOf = (rendering: ParentRendering, key: string): CounterRendering => {
  const entry = rendering.counters.find((candidate) => candidate.key === key)
  if (entry === undefined) {
    throw new Error(`no counter rendered for "${key}"`)
  }
  return entry.counter
}

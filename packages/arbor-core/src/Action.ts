import { Option } from 'effect'
import { create, type Draft } from 'mutative'
import type { Action, ActionResult, ApplyContext } from './internal/workflow.js'

export type { Action, ActionResult, ApplyContext } from './internal/workflow.js'

export interface MutateContext<P, O> extends ApplyContext<P> {
  /** Emits the action's output. Calling it again replaces the previous value. */
  readonly emit: (output: O) => void
}

export const make = <P, S, O>(
  tag: string,
  apply: (state: S, context: ApplyContext<P>) => ActionResult<S, O>,
): Action<P, S, O> => ({ _tag: tag, apply })

/**
 * A pure transition without output.
 */
export const update = <P, S, O>(tag: string, f: (state: S, context: ApplyContext<P>) => S): Action<P, S, O> =>
  make(tag, (state, context) => ({ state: f(state, context), output: Option.none() }))

/**
 * A transition written against a mutative draft. The state keeps its identity
 * when the recipe changes nothing, so reference equivalence sees "no change".
 *
 * The state must be draftable: plain objects, arrays, `Map` and `Set`, nested
 * freely. `Data` values and class instances are rejected by mutative; write
 * their transitions with `update` instead.
 */
export const mutate = <P, S, O>(
  tag: string,
  recipe: (draft: Draft<S>, context: MutateContext<P, O>) => void,
): Action<P, S, O> =>
  make(tag, (state, context) => {
    let output: Option.Option<O> = Option.none()
    const mutateContext: MutateContext<P, O> = {
      props: context.props,
      emit: (value) => {
        output = Option.some(value)
      },
    }
    const next = create(state, (draft) => {
      recipe(draft, mutateContext)
    })
    return { state: next, output }
  })

export const setState = <P, S, O>(state: S, tag = 'setState'): Action<P, S, O> =>
  make(tag, () => ({ state, output: Option.none() }))

export const sendOutput = <P, S, O>(output: O, tag = 'sendOutput'): Action<P, S, O> =>
  make(tag, (state) => ({ state, output: Option.some(output) }))

export const noop = <P, S, O>(tag = 'noop'): Action<P, S, O> => make(tag, (state) => ({ state, output: Option.none() }))


import { Equal, Option, Schema, type Equivalence } from 'effect'
import * as Action from './Action.js'
import type { RenderContext, Workflow } from './internal/workflow.js'

export type {
  MutationRecipe,
  OutputOf,
  PropsOf,
  RenderChildOptions,
  RenderContext,
  RenderingOf,
  RunWorkerOptions,
  SideEffectOptions,
  SideEffectWork,
  StateOf,
  Workflow,
} from './internal/workflow.js'

export interface WorkflowSpec<P, S, O, R> {
  readonly initialState: (props: P) => S
  readonly render: (props: P, state: S, context: RenderContext<P, S, O>) => R
  /** State migration when the parent passes new props. Defaults to keeping the state. */
  readonly didChange?: (previousProps: P, props: P, state: S) => S
  readonly propsEquivalence?: Equivalence.Equivalence<P>
  readonly stateEquivalence?: Equivalence.Equivalence<S>
}

const keepState = <P, S>(_previousProps: P, _props: P, state: S): S => state

const referenceOrEqual = <A>(self: A, that: A): boolean => Equal.equals(self, that)

/**
 * Defines a workflow from plain types. State and props are compared with
 * `Equal.equals` unless an equivalence is given, so plain objects compare by
 * reference; mutative drafts keep references stable when nothing changes.
 * A `Data` state compares structurally but cannot be drafted, so its actions
 * use `Action.update` rather than `Action.mutate`.
 *
 * The returned object is the workflow's identity in the tree: define it once,
 * at module level, and render that same object on every pass.
 */
export const define = <P, S, O = never, R = unknown>(id: string, spec: WorkflowSpec<P, S, O, R>): Workflow<P, S, O, R> => ({
  id,
  initialState: spec.initialState,
  render: spec.render,
  didChange: spec.didChange ?? keepState,
  propsEquivalence: spec.propsEquivalence ?? referenceOrEqual,
  stateEquivalence: spec.stateEquivalence ?? referenceOrEqual,
})

export interface SchemaWorkflowSpec<P, PI, S, SI, O, OI, R> {
  readonly props?: Schema.Schema<P, PI>
  readonly state: Schema.Schema<S, SI>
  readonly output?: Schema.Schema<O, OI>
  readonly initialState: (props: P) => S
  readonly render: (props: P, state: S, context: RenderContext<P, S, O>) => R
  readonly didChange?: (previousProps: P, props: P, state: S) => S
}

/**
 * Defines a workflow whose props, state and output are described by schemas.
 * Equivalences are derived from the schemas, so structurally equal states
 * count as unchanged.
 *
 * @example
 * const Counter = Workflow.make('Counter', {
 *   props: Schema.Struct({ start: Schema.Number }),
 *   state: Schema.Struct({ count: Schema.Number }),
 *   output: Schema.Literal('done'),
 *   initialState: (props) => ({ count: props.start }),
 *   render: (_props, state, context) => {
 *     const sink = context.makeSink()
 *     return { count: state.count, increment: () => sink.send(increment) }
 *   },
 * })
 */
export const make = <S, SI, R, P = void, PI = void, O = never, OI = never>(
  id: string,
  spec: SchemaWorkflowSpec<P, PI, S, SI, O, OI, R>,
): Workflow<P, S, O, R> => ({
  id,
  initialState: spec.initialState,
  render: spec.render,
  didChange: spec.didChange ?? keepState,
  propsEquivalence: spec.props !== undefined ? Schema.equivalence(spec.props) : referenceOrEqual,
  stateEquivalence: Schema.equivalence(spec.state),
})

export interface LatestOutputRendering<CR, CO> {
  readonly rendering: CR
  readonly latest: Option.Option<CO>
}

/**
 * Wraps `child` and renders its most recent output next to its rendering.
 * Like any workflow, call it once and reuse the result.
 */
export const latestOutput = <CP, CS, CO, CR>(
  child: Workflow<CP, CS, CO, CR>,
): Workflow<CP, Option.Option<CO>, never, LatestOutputRendering<CR, CO>> =>
  define<CP, Option.Option<CO>, never, LatestOutputRendering<CR, CO>>(`LatestOutput(${child.id})`, {
    initialState: () => Option.none(),
    render: (props, latest, context) => ({
      rendering: context.renderChild(child, props, {
        onOutput: (output) => Action.setState(Option.some(output), 'latestOutput'),
      }),
      latest,
    }),
  })

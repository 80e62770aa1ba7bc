import type { Effect, Equal, Equivalence, Option, Stream } from 'effect'
import type { Draft } from 'mutative'

export interface ApplyContext<P> {
  /** Props of the owning node at the moment the action is applied. */
  readonly props: P
}

export interface ActionResult<S, O> {
  readonly state: S
  readonly output: Option.Option<O>
}

/**
 * One state transition of a workflow. `apply` runs synchronously, at most once
 * per delivered event, and yields at most one output.
 */
export interface Action<P, S, O> {
  readonly _tag: string
  readonly apply: (state: S, context: ApplyContext<P>) => ActionResult<S, O>
}

export interface Sink<A> {
  readonly send: (value: A) => void
  readonly contramap: <B>(f: (value: B) => A) => Sink<B>
}

export const makeSink = <A>(send: (value: A) => void): Sink<A> => ({
  send,
  contramap: <B>(f: (value: B) => A): Sink<B> => makeSink((value: B) => send(f(value))),
})

/** Runs against a mutative draft, so `S` must be a plain object, array, `Map` or `Set`. */
export type MutationRecipe<P, S> = (draft: Draft<S>, context: ApplyContext<P>) => void

/**
 * A cancellable unit of work. The sink it receives stops delivering as soon as
 * the side effect is cancelled, whatever the work does afterwards.
 */
export type SideEffectWork<A, E = never> = (sink: Sink<A>) => Effect.Effect<void, E>

export interface SideEffectOptions {
  /**
   * Compared with `Equal.equals` against the params of the running side effect
   * under the same key. Equal params keep it running; different params restart it.
   */
  readonly params?: unknown
}

export interface RenderChildOptions<CO, P, S, O> {
  readonly key?: string
  readonly onOutput?: (output: CO) => Action<P, S, O>
}

export const WorkerTypeId: unique symbol = Symbol.for('@arbor/core/Worker')
export type WorkerTypeId = typeof WorkerTypeId

/**
 * A keyed source of outputs. Two workers are equivalent when they share an id
 * and their params are `Equal.equals`.
 */
export interface Worker<O> extends Equal.Equal {
  readonly [WorkerTypeId]: WorkerTypeId
  readonly id: string
  readonly params: unknown
  readonly run: () => Stream.Stream<O>
}

export interface RunWorkerOptions<WO, P, S, O> {
  readonly key?: string
  readonly onOutput: (output: WO) => Action<P, S, O>
}

/**
 * Handed to `render`. Valid only until that call returns.
 */
export interface RenderContext<P, S, O> {
  readonly renderChild: <CP, CS, CO, CR>(
    workflow: Workflow<CP, CS, CO, CR>,
    props: CP,
    options?: RenderChildOptions<CO, P, S, O>,
  ) => CR
  readonly makeSink: () => Sink<Action<P, S, O>>
  /** Sends recipes as `Action.mutate` actions; needs a draftable state. */
  readonly makeMutationSink: () => Sink<MutationRecipe<P, S>>
  readonly runSideEffect: <E>(key: string, work: SideEffectWork<Action<P, S, O>, E>, options?: SideEffectOptions) => void
  readonly runWorker: <WO>(worker: Worker<WO>, options: RunWorkerOptions<WO, P, S, O>) => void
}

/**
 * The blueprint of a node. The object itself is the workflow's type: children
 * are matched across passes by (blueprint, key).
 */
export interface Workflow<P, S, O, R> {
  readonly id: string
  readonly initialState: (props: P) => S
  readonly render: (props: P, state: S, context: RenderContext<P, S, O>) => R
  readonly didChange: (previousProps: P, props: P, state: S) => S
  readonly propsEquivalence: Equivalence.Equivalence<P>
  readonly stateEquivalence: Equivalence.Equivalence<S>
}

export type PropsOf<W> = W extends Workflow<infer P, infer _S, infer _O, infer _R> ? P : never
export type StateOf<W> = W extends Workflow<infer _P, infer S, infer _O, infer _R> ? S : never
export type OutputOf<W> = W extends Workflow<infer _P, infer _S, infer O, infer _R> ? O : never
export type RenderingOf<W> = W extends Workflow<infer _P, infer _S, infer _O, infer R> ? R : never

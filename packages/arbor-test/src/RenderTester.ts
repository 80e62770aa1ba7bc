import { Equal, Option, type Equivalence } from 'effect'
import { Action, Sink, type Worker, type Workflow } from '@arbor/core'
import * as Assert from './internal/assert.js'
import { RenderExpectationError } from './internal/errors.js'

export interface ChildExpectationSpec<CP, CO, CR> {
  readonly key?: string
  /** Returned from `renderChild` in place of a real render. */
  readonly rendering: CR
  /** Emitted by the child once the render returns. */
  readonly output?: CO
  readonly assertProps?: (props: CP) => void
}

export interface SideEffectExpectationSpec<P, S, O> {
  /** Applied once the render returns, as if the side effect had sent it. */
  readonly action?: Action.Action<P, S, O>
}

export interface WorkerExpectationSpec<WO> {
  readonly key?: string
  /** Emitted by the worker once the render returns. */
  readonly output?: WO
}

interface ChildExpectation {
  readonly workflow: unknown
  readonly key: string
}

interface TypedChildExpectation<CP, CS, CO, CR> extends ChildExpectation {
  readonly workflow: Workflow.Workflow<CP, CS, CO, CR>
  readonly spec: ChildExpectationSpec<CP, CO, CR>
}

interface WorkerExpectation {
  readonly worker: Worker.Worker<unknown>
  readonly key: string
}

interface TypedWorkerExpectation<WO> extends WorkerExpectation {
  readonly worker: Worker.Worker<WO>
  readonly spec: WorkerExpectationSpec<WO>
}

interface SideEffectExpectation<P, S, O> {
  readonly key: string
  readonly spec: SideEffectExpectationSpec<P, S, O>
}

// Expectations are created by `expectWorkflow` for the exact workflow object
// they hold, so identity recovers their child types.
const expectsWorkflow = <CP, CS, CO, CR>(
  expectation: ChildExpectation,
  workflow: Workflow.Workflow<CP, CS, CO, CR>,
): expectation is TypedChildExpectation<CP, CS, CO, CR> => expectation.workflow === workflow

// Equal workers share an id and params, and so the type of what they emit.
const expectsWorker = <WO>(
  expectation: WorkerExpectation,
  worker: Worker.Worker<WO>,
): expectation is TypedWorkerExpectation<WO> => Equal.equals(expectation.worker, worker)

export interface RenderTesterResult<P, S, O> {
  /** State after every action produced by the render was applied. */
  readonly state: S
  readonly action: Option.Option<Action.Action<P, S, O>>
  readonly output: Option.Option<O>
  readonly verifyState: (assertion: (state: S) => void) => RenderTesterResult<P, S, O>
  readonly assertState: (expected: S) => RenderTesterResult<P, S, O>
  readonly verifyAction: (assertion: (action: Action.Action<P, S, O>) => void) => RenderTesterResult<P, S, O>
  readonly assertNoAction: () => RenderTesterResult<P, S, O>
  readonly verifyOutput: (assertion: (output: O) => void) => RenderTesterResult<P, S, O>
  readonly assertOutput: (expected: O, equivalence?: Equivalence.Equivalence<O>) => RenderTesterResult<P, S, O>
  readonly assertNoOutput: () => RenderTesterResult<P, S, O>
}

export interface RenderTester<P, S, O, R> {
  readonly expectWorkflow: <CP, CS, CO, CR>(
    workflow: Workflow.Workflow<CP, CS, CO, CR>,
    spec: ChildExpectationSpec<CP, CO, CR>,
  ) => RenderTester<P, S, O, R>
  readonly expectSideEffect: (key: string, spec?: SideEffectExpectationSpec<P, S, O>) => RenderTester<P, S, O, R>
  readonly expectWorker: <WO>(worker: Worker.Worker<WO>, spec?: WorkerExpectationSpec<WO>) => RenderTester<P, S, O, R>
  /**
   * Renders once against a fake context. Every expectation must be met
   * exactly once, and the render may produce at most one action.
   */
  readonly render: (assertions?: (rendering: R) => void) => RenderTesterResult<P, S, O>
}

interface Expectations<P, S, O> {
  readonly children: ReadonlyArray<ChildExpectation>
  readonly sideEffects: ReadonlyArray<SideEffectExpectation<P, S, O>>
  readonly workers: ReadonlyArray<WorkerExpectation>
}

const takeFirst = <A>(items: Array<A>, predicate: (item: A) => boolean): A | undefined => {
  const index = items.findIndex(predicate)
  if (index < 0) {
    return undefined
  }
  const [item] = items.splice(index, 1)
  return item
}

const makeResult = <P, S, O, R>(
  workflow: Workflow.Workflow<P, S, O, R>,
  state: S,
  action: Option.Option<Action.Action<P, S, O>>,
  output: Option.Option<O>,
): RenderTesterResult<P, S, O> => {
  const self: RenderTesterResult<P, S, O> = {
    state,
    action,
    output,
    verifyState: (assertion) => {
      assertion(state)
      return self
    },
    assertState: (expected) => {
      Assert.assertState(workflow.id, workflow.stateEquivalence, state, expected)
      return self
    },
    verifyAction: (assertion) => {
      if (Option.isNone(action)) {
        throw new RenderExpectationError({
          kind: 'assertion',
          workflowId: workflow.id,
          message: 'expected an action, but the render produced none',
        })
      }
      assertion(action.value)
      return self
    },
    assertNoAction: () => {
      if (Option.isSome(action)) {
        throw new RenderExpectationError({
          kind: 'assertion',
          workflowId: workflow.id,
          message: `expected no action, got ${action.value._tag}`,
        })
      }
      return self
    },
    verifyOutput: (assertion) => {
      assertion(Assert.requireOutput(workflow.id, output))
      return self
    },
    assertOutput: (expected, equivalence) => {
      Assert.assertOutput(workflow.id, output, expected, equivalence)
      return self
    },
    assertNoOutput: () => {
      Assert.assertNoOutput(workflow.id, output)
      return self
    },
  }
  return self
}

const make = <P, S, O, R>(
  workflow: Workflow.Workflow<P, S, O, R>,
  props: P,
  state: S,
  expectations: Expectations<P, S, O>,
): RenderTester<P, S, O, R> => ({
  expectWorkflow: <CP, CS, CO, CR>(child: Workflow.Workflow<CP, CS, CO, CR>, spec: ChildExpectationSpec<CP, CO, CR>) => {
    const expectation: TypedChildExpectation<CP, CS, CO, CR> = { workflow: child, key: spec.key ?? '', spec }
    return make(workflow, props, state, { ...expectations, children: [...expectations.children, expectation] })
  },
  expectSideEffect: (key, spec = {}) =>
    make(workflow, props, state, { ...expectations, sideEffects: [...expectations.sideEffects, { key, spec }] }),
  expectWorker: <WO>(worker: Worker.Worker<WO>, spec: WorkerExpectationSpec<WO> = {}) => {
    const expectation: TypedWorkerExpectation<WO> = { worker, key: spec.key ?? '', spec }
    return make(workflow, props, state, { ...expectations, workers: [...expectations.workers, expectation] })
  },
  render: (assertions) => runRender(workflow, props, state, expectations, assertions),
})

const runRender = <P, S, O, R>(
  workflow: Workflow.Workflow<P, S, O, R>,
  props: P,
  initialState: S,
  expectations: Expectations<P, S, O>,
  assertions: ((rendering: R) => void) | undefined,
): RenderTesterResult<P, S, O> => {
  const children = [...expectations.children]
  const sideEffects = [...expectations.sideEffects]
  const workers = [...expectations.workers]

  let state = initialState
  let applied: Option.Option<Action.Action<P, S, O>> = Option.none()
  let output: Option.Option<O> = Option.none()
  let rendered = false
  const deferred: Array<Action.Action<P, S, O>> = []

  const apply = (action: Action.Action<P, S, O>): void => {
    if (Option.isSome(applied)) {
      throw new RenderExpectationError({
        kind: 'multiple_actions',
        workflowId: workflow.id,
        message: `a render test allows one action, got ${applied.value._tag} and then ${action._tag}`,
      })
    }
    const result = action.apply(state, { props })
    applied = Option.some(action)
    state = result.state
    output = result.output
  }

  // Actions raised while rendering are applied once the render has returned.
  const send = (action: Action.Action<P, S, O>): void => {
    if (rendered) {
      apply(action)
      return
    }
    deferred.push(action)
  }

  const context: Workflow.RenderContext<P, S, O> = {
    renderChild: (child, childProps, options) => {
      const key = options?.key ?? ''
      const index = children.findIndex((expectation) => expectation.workflow === child && expectation.key === key)
      const candidate = index < 0 ? undefined : children[index]
      if (candidate === undefined || !expectsWorkflow(candidate, child)) {
        throw new RenderExpectationError({
          kind: 'unexpected_child',
          workflowId: workflow.id,
          message: `unexpected child ${child.id} with key "${key}"`,
        })
      }
      children.splice(index, 1)
      candidate.spec.assertProps?.(childProps)
      const expectedOutput = candidate.spec.output
      if (expectedOutput !== undefined && options?.onOutput !== undefined) {
        send(options.onOutput(expectedOutput))
      }
      return candidate.spec.rendering
    },
    makeSink: () => Sink.make(send),
    makeMutationSink: () => Sink.make((recipe) => send(Action.mutate('mutation', recipe))),
    runSideEffect: (key) => {
      const expectation = takeFirst(sideEffects, (candidate) => candidate.key === key)
      if (expectation === undefined) {
        throw new RenderExpectationError({
          kind: 'unexpected_side_effect',
          workflowId: workflow.id,
          message: `unexpected side effect "${key}"`,
        })
      }
      if (expectation.spec.action !== undefined) {
        send(expectation.spec.action)
      }
    },
    runWorker: (worker, options) => {
      const key = options.key ?? ''
      const index = workers.findIndex((candidate) => candidate.key === key && Equal.equals(candidate.worker, worker))
      const candidate = index < 0 ? undefined : workers[index]
      if (candidate === undefined || !expectsWorker(candidate, worker)) {
        throw new RenderExpectationError({
          kind: 'unexpected_worker',
          workflowId: workflow.id,
          message: `unexpected worker ${worker.id} with key "${key}"`,
        })
      }
      workers.splice(index, 1)
      const expectedOutput = candidate.spec.output
      if (expectedOutput !== undefined) {
        send(options.onOutput(expectedOutput))
      }
    },
  }

  const value = workflow.render(props, initialState, context)
  rendered = true

  const unused = [
    ...children.map((expectation) => `child with key "${expectation.key}"`),
    ...sideEffects.map((expectation) => `side effect "${expectation.key}"`),
    ...workers.map((expectation) => `worker ${expectation.worker.id} with key "${expectation.key}"`),
  ]
  if (unused.length > 0) {
    throw new RenderExpectationError({
      kind: 'unused_expectation',
      workflowId: workflow.id,
      message: `expectations not met: ${unused.join(', ')}`,
    })
  }

  for (const action of deferred) {
    apply(action)
  }
  assertions?.(value)

  return makeResult(workflow, state, applied, output)
}

/**
 * Starts a render test from `options.state`, or from the initial state for `props`.
 */
export const renderTester = <P, S, O, R>(
  workflow: Workflow.Workflow<P, S, O, R>,
  props: P,
  options: { readonly state?: S } = {},
): RenderTester<P, S, O, R> =>
  make(workflow, props, options.state ?? workflow.initialState(props), { children: [], sideEffects: [], workers: [] })

import { Option, type Equivalence } from 'effect'
import type { Action, Workflow } from '@arbor/core'
import * as Assert from './internal/assert.js'

/**
 * Applies actions to a workflow's state one at a time, without a host.
 * Each `send` returns a new tester; earlier ones are left untouched.
 */
export interface ActionTester<P, S, O> {
  readonly state: S
  /** Output of the last action sent. */
  readonly output: Option.Option<O>
  readonly send: (action: Action.Action<P, S, O>) => ActionTester<P, S, O>
  readonly verifyState: (assertion: (state: S) => void) => ActionTester<P, S, O>
  readonly assertState: (expected: S) => ActionTester<P, S, O>
  readonly verifyOutput: (assertion: (output: O) => void) => ActionTester<P, S, O>
  readonly assertOutput: (expected: O, equivalence?: Equivalence.Equivalence<O>) => ActionTester<P, S, O>
  readonly assertNoOutput: () => ActionTester<P, S, O>
}

const make = <P, S, O, R>(
  workflow: Workflow.Workflow<P, S, O, R>,
  props: P,
  state: S,
  output: Option.Option<O>,
): ActionTester<P, S, O> => {
  const self: ActionTester<P, S, O> = {
    state,
    output,
    send: (action) => {
      const result = action.apply(state, { props })
      return make(workflow, props, result.state, result.output)
    },
    verifyState: (assertion) => {
      assertion(state)
      return self
    },
    assertState: (expected) => {
      Assert.assertState(workflow.id, workflow.stateEquivalence, state, expected)
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

/**
 * Starts from `state`, or from the workflow's initial state for `props`.
 */
export const actionTester = <P, S, O, R>(
  workflow: Workflow.Workflow<P, S, O, R>,
  props: P,
  state: S = workflow.initialState(props),
): ActionTester<P, S, O> => make(workflow, props, state, Option.none())

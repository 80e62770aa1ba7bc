import { Equal, Option, type Equivalence } from 'effect'
import { describeValue, RenderExpectationError } from './errors.js'

const fail = (workflowId: string, message: string): never => {
  throw new RenderExpectationError({ kind: 'assertion', workflowId, message })
}

export const assertState = <S>(
  workflowId: string,
  equivalence: Equivalence.Equivalence<S>,
  actual: S,
  expected: S,
): void => {
  if (!equivalence(actual, expected)) {
    fail(workflowId, `expected state ${describeValue(expected)}, got ${describeValue(actual)}`)
  }
}

export const requireOutput = <O>(workflowId: string, output: Option.Option<O>): O =>
  Option.isSome(output) ? output.value : fail(workflowId, 'expected an output, but none was produced')

export const assertOutput = <O>(
  workflowId: string,
  output: Option.Option<O>,
  expected: O,
  equivalence: Equivalence.Equivalence<O> = Equal.equals,
): void => {
  const actual = requireOutput(workflowId, output)
  if (!equivalence(actual, expected)) {
    fail(workflowId, `expected output ${describeValue(expected)}, got ${describeValue(actual)}`)
  }
}

export const assertNoOutput = <O>(workflowId: string, output: Option.Option<O>): void => {
  if (Option.isSome(output)) {
    fail(workflowId, `expected no output, got ${describeValue(output.value)}`)
  }
}

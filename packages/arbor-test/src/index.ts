export { renderTester } from './RenderTester.js'
export type {
  ChildExpectationSpec,
  RenderTester,
  RenderTesterResult,
  SideEffectExpectationSpec,
  WorkerExpectationSpec,
} from './RenderTester.js'
export { actionTester } from './ActionTester.js'
export type { ActionTester } from './ActionTester.js'
export { waitUntil } from './utils/waitUntil.js'
export { RenderExpectationError } from './internal/errors.js'
export type { ExpectationErrorKind } from './internal/errors.js'

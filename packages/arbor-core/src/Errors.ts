export {
  DuplicateChildKeyError,
  DuplicateSideEffectKeyError,
  ReentrantEventError,
  SinkSentDuringRenderError,
  StaleRenderContextError,
  WorkflowRuntimeError,
  isWorkflowRuntimeError,
} from './internal/runtime/core/errors.js'
export type { WorkflowRuntimeErrorCode, WorkflowRuntimeErrorTag } from './internal/runtime/core/errors.js'

export type WorkflowRuntimeErrorTag =
  | 'DuplicateChildKeyError'
  | 'DuplicateSideEffectKeyError'
  | 'StaleRenderContextError'
  | 'SinkSentDuringRenderError'
  | 'ReentrantEventError'

export type WorkflowRuntimeErrorCode =
  | 'render::duplicate_child'
  | 'render::duplicate_side_effect'
  | 'render::stale_context'
  | 'event::sent_during_render'
  | 'event::reentrant'

/**
 * Usage errors raised by the runtime. They are programmer errors: the runtime
 * records a diagnostic and throws instead of trying to keep a tree that no
 * longer satisfies its invariants.
 */
export abstract class WorkflowRuntimeError extends Error {
  abstract readonly _tag: WorkflowRuntimeErrorTag
  abstract readonly code: WorkflowRuntimeErrorCode
  readonly workflowId: string
  readonly hint?: string

  protected constructor(params: { readonly message: string; readonly workflowId: string; readonly hint?: string }) {
    super(params.message)
    this.workflowId = params.workflowId
    this.hint = params.hint
  }

  toJSON(): Record<string, unknown> {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      workflowId: this.workflowId,
      hint: this.hint,
    }
  }
}

export class DuplicateChildKeyError extends WorkflowRuntimeError {
  readonly _tag = 'DuplicateChildKeyError' as const
  readonly code = 'render::duplicate_child' as const
  readonly childId: string
  readonly key: string

  constructor(params: { readonly workflowId: string; readonly childId: string; readonly key: string }) {
    super({
      message: `[Arbor] ${params.workflowId} rendered child ${params.childId} with key "${params.key}" more than once in one pass`,
      workflowId: params.workflowId,
      hint: 'Give each child of the same workflow a distinct key within a single render.',
    })
    this.name = 'DuplicateChildKeyError'
    this.childId = params.childId
    this.key = params.key
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), childId: this.childId, key: this.key }
  }
}

export class DuplicateSideEffectKeyError extends WorkflowRuntimeError {
  readonly _tag = 'DuplicateSideEffectKeyError' as const
  readonly code = 'render::duplicate_side_effect' as const
  readonly key: string

  constructor(params: { readonly workflowId: string; readonly key: string }) {
    super({
      message: `[Arbor] ${params.workflowId} registered side effect "${params.key}" more than once in one pass`,
      workflowId: params.workflowId,
      hint: 'Side-effect and worker keys must be unique per render; pass a distinct key to runWorker when running the same worker twice.',
    })
    this.name = 'DuplicateSideEffectKeyError'
    this.key = params.key
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), key: this.key }
  }
}

export class StaleRenderContextError extends WorkflowRuntimeError {
  readonly _tag = 'StaleRenderContextError' as const
  readonly code = 'render::stale_context' as const
  readonly operation: string

  constructor(params: { readonly workflowId: string; readonly operation: string }) {
    super({
      message: `[Arbor] ${params.workflowId} called context.${params.operation} after its render pass returned`,
      workflowId: params.workflowId,
      hint: 'A render context is only valid inside render. Capture a sink with makeSink() if you need to send later.',
    })
    this.name = 'StaleRenderContextError'
    this.operation = params.operation
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), operation: this.operation }
  }
}

export class SinkSentDuringRenderError extends WorkflowRuntimeError {
  readonly _tag = 'SinkSentDuringRenderError' as const
  readonly code = 'event::sent_during_render' as const

  constructor(params: { readonly workflowId: string }) {
    super({
      message: `[Arbor] a sink of ${params.workflowId} was sent to while a render pass was running`,
      workflowId: params.workflowId,
      hint: 'Render must be pure. Send from a UI callback or a side effect instead.',
    })
    this.name = 'SinkSentDuringRenderError'
  }
}

export class ReentrantEventError extends WorkflowRuntimeError {
  readonly _tag = 'ReentrantEventError' as const
  readonly code = 'event::reentrant' as const

  constructor(params: { readonly workflowId: string }) {
    super({
      message: `[Arbor] an event for ${params.workflowId} started while another event was being applied`,
      workflowId: params.workflowId,
      hint: 'Events are applied one at a time; deliver through a sink so the host can queue it.',
    })
    this.name = 'ReentrantEventError'
  }
}

export const isWorkflowRuntimeError = (u: unknown): u is WorkflowRuntimeError => u instanceof WorkflowRuntimeError

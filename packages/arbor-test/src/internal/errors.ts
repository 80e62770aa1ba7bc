export type ExpectationErrorKind =
  | 'unexpected_child'
  | 'unexpected_side_effect'
  | 'unexpected_worker'
  | 'unused_expectation'
  | 'multiple_actions'
  | 'assertion'

/**
 * Thrown by the testers when a render or an action does not match what the
 * test declared.
 */
export class RenderExpectationError extends Error {
  readonly _tag = 'RenderExpectationError' as const
  readonly kind: ExpectationErrorKind
  readonly workflowId: string

  constructor(params: { readonly kind: ExpectationErrorKind; readonly workflowId: string; readonly message: string }) {
    super(`[ArborTest][workflow=${params.workflowId}] ${params.message}`)
    this.name = 'RenderExpectationError'
    this.kind = params.kind
    this.workflowId = params.workflowId
  }

  toJSON(): Record<string, unknown> {
    return {
      _tag: this._tag,
      name: this.name,
      kind: this.kind,
      message: this.message,
      workflowId: this.workflowId,
    }
  }
}

export const describeValue = (value: unknown): string => {
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}

import type { Fiber, Runtime } from 'effect'
import type { Event } from './DebugSink.js'
import type { WorkflowRuntimeError } from './errors.js'

export type StaleReason = 'event::stale_node' | 'event::stale_side_effect'

/**
 * A unit of work waiting in the host queue. `staleReason` is checked right
 * before `apply`, since an earlier event may have torn the target down.
 */
export interface PendingEvent {
  readonly workflowId: string
  readonly sessionId?: number
  readonly label: string
  readonly forceRender: boolean
  readonly staleReason: () => StaleReason | undefined
  readonly apply: () => void
}

/**
 * What a node needs from the host it lives in.
 */
export interface HostContext {
  readonly runtime: Runtime.Runtime<never>
  readonly record: (event: Event) => void
  readonly nextSessionId: () => number
  readonly enqueue: (event: PendingEvent) => void
  readonly markStateChanged: () => void
  readonly fatal: (error: WorkflowRuntimeError, sessionId?: number) => never
  readonly trackFiber: (fiber: Fiber.RuntimeFiber<void, never>) => void
}

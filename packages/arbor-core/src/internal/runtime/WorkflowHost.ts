import { Cause, Effect, Exit, Fiber, Option, Runtime, Stream } from 'effect'
import type { Workflow } from '../workflow.js'
import { enrich, recordTo, type Event, type Sink as DebugSink } from './core/DebugSink.js'
import { isDevEnv } from './core/env.js'
import {
  isWorkflowRuntimeError,
  ReentrantEventError,
  SinkSentDuringRenderError,
  type WorkflowRuntimeError,
} from './core/errors.js'
import type { HostContext, PendingEvent } from './core/HostContext.js'
import type { HierarchySnapshot, HostDebugger, UpdateInfo } from './core/snapshot.js'
import { WorkflowNode } from './core/WorkflowNode.js'

export interface Host<P, O, R> {
  /** Latest published rendering. */
  readonly getRendering: () => R
  /** Called synchronously after each published rendering. */
  readonly subscribe: (listener: () => void) => () => void
  /** Called once per root output, after the rendering of the same event. */
  readonly onOutput: (listener: (output: O) => void) => () => void
  readonly renderings: Stream.Stream<R>
  readonly outputs: Stream.Stream<O>
  /** Queues new root props; the root migrates its state and the tree re-renders. */
  readonly update: (props: P) => void
  readonly snapshot: () => HierarchySnapshot
  readonly renderCount: () => number
  readonly dispose: () => void
  readonly isDisposed: () => boolean
}

export interface WorkflowHostParams<P, S, O, R> {
  readonly workflow: Workflow<P, S, O, R>
  readonly props: P
  readonly runtime: Runtime.Runtime<never>
  readonly sinks: ReadonlyArray<DebugSink>
  readonly label: string | undefined
  readonly renderOnlyIfStateChanged: boolean
  readonly debugger: HostDebugger | undefined
}

export interface WorkflowHostHandle<P, O, R> {
  readonly host: Host<P, O, R>
  /** Disposes the host and returns the side-effect fibers that are still winding down. */
  readonly shutdown: () => ReadonlyArray<Fiber.RuntimeFiber<void, never>>
}

type Phase = 'idle' | 'applying' | 'rendering'

export const makeWorkflowHost = <P, S, O, R>(params: WorkflowHostParams<P, S, O, R>): WorkflowHostHandle<P, O, R> => {
  const { runtime, sinks, label } = params
  const runSyncExit = Runtime.runSyncExit(runtime)

  const record = (event: Event): void => {
    const exit = runSyncExit(recordTo(sinks, enrich(event, label)))
    if (Exit.isFailure(exit)) {
      Runtime.runSync(runtime)(
        Effect.logWarning(`[Arbor] debug sink failed to record ${event.type}`).pipe(
          Effect.annotateLogs({ 'arbor.event': event.type, 'arbor.cause': Cause.pretty(exit.cause) }),
        ),
      )
    }
  }

  let phase: Phase = 'idle'
  let draining = false
  let disposed = false
  let stateChanged = false
  let rootOutput: Option.Option<O> = Option.none()
  let updateInfo: UpdateInfo | undefined
  let renderCount = 0
  let sessionIds = 0
  const queue: Array<PendingEvent> = []
  const fibers = new Set<Fiber.RuntimeFiber<void, never>>()
  const renderListeners = new Set<() => void>()
  const outputListeners = new Set<(output: O) => void>()

  const fatal = (error: WorkflowRuntimeError, sessionId?: number): never => {
    record({
      type: 'diagnostic',
      code: error.code,
      severity: 'error',
      message: error.message,
      hint: error.hint,
      workflowId: error.workflowId,
      sessionId,
    })
    throw error
  }

  const processEvent = (event: PendingEvent): void => {
    if (disposed) {
      record({
        type: 'diagnostic',
        code: 'event::host_disposed',
        severity: 'info',
        message: `${event.label} arrived after the host was disposed and was discarded`,
        workflowId: event.workflowId,
        sessionId: event.sessionId,
      })
      return
    }
    const stale = event.staleReason()
    if (stale !== undefined) {
      if (!isDevEnv()) {
        return
      }
      record({
        type: 'diagnostic',
        code: stale,
        severity: 'info',
        message:
          stale === 'event::stale_node'
            ? `${event.label} arrived after its node was torn down and was discarded`
            : `${event.label} arrived after its side effect was cancelled and was discarded`,
        workflowId: event.workflowId,
        sessionId: event.sessionId,
      })
      return
    }
    // Unreachable while every delivery goes through `enqueue`, which queues
    // anything that arrives during a drain.
    if (phase !== 'idle') {
      fatal(new ReentrantEventError({ workflowId: event.workflowId }), event.sessionId)
    }

    stateChanged = false
    rootOutput = Option.none()
    updateInfo = undefined
    phase = 'applying'
    try {
      event.apply()
    } finally {
      phase = 'idle'
    }
    commit(event.forceRender)
  }

  const recordFailure = (workflowId: string, sessionId: number | undefined, error: unknown): void => {
    record({ type: 'lifecycle:error', workflowId, sessionId, cause: Cause.die(error) })
  }

  // Usage errors abort the drain and reach the caller; anything else thrown
  // while handling one event is recorded against that event.
  const guarded = (workflowId: string, sessionId: number | undefined, run: () => void): void => {
    try {
      run()
    } catch (error) {
      if (isWorkflowRuntimeError(error)) {
        throw error
      }
      recordFailure(workflowId, sessionId, error)
    }
  }

  const dropQueued = (): void => {
    for (const event of queue.splice(0)) {
      record({
        type: 'diagnostic',
        code: 'event::dropped',
        severity: 'warning',
        message: `${event.label} was discarded because an earlier event failed with a usage error`,
        workflowId: event.workflowId,
        sessionId: event.sessionId,
      })
    }
  }

  const drain = (first: () => void): void => {
    draining = true
    try {
      first()
      let next = queue.shift()
      while (next !== undefined) {
        const event = next
        guarded(event.workflowId, event.sessionId, () => processEvent(event))
        next = queue.shift()
      }
    } catch (error) {
      dropQueued()
      throw error
    } finally {
      draining = false
    }
  }

  const enqueue = (event: PendingEvent): void => {
    if (phase === 'rendering') {
      fatal(new SinkSentDuringRenderError({ workflowId: event.workflowId }), event.sessionId)
    }
    if (draining) {
      queue.push(event)
      return
    }
    drain(() => guarded(event.workflowId, event.sessionId, () => processEvent(event)))
  }

  const context: HostContext = {
    runtime,
    record,
    nextSessionId: () => ++sessionIds,
    enqueue,
    markStateChanged: () => {
      stateChanged = true
    },
    fatal,
    trackFiber: (fiber) => {
      fibers.add(fiber)
      fiber.addObserver(() => {
        fibers.delete(fiber)
      })
    },
  }

  const root = new WorkflowNode(params.workflow, params.props, {
    host: context,
    key: '',
    onOutput: (result) => {
      rootOutput = result.output
      updateInfo = result.info
    },
  })

  let rendering: R

  const renderRoot = (): void => {
    phase = 'rendering'
    try {
      rendering = root.render()
    } finally {
      phase = 'idle'
    }
    renderCount++
    record({ type: 'host:render', renderCount })
    root.enableEvents()
  }

  const commit = (forceRender: boolean): void => {
    if (forceRender || !params.renderOnlyIfStateChanged || stateChanged) {
      renderRoot()
      for (const listener of Array.from(renderListeners)) {
        guarded(params.workflow.id, root.sessionId, listener)
      }
    }

    const output = rootOutput
    rootOutput = Option.none()
    if (Option.isSome(output)) {
      record({ type: 'host:output', output: output.value })
      for (const listener of Array.from(outputListeners)) {
        guarded(params.workflow.id, root.sessionId, () => listener(output.value))
      }
    }

    if (params.debugger !== undefined && updateInfo !== undefined) {
      params.debugger.didUpdate(root.snapshot(), updateInfo)
    }
  }

  // The initial pass runs under the drain guard so side effects that deliver
  // synchronously on start are queued behind it.
  drain(() => {
    renderRoot()
    params.debugger?.didEnterInitialState(root.snapshot())
  })

  const subscribe = (listener: () => void): (() => void) => {
    renderListeners.add(listener)
    return () => {
      renderListeners.delete(listener)
    }
  }

  const onOutput = (listener: (output: O) => void): (() => void) => {
    outputListeners.add(listener)
    return () => {
      outputListeners.delete(listener)
    }
  }

  const dispose = (): void => {
    if (disposed) {
      return
    }
    disposed = true
    queue.length = 0
    root.tearDown()
  }

  const host: Host<P, O, R> = {
    getRendering: () => rendering,
    subscribe,
    onOutput,
    renderings: Stream.asyncPush<R>((emit) =>
      Effect.acquireRelease(
        Effect.sync(() => {
          emit.single(rendering)
          return subscribe(() => {
            emit.single(rendering)
          })
        }),
        (unsubscribe) => Effect.sync(unsubscribe),
      ),
    ),
    outputs: Stream.asyncPush<O>((emit) =>
      Effect.acquireRelease(
        Effect.sync(() =>
          onOutput((output) => {
            emit.single(output)
          }),
        ),
        (unsubscribe) => Effect.sync(unsubscribe),
      ),
    ),
    update: (props) =>
      enqueue({
        workflowId: params.workflow.id,
        sessionId: root.sessionId,
        label: 'update',
        forceRender: true,
        staleReason: () => undefined,
        apply: () => {
          root.update(props)
          updateInfo = { workflowId: params.workflow.id, sessionId: root.sessionId, kind: { _tag: 'propsDidChange' } }
        },
      }),
    snapshot: () => root.snapshot(),
    renderCount: () => renderCount,
    dispose,
    isDisposed: () => disposed,
  }

  return {
    host,
    shutdown: () => {
      dispose()
      return Array.from(fibers)
    },
  }
}

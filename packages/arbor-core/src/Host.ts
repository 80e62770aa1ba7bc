import { Effect, FiberRef, Fiber, Option, Runtime, type Scope } from 'effect'
import { currentDebugSinks, currentRuntimeLabel, type Sink as DebugSink } from './internal/runtime/core/DebugSink.js'
import { RuntimeConfigTag } from './internal/runtime/core/env.js'
import type { HostDebugger } from './internal/runtime/core/snapshot.js'
import { makeWorkflowHost, type Host } from './internal/runtime/WorkflowHost.js'
import type { Workflow } from './internal/workflow.js'

export type { Host } from './internal/runtime/WorkflowHost.js'

export interface HostOptions {
  /** Stamped on every debug event of this host. */
  readonly label?: string
  /** Extra debug sinks, next to the ones installed on the fiber. */
  readonly observers?: ReadonlyArray<DebugSink>
  readonly debugger?: HostDebugger
  /** Overrides RuntimeConfig.renderOnlyIfStateChanged. */
  readonly renderOnlyIfStateChanged?: boolean
}

export interface UnsafeHostOptions extends HostOptions {
  /** Runtime the side effects are forked on. Defaults to `Runtime.defaultRuntime`. */
  readonly runtime?: Runtime.Runtime<never>
}

/**
 * Starts a host in the current scope: the initial render runs immediately and
 * its side effects start. Closing the scope disposes the tree and waits for
 * every side effect to finish its interruption.
 *
 * Side effects run on the runtime of the calling fiber, so they see its
 * services (TestClock included) and its debug sinks.
 */
export const make = <P, S, O, R>(
  workflow: Workflow<P, S, O, R>,
  props: P,
  options: HostOptions = {},
): Effect.Effect<Host<P, O, R>, never, Scope.Scope> =>
  Effect.gen(function* () {
    const runtime = yield* Effect.runtime<never>()
    const sinks = yield* FiberRef.get(currentDebugSinks)
    const fiberLabel = yield* FiberRef.get(currentRuntimeLabel)
    const config = Option.getOrUndefined(yield* Effect.serviceOption(RuntimeConfigTag))

    const handle = yield* Effect.acquireRelease(
      Effect.sync(() =>
        makeWorkflowHost({
          workflow,
          props,
          runtime,
          sinks: [...sinks, ...(options.observers ?? [])],
          label: options.label ?? config?.label ?? fiberLabel,
          renderOnlyIfStateChanged: options.renderOnlyIfStateChanged ?? config?.renderOnlyIfStateChanged ?? false,
          debugger: options.debugger,
        }),
      ),
      (handle) => Effect.suspend(() => Fiber.interruptAll(handle.shutdown())),
    )
    return handle.host
  })

/**
 * Starts a host outside of Effect. Call `dispose` to tear it down; side
 * effects are interrupted without being awaited.
 */
export const unsafeMake = <P, S, O, R>(
  workflow: Workflow<P, S, O, R>,
  props: P,
  options: UnsafeHostOptions = {},
): Host<P, O, R> =>
  makeWorkflowHost({
    workflow,
    props,
    runtime: options.runtime ?? Runtime.defaultRuntime,
    sinks: options.observers ?? [],
    label: options.label,
    renderOnlyIfStateChanged: options.renderOnlyIfStateChanged ?? false,
    debugger: options.debugger,
  }).host

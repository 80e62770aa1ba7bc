import { Cause, Effect, Equal, Fiber, Runtime } from 'effect'
import { makeSink, type SideEffectWork, type Sink } from '../../workflow.js'
import type { SideEffectStopReason } from './DebugSink.js'
import { DuplicateSideEffectKeyError } from './errors.js'
import type { HostContext } from './HostContext.js'

export interface LifetimeHandle {
  readonly key: string
  readonly isEnded: () => boolean
}

export interface SideEffectOwner<A> {
  readonly host: HostContext
  readonly workflowId: string
  readonly sessionId: number
  readonly deliver: (action: A, lifetime: LifetimeHandle) => void
}

interface Lifetime<A> {
  readonly key: string
  readonly params: unknown
  readonly run: (sink: Sink<A>) => Effect.Effect<void>
  ended: boolean
  fiber: Fiber.RuntimeFiber<void, never> | undefined
}

/**
 * Keyed side effects of one node.
 *
 * A render pass collects registrations into a fresh table; `commitPass` then
 * swaps it in, cancelling every running lifetime that was dropped or replaced.
 * New lifetimes wait in `pending` until the host enables events after the
 * whole root pass, so no side effect can deliver while a render is running.
 */
export class SideEffectRegistry<A> {
  private running = new Map<string, Lifetime<A>>()
  private pass: Map<string, Lifetime<A>> | undefined
  private pending: Array<Lifetime<A>> = []

  constructor(private readonly owner: SideEffectOwner<A>) {}

  get size(): number {
    return this.running.size
  }

  keys(): ReadonlyArray<string> {
    return Array.from(this.running.keys())
  }

  beginPass(): void {
    this.pass = new Map()
  }

  register<E>(key: string, work: SideEffectWork<A, E>, params: unknown): void {
    const pass = this.pass
    if (pass === undefined) {
      throw new Error(`[Arbor] side effect "${key}" registered outside of a render pass`)
    }
    if (pass.has(key)) {
      this.owner.host.fatal(
        new DuplicateSideEffectKeyError({ workflowId: this.owner.workflowId, key }),
        this.owner.sessionId,
      )
    }

    const existing = this.running.get(key)
    if (existing !== undefined && !existing.ended && Equal.equals(existing.params, params)) {
      pass.set(key, existing)
      return
    }

    pass.set(key, {
      key,
      params,
      run: (sink) =>
        work(sink).pipe(
          Effect.catchAllCause((cause) =>
            Cause.isInterruptedOnly(cause)
              ? Effect.void
              : Effect.sync(() =>
                  this.owner.host.record({
                    type: 'lifecycle:error',
                    sessionId: this.owner.sessionId,
                    workflowId: this.owner.workflowId,
                    key,
                    cause,
                  }),
                ),
          ),
        ),
      ended: false,
      fiber: undefined,
    })
  }

  commitPass(): void {
    const pass = this.pass
    if (pass === undefined) {
      return
    }
    this.pass = undefined

    for (const [key, lifetime] of this.running) {
      if (pass.get(key) !== lifetime) {
        this.end(lifetime, pass.has(key) ? 'replaced' : 'removed')
      }
    }
    for (const [key, lifetime] of pass) {
      if (this.running.get(key) !== lifetime) {
        this.pending.push(lifetime)
      }
    }
    this.running = pass
  }

  /**
   * Drops the registrations of a pass whose render threw. What was running
   * before the pass keeps running.
   */
  abortPass(): void {
    this.pass = undefined
  }

  startPending(): void {
    const pending = this.pending
    this.pending = []
    for (const lifetime of pending) {
      this.start(lifetime)
    }
  }

  tearDown(): void {
    this.pass = undefined
    this.pending = []
    for (const lifetime of this.running.values()) {
      this.end(lifetime, 'teardown')
    }
    this.running = new Map()
  }

  private start(lifetime: Lifetime<A>): void {
    if (lifetime.ended) {
      return
    }
    const { host, workflowId, sessionId } = this.owner
    const handle: LifetimeHandle = { key: lifetime.key, isEnded: () => lifetime.ended }
    const sink = makeSink<A>((action) => this.owner.deliver(action, handle))

    host.record({ type: 'sideEffect:start', sessionId, workflowId, key: lifetime.key })
    const fiber = Runtime.runFork(host.runtime)(lifetime.run(sink))
    lifetime.fiber = fiber
    host.trackFiber(fiber)
  }

  private end(lifetime: Lifetime<A>, reason: SideEffectStopReason): void {
    if (lifetime.ended) {
      return
    }
    lifetime.ended = true
    const fiber = lifetime.fiber
    if (fiber === undefined) {
      return
    }
    this.owner.host.record({
      type: 'sideEffect:stop',
      sessionId: this.owner.sessionId,
      workflowId: this.owner.workflowId,
      key: lifetime.key,
      reason,
    })
    // The sink is already closed; interruption (and the work's finalizers) completes on its own.
    Runtime.runFork(this.owner.host.runtime)(Fiber.interrupt(fiber))
  }
}

import { Option } from 'effect'
import { makeSink, type Action, type Sink, type Workflow } from '../../workflow.js'
import type { HostContext } from './HostContext.js'
import type { LifetimeHandle } from './SideEffectRegistry.js'
import type { HierarchySnapshot, UpdateInfo, UpdateSource } from './snapshot.js'
import { SubtreeManager } from './SubtreeManager.js'

export interface NodeOutput<O> {
  readonly output: Option.Option<O>
  readonly info: UpdateInfo
}

export interface WorkflowNodeOptions<O> {
  readonly host: HostContext
  readonly key: string
  readonly parentSessionId?: number
  readonly onOutput: (result: NodeOutput<O>) => void
}

/**
 * The live instance of a workflow: its props, its state, and the subtree it
 * reconciles on every render. State changes only inside `handle`.
 */
export class WorkflowNode<P, S, O, R> {
  readonly sessionId: number
  readonly key: string
  readonly sink: Sink<Action<P, S, O>>
  private props: P
  private state: S
  private tornDown = false
  private readonly host: HostContext
  private readonly onOutput: (result: NodeOutput<O>) => void
  private readonly subtree: SubtreeManager<P, S, O>

  constructor(
    readonly workflow: Workflow<P, S, O, R>,
    props: P,
    options: WorkflowNodeOptions<O>,
  ) {
    this.host = options.host
    this.key = options.key
    this.onOutput = options.onOutput
    this.sessionId = options.host.nextSessionId()
    this.props = props

    this.host.record({
      type: 'session:begin',
      sessionId: this.sessionId,
      workflowId: workflow.id,
      key: this.key,
      parentSessionId: options.parentSessionId,
    })

    this.state = workflow.initialState(props)
    this.host.record({
      type: 'workflow:initialState',
      sessionId: this.sessionId,
      workflowId: workflow.id,
      state: this.state,
    })

    this.sink = makeSink((action: Action<P, S, O>) => this.deliver(action, { _tag: 'external' }, undefined))
    this.subtree = new SubtreeManager<P, S, O>({
      host: this.host,
      workflowId: workflow.id,
      sessionId: this.sessionId,
      sink: this.sink,
      handle: (action, source) => this.handle(action, source),
      bubble: (info) => this.onOutput({ output: Option.none(), info }),
      deliverFromSideEffect: (action, lifetime) =>
        this.deliver(action, { _tag: 'sideEffect', key: lifetime.key }, lifetime),
    })
  }

  get currentState(): S {
    return this.state
  }

  get currentProps(): P {
    return this.props
  }

  isTornDown(): boolean {
    return this.tornDown
  }

  render(): R {
    const rendering = this.subtree.render((context) => this.workflow.render(this.props, this.state, context))
    this.host.record({
      type: 'workflow:render',
      sessionId: this.sessionId,
      workflowId: this.workflow.id,
      state: this.state,
      childCount: this.subtree.childCount(),
      sideEffectCount: this.subtree.sideEffectCount(),
    })
    return rendering
  }

  /**
   * New props from the parent (or the host). The workflow migrates its state
   * through `didChange`; the state is carried over, never recreated.
   */
  update(props: P): void {
    const previousProps = this.props
    const previousState = this.state
    this.props = props
    this.state = this.workflow.didChange(previousProps, props, previousState)
    if (!this.workflow.stateEquivalence(previousState, this.state)) {
      this.host.markStateChanged()
    }
    this.host.record({
      type: 'workflow:didChange',
      sessionId: this.sessionId,
      workflowId: this.workflow.id,
      previousProps,
      props,
      state: this.state,
    })
  }

  handle(action: Action<P, S, O>, source: UpdateSource): void {
    if (source._tag !== 'subtree') {
      this.host.record({
        type: 'action:receive',
        sessionId: this.sessionId,
        workflowId: this.workflow.id,
        action: action._tag,
        source: source._tag,
      })
    }

    const previous = this.state
    const result = action.apply(previous, { props: this.props })
    const stateChanged = !this.workflow.stateEquivalence(previous, result.state)
    this.state = result.state
    if (stateChanged) {
      this.host.markStateChanged()
    }

    this.host.record({
      type: 'action:apply',
      sessionId: this.sessionId,
      workflowId: this.workflow.id,
      action: action._tag,
      state: this.state,
      stateChanged,
      hasOutput: Option.isSome(result.output),
    })

    this.onOutput({
      output: result.output,
      info: {
        workflowId: this.workflow.id,
        sessionId: this.sessionId,
        kind: { _tag: 'didUpdate', action: action._tag, source },
      },
    })
  }

  enableEvents(): void {
    if (this.tornDown) {
      return
    }
    this.subtree.enableEvents()
  }

  /**
   * Cancels this node's side effects, then tears its children down. Idempotent.
   */
  tearDown(): void {
    if (this.tornDown) {
      return
    }
    this.tornDown = true
    this.subtree.tearDown()
    this.host.record({
      type: 'session:end',
      sessionId: this.sessionId,
      workflowId: this.workflow.id,
      key: this.key,
    })
  }

  snapshot(): HierarchySnapshot {
    return {
      workflowId: this.workflow.id,
      sessionId: this.sessionId,
      key: this.key,
      state: this.state,
      sideEffects: this.subtree.sideEffectKeys(),
      children: this.subtree.snapshotChildren(),
    }
  }

  private deliver(action: Action<P, S, O>, source: UpdateSource, lifetime: LifetimeHandle | undefined): void {
    this.host.enqueue({
      workflowId: this.workflow.id,
      sessionId: this.sessionId,
      label: action._tag,
      forceRender: false,
      staleReason: () =>
        this.tornDown ? 'event::stale_node' : lifetime?.isEnded() ? 'event::stale_side_effect' : undefined,
      apply: () => this.handle(action, source),
    })
  }
}

import { Option } from 'effect'
import type { Action, RenderChildOptions, RenderContext, Sink, Workflow } from '../../workflow.js'
import { DuplicateChildKeyError } from './errors.js'
import type { HostContext } from './HostContext.js'
import { makeRenderContext } from './RenderContext.js'
import { SideEffectRegistry, type LifetimeHandle } from './SideEffectRegistry.js'
import type { HierarchySnapshot, UpdateInfo, UpdateSource } from './snapshot.js'
import { WorkflowNode, type NodeOutput } from './WorkflowNode.js'

export interface SubtreeOwner<P, S, O> {
  readonly host: HostContext
  readonly workflowId: string
  readonly sessionId: number
  readonly sink: Sink<Action<P, S, O>>
  readonly handle: (action: Action<P, S, O>, source: UpdateSource) => void
  readonly bubble: (info: UpdateInfo) => void
  readonly deliverFromSideEffect: (action: Action<P, S, O>, lifetime: LifetimeHandle) => void
}

interface ChildNode {
  readonly isTornDown: () => boolean
  readonly enableEvents: () => void
  readonly tearDown: () => void
  readonly snapshot: () => HierarchySnapshot
}

/**
 * A child with its types erased, so children of any workflow can share one table.
 */
interface ChildSlot {
  readonly workflow: unknown
  readonly key: string
  readonly node: ChildNode
}

interface TypedChildSlot<P, S, O, CP, CS, CO, CR> extends ChildSlot {
  readonly workflow: Workflow<CP, CS, CO, CR>
  readonly node: WorkflowNode<CP, CS, CO, CR>
  onOutput: ((output: CO) => Action<P, S, O>) | undefined
}

// Slots are only ever created by `createChild` for the exact workflow object they
// hold, so an identity match recovers the types the slot was created with.
const isChildOf = <P, S, O, CP, CS, CO, CR>(
  slot: ChildSlot,
  workflow: Workflow<CP, CS, CO, CR>,
): slot is TypedChildSlot<P, S, O, CP, CS, CO, CR> => slot.workflow === workflow

class ChildTable {
  private readonly byWorkflow = new Map<unknown, Map<string, ChildSlot>>()

  get(workflow: unknown, key: string): ChildSlot | undefined {
    return this.byWorkflow.get(workflow)?.get(key)
  }

  set(slot: ChildSlot): void {
    const byKey = this.byWorkflow.get(slot.workflow)
    if (byKey === undefined) {
      this.byWorkflow.set(slot.workflow, new Map([[slot.key, slot]]))
      return
    }
    byKey.set(slot.key, slot)
  }

  has(slot: ChildSlot): boolean {
    return this.get(slot.workflow, slot.key) === slot
  }

  *values(): IterableIterator<ChildSlot> {
    for (const byKey of this.byWorkflow.values()) {
      yield* byKey.values()
    }
  }
}

/**
 * Children and side effects of one node, reconciled once per render pass.
 */
export class SubtreeManager<P, S, O> {
  private children = new ChildTable()
  private readonly sideEffects: SideEffectRegistry<Action<P, S, O>>

  constructor(private readonly owner: SubtreeOwner<P, S, O>) {
    this.sideEffects = new SideEffectRegistry({
      host: owner.host,
      workflowId: owner.workflowId,
      sessionId: owner.sessionId,
      deliver: owner.deliverFromSideEffect,
    })
  }

  /**
   * Runs one pass. Children rendered through the context are reused or
   * created; whatever the previous pass had and this one did not is torn down
   * once `render` returns. If `render` throws, the pass is abandoned: children
   * it created are torn down and the previous children and side effects stay.
   */
  render<R>(render: (context: RenderContext<P, S, O>) => R): R {
    const previous = this.children
    const used = new ChildTable()
    const created: Array<ChildSlot> = []

    this.sideEffects.beginPass()
    const handle = makeRenderContext<P, S, O>({
      host: this.owner.host,
      workflowId: this.owner.workflowId,
      sessionId: this.owner.sessionId,
      sink: this.owner.sink,
      renderChild: (workflow, props, options) => this.renderChild(previous, used, created, workflow, props, options),
      runSideEffect: (key, work, params) => this.sideEffects.register(key, work, params),
    })

    let rendering: R
    try {
      rendering = render(handle.context)
    } catch (error) {
      handle.invalidate()
      for (const slot of created) {
        slot.node.tearDown()
      }
      this.sideEffects.abortPass()
      throw error
    }
    handle.invalidate()

    for (const slot of previous.values()) {
      if (!used.has(slot)) {
        slot.node.tearDown()
      }
    }
    this.children = used
    this.sideEffects.commitPass()

    return rendering
  }

  enableEvents(): void {
    this.sideEffects.startPending()
    for (const slot of this.children.values()) {
      slot.node.enableEvents()
    }
  }

  tearDown(): void {
    this.sideEffects.tearDown()
    for (const slot of this.children.values()) {
      slot.node.tearDown()
    }
    this.children = new ChildTable()
  }

  childCount(): number {
    let count = 0
    for (const _ of this.children.values()) {
      count++
    }
    return count
  }

  sideEffectCount(): number {
    return this.sideEffects.size
  }

  snapshotChildren(): ReadonlyArray<HierarchySnapshot> {
    return Array.from(this.children.values(), (slot) => slot.node.snapshot())
  }

  sideEffectKeys(): ReadonlyArray<string> {
    return this.sideEffects.keys()
  }

  private renderChild<CP, CS, CO, CR>(
    previous: ChildTable,
    used: ChildTable,
    created: Array<ChildSlot>,
    workflow: Workflow<CP, CS, CO, CR>,
    props: CP,
    options: RenderChildOptions<CO, P, S, O> | undefined,
  ): CR {
    const key = options?.key ?? ''
    if (used.get(workflow, key) !== undefined) {
      this.owner.host.fatal(
        new DuplicateChildKeyError({ workflowId: this.owner.workflowId, childId: workflow.id, key }),
        this.owner.sessionId,
      )
    }

    const existing = previous.get(workflow, key)
    if (existing !== undefined && isChildOf<P, S, O, CP, CS, CO, CR>(existing, workflow)) {
      existing.onOutput = options?.onOutput
      used.set(existing)
      existing.node.update(props)
      return existing.node.render()
    }

    const slot = this.createChild(workflow, props, key, options?.onOutput)
    created.push(slot)
    used.set(slot)
    return slot.node.render()
  }

  private createChild<CP, CS, CO, CR>(
    workflow: Workflow<CP, CS, CO, CR>,
    props: CP,
    key: string,
    onOutput: ((output: CO) => Action<P, S, O>) | undefined,
  ): TypedChildSlot<P, S, O, CP, CS, CO, CR> {
    const slot: TypedChildSlot<P, S, O, CP, CS, CO, CR> = {
      workflow,
      key,
      onOutput,
      node: new WorkflowNode(workflow, props, {
        host: this.owner.host,
        key,
        parentSessionId: this.owner.sessionId,
        onOutput: (result) => this.handleChildOutput(slot, result),
      }),
    }
    return slot
  }

  /**
   * A child output becomes a parent action in the same step; anything else
   * bubbles up so the root still sees that the tree changed.
   */
  private handleChildOutput<CO>(
    slot: { readonly onOutput: ((output: CO) => Action<P, S, O>) | undefined },
    result: NodeOutput<CO>,
  ): void {
    const map = slot.onOutput
    if (Option.isSome(result.output) && map !== undefined) {
      this.owner.handle(map(result.output.value), { _tag: 'subtree', child: result.info })
      return
    }
    this.owner.bubble({
      workflowId: this.owner.workflowId,
      sessionId: this.owner.sessionId,
      kind: { _tag: 'childDidUpdate', child: result.info },
    })
  }
}

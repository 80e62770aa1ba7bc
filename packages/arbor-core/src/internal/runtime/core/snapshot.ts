/**
 * A read-only picture of a live tree, taken for debuggers.
 */
export interface HierarchySnapshot {
  readonly workflowId: string
  readonly sessionId: number
  readonly key: string
  readonly state: unknown
  readonly sideEffects: ReadonlyArray<string>
  readonly children: ReadonlyArray<HierarchySnapshot>
}

export type UpdateSource =
  | { readonly _tag: 'external' }
  | { readonly _tag: 'sideEffect'; readonly key: string }
  | { readonly _tag: 'subtree'; readonly child: UpdateInfo }

export type UpdateKind =
  | { readonly _tag: 'didUpdate'; readonly action: string; readonly source: UpdateSource }
  | { readonly _tag: 'childDidUpdate'; readonly child: UpdateInfo }
  | { readonly _tag: 'propsDidChange' }

/**
 * Why the tree was updated, starting at the root and nesting down to the node
 * that received the event.
 */
export interface UpdateInfo {
  readonly workflowId: string
  readonly sessionId: number
  readonly kind: UpdateKind
}

export interface HostDebugger {
  readonly didEnterInitialState: (snapshot: HierarchySnapshot) => void
  readonly didUpdate: (snapshot: HierarchySnapshot, info: UpdateInfo) => void
}

/**
 * Follows `subtree` and `childDidUpdate` links down to the node whose action
 * started the update.
 */
export const originOf = (info: UpdateInfo): UpdateInfo => {
  switch (info.kind._tag) {
    case 'childDidUpdate':
      return originOf(info.kind.child)
    case 'didUpdate':
      return info.kind.source._tag === 'subtree' ? originOf(info.kind.source.child) : info
    case 'propsDidChange':
      return info
  }
}

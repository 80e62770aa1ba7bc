import { Effect } from 'effect'
import * as Internal from './internal/runtime/core/DebugSink.js'
import type { HierarchySnapshot, HostDebugger, UpdateInfo } from './internal/runtime/core/snapshot.js'

// Public debug surface. The event model and the layers live in
// internal/runtime/core/DebugSink.ts; this module adds ready-made sinks.

export type Event = Internal.Event
export type EventType = Internal.EventType
export type ActionSource = Internal.ActionSource
export type SideEffectStopReason = Internal.SideEffectStopReason
export interface Sink extends Internal.Sink {}

export type { HierarchySnapshot, HostDebugger, UpdateInfo, UpdateKind, UpdateSource } from './internal/runtime/core/snapshot.js'
export { originOf } from './internal/runtime/core/snapshot.js'

export const noopLayer = Internal.noopLayer
export const errorOnlyLayer = Internal.errorOnlyLayer
export const consoleLayer = Internal.consoleLayer
export const defaultLayer = Internal.defaultLayer

/** Installs exactly these sinks for hosts made in the provided scope. */
export const layer = Internal.layer

/** Labels the debug events of every host made in the provided scope. */
export const runtimeLabel = Internal.runtimeLabelLayer

export const record = Internal.record

export interface RingBufferSink {
  readonly sink: Sink
  readonly getSnapshot: () => ReadonlyArray<Event>
  readonly clear: () => void
}

/**
 * Keeps the last `capacity` events in arrival order.
 */
export const makeRingBufferSink = (capacity = 1000): RingBufferSink => {
  const buffer: Array<Event> = []

  const sink: Sink = {
    record: (event: Event) =>
      Effect.sync(() => {
        if (capacity <= 0) {
          return
        }
        if (buffer.length >= capacity) {
          buffer.shift()
        }
        buffer.push(event)
      }),
  }

  return {
    sink,
    getSnapshot: () => buffer.slice(),
    clear: () => {
      buffer.length = 0
    },
  }
}

export interface SessionCounter {
  readonly sink: Sink
  /** Live sessions per `runtimeLabel::workflowId`. */
  readonly getSnapshot: () => ReadonlyMap<string, number>
}

/**
 * Counts live nodes per workflow from session:begin / session:end.
 */
export const makeSessionCounterSink = (): SessionCounter => {
  const counts = new Map<string, number>()

  const sink: Sink = {
    record: (event: Event) =>
      Effect.sync(() => {
        if (event.type !== 'session:begin' && event.type !== 'session:end') {
          return
        }
        const key = `${event.runtimeLabel ?? 'unknown'}::${event.workflowId}`
        const next = (counts.get(key) ?? 0) + (event.type === 'session:begin' ? 1 : -1)
        if (next <= 0) {
          counts.delete(key)
        } else {
          counts.set(key, next)
        }
      }),
  }

  return { sink, getSnapshot: () => new Map(counts) }
}

export interface RecordingDebugger extends HostDebugger {
  readonly initial: () => HierarchySnapshot | undefined
  readonly updates: () => ReadonlyArray<{ readonly snapshot: HierarchySnapshot; readonly info: UpdateInfo }>
}

/**
 * A host debugger that keeps everything it is told.
 */
export const makeRecordingDebugger = (): RecordingDebugger => {
  let initial: HierarchySnapshot | undefined
  const updates: Array<{ readonly snapshot: HierarchySnapshot; readonly info: UpdateInfo }> = []
  return {
    didEnterInitialState: (snapshot) => {
      initial = snapshot
    },
    didUpdate: (snapshot, info) => {
      updates.push({ snapshot, info })
    },
    initial: () => initial,
    updates: () => updates.slice(),
  }
}

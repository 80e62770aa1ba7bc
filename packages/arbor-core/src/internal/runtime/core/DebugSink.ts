import { Cause, Effect, FiberRef, Layer } from 'effect'

export type ActionSource = 'external' | 'sideEffect'

export type SideEffectStopReason = 'removed' | 'replaced' | 'teardown'

interface EventBase {
  readonly runtimeLabel?: string
  readonly timestamp?: number
}

interface SessionEventBase extends EventBase {
  readonly sessionId: number
  readonly workflowId: string
}

export type Event =
  | (SessionEventBase & {
      readonly type: 'session:begin'
      readonly key: string
      readonly parentSessionId?: number
    })
  | (SessionEventBase & {
      readonly type: 'session:end'
      readonly key: string
    })
  | (SessionEventBase & {
      readonly type: 'workflow:initialState'
      readonly state: unknown
    })
  | (SessionEventBase & {
      readonly type: 'workflow:render'
      readonly state: unknown
      readonly childCount: number
      readonly sideEffectCount: number
    })
  | (SessionEventBase & {
      readonly type: 'workflow:didChange'
      readonly previousProps: unknown
      readonly props: unknown
      readonly state: unknown
    })
  | (SessionEventBase & {
      readonly type: 'action:receive'
      readonly action: string
      readonly source: ActionSource
    })
  | (SessionEventBase & {
      readonly type: 'action:apply'
      readonly action: string
      readonly state: unknown
      readonly stateChanged: boolean
      readonly hasOutput: boolean
    })
  | (SessionEventBase & {
      readonly type: 'sideEffect:start'
      readonly key: string
    })
  | (SessionEventBase & {
      readonly type: 'sideEffect:stop'
      readonly key: string
      readonly reason: SideEffectStopReason
    })
  | (EventBase & {
      readonly type: 'host:render'
      readonly renderCount: number
    })
  | (EventBase & {
      readonly type: 'host:output'
      readonly output: unknown
    })
  | (EventBase & {
      readonly type: 'lifecycle:error'
      readonly sessionId?: number
      readonly workflowId?: string
      readonly key?: string
      readonly cause: unknown
    })
  | (EventBase & {
      readonly type: 'diagnostic'
      readonly sessionId?: number
      readonly workflowId?: string
      readonly code: string
      readonly severity: 'error' | 'warning' | 'info'
      readonly message: string
      readonly hint?: string
    })

export type EventType = Event['type']

export interface Sink {
  readonly record: (event: Event) => Effect.Effect<void>
}

export const currentDebugSinks = FiberRef.unsafeMake<ReadonlyArray<Sink>>([])
export const currentRuntimeLabel = FiberRef.unsafeMake<string | undefined>(undefined)

const prettyCause = (cause: unknown): string => {
  if (Cause.isCause(cause)) {
    return Cause.pretty(cause, { renderErrorCause: true })
  }
  if (cause instanceof Error) {
    return cause.stack ?? `${cause.name}: ${cause.message}`
  }
  try {
    return JSON.stringify(cause, null, 2)
  } catch {
    return String(cause)
  }
}

const lifecycleErrorLog = (event: Extract<Event, { readonly type: 'lifecycle:error' }>) => {
  const workflowId = event.workflowId ?? 'unknown'
  const causePretty = prettyCause(event.cause)
  const where = event.key !== undefined ? ` sideEffect=${event.key}` : ''
  const message = `[Arbor][workflow=${workflowId}]${where} lifecycle:error\n${causePretty}`

  return Effect.logError(message).pipe(
    Effect.annotateLogs({
      'arbor.workflowId': workflowId,
      'arbor.event': 'lifecycle:error',
      'arbor.cause': causePretty,
    }),
  )
}

const diagnosticLog = (event: Extract<Event, { readonly type: 'diagnostic' }>) => {
  const workflowId = event.workflowId ?? 'unknown'
  const header = `[Arbor][workflow=${workflowId}] diagnostic(${event.severity})`
  const detail = `code=${event.code} message=${event.message}${event.hint ? `\nhint: ${event.hint}` : ''}`
  const msg = `${header}\n${detail}`

  const base =
    event.severity === 'warning'
      ? Effect.logWarning(msg)
      : event.severity === 'info'
        ? Effect.logInfo(msg)
        : Effect.logError(msg)

  const annotations: Record<string, unknown> = {
    'arbor.workflowId': workflowId,
    'arbor.event': `diagnostic(${event.severity})`,
    'arbor.diagnostic.code': event.code,
    'arbor.diagnostic.message': event.message,
  }
  if (event.hint) {
    annotations['arbor.diagnostic.hint'] = event.hint
  }

  return base.pipe(Effect.annotateLogs(annotations))
}

export const noopLayer = Layer.locallyScoped(currentDebugSinks, [])

/**
 * Minimal observation: only lifecycle:error and warning/error diagnostics
 * reach the logger. This is also what a host does when no sink is installed.
 */
export const errorOnlySink: Sink = {
  record: (event: Event) =>
    event.type === 'lifecycle:error'
      ? lifecycleErrorLog(event)
      : event.type === 'diagnostic' && event.severity !== 'info'
        ? diagnosticLog(event)
        : Effect.void,
}

export const errorOnlyLayer = Layer.locallyScoped(currentDebugSinks, [errorOnlySink])

/**
 * Logs every event through the Effect logger; other events go out at debug level.
 */
const consoleSink: Sink = {
  record: (event: Event) =>
    event.type === 'lifecycle:error'
      ? lifecycleErrorLog(event)
      : event.type === 'diagnostic'
        ? diagnosticLog(event)
        : Effect.logDebug({ debugEvent: event }).pipe(Effect.annotateLogs({ 'arbor.event': event.type })),
}

export const consoleLayer = Layer.locallyScoped(currentDebugSinks, [consoleSink])

export const defaultLayer = errorOnlyLayer

export const layer = (sinks: ReadonlyArray<Sink>) => Layer.locallyScoped(currentDebugSinks, sinks)

export const runtimeLabelLayer = (label: string) => Layer.locallyScoped(currentRuntimeLabel, label)

/**
 * Fills in timestamp and runtimeLabel when the event does not carry them.
 */
export const enrich = (event: Event, runtimeLabel: string | undefined): Event => {
  const timestamp = event.timestamp ?? Date.now()
  const label = event.runtimeLabel ?? runtimeLabel
  return label === undefined ? { ...event, timestamp } : { ...event, timestamp, runtimeLabel: label }
}

/**
 * Sends one event to the given sinks. With no sink installed only the
 * error-only behaviour applies, so fatal events are never silently dropped.
 */
export const recordTo = (sinks: ReadonlyArray<Sink>, event: Event): Effect.Effect<void> =>
  sinks.length === 0
    ? errorOnlySink.record(event)
    : Effect.forEach(sinks, (sink) => sink.record(event), { discard: true })

/**
 * Records to the sinks on the current fiber.
 */
export const record = (event: Event) =>
  Effect.gen(function* () {
    const sinks = yield* FiberRef.get(currentDebugSinks)
    const runtimeLabel = yield* FiberRef.get(currentRuntimeLabel)
    yield* recordTo(sinks, enrich(event, runtimeLabel))
  })

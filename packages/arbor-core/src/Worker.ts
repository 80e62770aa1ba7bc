import { Duration, Effect, Equal, Hash, Predicate, Stream } from 'effect'
import { WorkerTypeId, type Worker } from './internal/workflow.js'

export { WorkerTypeId } from './internal/workflow.js'
export type { Worker } from './internal/workflow.js'

export interface WorkerOptions {
  /**
   * What makes two runs of this worker "the same". Compared with `Equal.equals`,
   * so use primitives or `Data` values for structural comparison.
   */
  readonly params?: unknown
}

export interface CallbackEmitter<O> {
  readonly single: (output: O) => void
  readonly end: () => void
}

class WorkerImpl<O> implements Worker<O> {
  readonly [WorkerTypeId]: WorkerTypeId = WorkerTypeId

  constructor(
    readonly id: string,
    readonly params: unknown,
    readonly run: () => Stream.Stream<O>,
  ) {}

  [Equal.symbol](that: Equal.Equal): boolean {
    return isWorker(that) && that.id === this.id && Equal.equals(this.params, that.params)
  }

  [Hash.symbol](): number {
    return Hash.combine(Hash.hash(this.params))(Hash.string(this.id))
  }
}

export const isWorker = (u: unknown): u is Worker<unknown> => Predicate.hasProperty(u, WorkerTypeId)

export const make = <O>(id: string, run: () => Stream.Stream<O>, options: WorkerOptions = {}): Worker<O> =>
  new WorkerImpl(id, options.params, run)

export const fromStream = <O>(id: string, stream: Stream.Stream<O>, options: WorkerOptions = {}): Worker<O> =>
  make(id, () => stream, options)

/**
 * One output, when the effect succeeds. A failure is reported as a
 * lifecycle error; model expected failures in `O`.
 */
export const fromEffect = <O, E>(id: string, effect: Effect.Effect<O, E>, options: WorkerOptions = {}): Worker<O> =>
  make(id, () => Stream.fromEffect(effect).pipe(Stream.orDie), options)

/**
 * The signal aborts when the worker is cancelled.
 */
export const fromPromise = <O>(
  id: string,
  evaluate: (signal: AbortSignal) => PromiseLike<O>,
  options: WorkerOptions = {},
): Worker<O> => make(id, () => Stream.fromEffect(Effect.promise(evaluate)), options)

/**
 * Pulls a fresh iterator on every start; cancellation calls its `return`.
 */
export const fromAsyncIterable = <O>(
  id: string,
  iterable: () => AsyncIterable<O>,
  options: WorkerOptions = {},
): Worker<O> =>
  make(id, () => Stream.fromAsyncIterable(iterable(), (cause) => cause).pipe(Stream.orDie), options)

/**
 * Bridges a callback API. `register` returns its cleanup, which runs when the
 * worker is cancelled or after `end`.
 */
export const fromCallback = <O>(
  id: string,
  register: (emit: CallbackEmitter<O>) => () => void,
  options: WorkerOptions = {},
): Worker<O> =>
  make(
    id,
    () =>
      Stream.asyncPush<O>((emit) =>
        Effect.acquireRelease(
          Effect.sync(() =>
            register({
              single: (output) => {
                emit.single(output)
              },
              end: () => emit.end(),
            }),
          ),
          (cleanup) => Effect.sync(cleanup),
        ),
      ),
    options,
  )

/**
 * Emits once after `duration`. The duration is part of the params, so a
 * different delay restarts the timer.
 */
export const timer = (id: string, duration: Duration.DurationInput): Worker<void> => {
  const delay = Duration.decode(duration)
  return make(id, () => Stream.fromEffect(Effect.sleep(delay)), { params: delay })
}

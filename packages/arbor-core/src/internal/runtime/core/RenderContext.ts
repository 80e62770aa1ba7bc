import { Effect, Stream } from 'effect'
import * as Action from '../../../Action.js'
import type {
  MutationRecipe,
  RenderChildOptions,
  RenderContext,
  SideEffectWork,
  Sink,
  Workflow,
} from '../../workflow.js'
import { StaleRenderContextError } from './errors.js'
import type { HostContext } from './HostContext.js'

export interface RenderContextBackend<P, S, O> {
  readonly host: HostContext
  readonly workflowId: string
  readonly sessionId: number
  readonly sink: Sink<Action.Action<P, S, O>>
  readonly renderChild: <CP, CS, CO, CR>(
    workflow: Workflow<CP, CS, CO, CR>,
    props: CP,
    options: RenderChildOptions<CO, P, S, O> | undefined,
  ) => CR
  readonly runSideEffect: <E>(key: string, work: SideEffectWork<Action.Action<P, S, O>, E>, params: unknown) => void
}

export interface RenderContextHandle<P, S, O> {
  readonly context: RenderContext<P, S, O>
  readonly invalidate: () => void
}

export const workerKey = (workerId: string, key: string): string => `worker:${workerId}:${key}`

export const makeRenderContext = <P, S, O>(backend: RenderContextBackend<P, S, O>): RenderContextHandle<P, S, O> => {
  let valid = true

  const assertValid = (operation: string): void => {
    if (!valid) {
      backend.host.fatal(
        new StaleRenderContextError({ workflowId: backend.workflowId, operation }),
        backend.sessionId,
      )
    }
  }

  const runSideEffect = <E>(
    key: string,
    work: SideEffectWork<Action.Action<P, S, O>, E>,
    options?: { readonly params?: unknown },
  ): void => {
    assertValid('runSideEffect')
    backend.runSideEffect(key, work, options?.params)
  }

  const context: RenderContext<P, S, O> = {
    renderChild: (workflow, props, options) => {
      assertValid('renderChild')
      return backend.renderChild(workflow, props, options)
    },
    makeSink: () => {
      assertValid('makeSink')
      return backend.sink
    },
    makeMutationSink: () => {
      assertValid('makeMutationSink')
      return backend.sink.contramap((recipe: MutationRecipe<P, S>) =>
        Action.mutate<P, S, O>('mutation', (draft, mutateContext) => recipe(draft, mutateContext)),
      )
    },
    runSideEffect,
    runWorker: (worker, options) => {
      assertValid('runWorker')
      const onOutput = options.onOutput
      backend.runSideEffect(
        workerKey(worker.id, options.key ?? ''),
        (sink) => Stream.runForEach(worker.run(), (value) => Effect.sync(() => sink.send(onOutput(value)))),
        worker,
      )
    },
  }

  return {
    context,
    invalidate: () => {
      valid = false
    },
  }
}

import { Context, Layer } from 'effect'

// Read NODE_ENV at runtime so bundlers cannot inline it at build time.
export const getNodeEnv = (): string | undefined => {
  try {
    const env = globalThis.process?.env
    return typeof env?.NODE_ENV === 'string' ? env.NODE_ENV : undefined
  } catch {
    return undefined
  }
}

export const isDevEnv = (): boolean => getNodeEnv() !== 'production'

/**
 * Runtime-level defaults for every host built in an Effect environment.
 * Options passed to Host.make take precedence over these.
 */
export interface RuntimeConfig {
  /**
   * Skip the render pass (and the rendering publish) after an event whose
   * cascade changed no state anywhere in the tree. Outputs are still published.
   */
  readonly renderOnlyIfStateChanged?: boolean
  /**
   * Label stamped on every debug event of hosts that do not set their own.
   */
  readonly label?: string
}

export class RuntimeConfigTagImpl extends Context.Tag('@arbor/core/RuntimeConfig')<RuntimeConfigTagImpl, RuntimeConfig>() {}

export const RuntimeConfigTag = RuntimeConfigTagImpl

export const runtimeConfigLayer = (config: RuntimeConfig): Layer.Layer<RuntimeConfigTagImpl, never, never> =>
  Layer.succeed(RuntimeConfigTag, config)

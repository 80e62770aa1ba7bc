import * as Internal from './internal/runtime/core/env.js'

export type RuntimeConfig = Internal.RuntimeConfig

export const RuntimeConfigTag = Internal.RuntimeConfigTag

/** Provides runtime-wide host defaults; Host.make options still win. */
export const layer = Internal.runtimeConfigLayer

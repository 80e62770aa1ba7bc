// getNodeEnv reads globalThis.process.env.NODE_ENV at call time.
// isDevEnv treats anything but "production" as dev.

import * as Internal from './internal/runtime/core/env.js'

export const getNodeEnv = (): string | undefined => Internal.getNodeEnv()

export const isDevEnv = (): boolean => Internal.isDevEnv()

// Public barrel for @arbor/core
//   import { Workflow, Action, Host } from '@arbor/core'

// Workflows and their transitions
export * as Workflow from './Workflow.js'
export * as Action from './Action.js'
export * as Sink from './Sink.js'

// Async work rendered as keyed side effects
export * as Worker from './Worker.js'

// The tree and its event loop
export * as Host from './Host.js'

// Configuration, environment and errors
export * as RuntimeConfig from './RuntimeConfig.js'
export * as Env from './Env.js'
export * as Errors from './Errors.js'

// Observation
export * as Debug from './Debug.js'


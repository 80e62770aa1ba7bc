import { makeSink, type Sink } from './internal/workflow.js'

export type { Sink } from './internal/workflow.js'

export const make = <A>(send: (value: A) => void): Sink<A> => makeSink(send)

export const contramap =
  <A, B>(f: (value: B) => A) =>
  (sink: Sink<A>): Sink<B> =>
    sink.contramap(f)

import { afterEach, describe, expect, it, vi } from 'vitest'
import * as Arbor from '../src/index.js'
import { counterOf, Parent } from './fixtures/Parent.js'

describe('Env', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('treats anything but production as dev', () => {
    vi.stubEnv('NODE_ENV', 'development')
    expect(Arbor.Env.getNodeEnv()).toBe('development')
    expect(Arbor.Env.isDevEnv()).toBe(true)

    vi.stubEnv('NODE_ENV', 'production')
    expect(Arbor.Env.isDevEnv()).toBe(false)
  })

  it('reports stale deliveries in dev only', () => {
    const staleCodes = (env: string) => {
      vi.stubEnv('NODE_ENV', env)
      const ring = Arbor.Debug.makeRingBufferSink()
      const host = Arbor.Host.unsafeMake(Parent, { keys: ['a'] }, { observers: [ring.sink] })
      const increment = counterOf(host.getRendering(), 'a').increment
      host.update({ keys: [] })
      increment()
      return ring.getSnapshot().flatMap((event) => (event.type === 'diagnostic' ? [event.code] : []))
    }

    expect(staleCodes('development')).toEqual(['event::stale_node'])
    expect(staleCodes('production')).toEqual([])
  })
})

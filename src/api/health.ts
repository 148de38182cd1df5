import { Hono } from 'hono'
import type { ObjectStore } from '../storage/types.js'

const PING_TIMEOUT_MS = 2_000

export function healthRoutes(store: ObjectStore): Hono {
  const routes = new Hono()

  // GET /healthz – storage backend reachability
  routes.get('/healthz', async (c) => {
    try {
      await store.ping({ signal: AbortSignal.timeout(PING_TIMEOUT_MS) })
      return c.json({ status: 'up' }, 200)
    } catch (err) {
      console.warn('[health] storage ping failed:', err instanceof Error ? err.message : err)
      return c.json({ status: 'down' }, 503)
    }
  })

  return routes
}

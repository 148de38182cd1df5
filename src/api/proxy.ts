import { Hono } from 'hono'
import type { CacheProxy } from '../proxy/coordinator.js'

export interface ProxyRoutesOptions {
  /** Deadline for one proxied request, in milliseconds. */
  requestTimeoutMs: number
}

export function proxyRoutes(proxy: CacheProxy, options: ProxyRoutesOptions): Hono {
  const routes = new Hono()

  // GET|HEAD /<domain>/<route>[?query]; other methods are rejected by the proxy
  routes.all('*', (c) => {
    // raw URL parts so percent-encoding reaches the origin untouched
    const url = new URL(c.req.url)
    return proxy.handle({
      method: c.req.method,
      path: url.pathname,
      rawQuery: url.search.slice(1),
      signal: AbortSignal.timeout(options.requestTimeoutMs),
    })
  })

  return routes
}

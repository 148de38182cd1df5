import { Hono } from 'hono'
import { logger } from 'hono/logger'
import { serve, type ServerType } from '@hono/node-server'
import { healthRoutes } from './api/health.js'
import { proxyRoutes } from './api/proxy.js'
import { AppError } from './lib/errors.js'
import type { CacheProxy } from './proxy/coordinator.js'
import type { ObjectStore } from './storage/types.js'

export interface AppDeps {
  proxy: CacheProxy
  store: ObjectStore
  requestTimeoutMs: number
  logRequests?: boolean
}

export function buildApp(deps: AppDeps): Hono {
  const app = new Hono()

  // Global error handler
  app.onError((err) => {
    if (err instanceof AppError) {
      return jsonError(err.message, err.code, err.status)
    }
    console.error('[unhandled error]', err)
    return jsonError('Internal server error', 'INTERNAL_ERROR', 500)
  })

  if (deps.logRequests) {
    app.use('*', logger())
  }

  // Mount order: health → proxy catch-all
  app.route('', healthRoutes(deps.store))
  app.route('', proxyRoutes(deps.proxy, { requestTimeoutMs: deps.requestTimeoutMs }))

  return app
}

function jsonError(error: string, code: string, status: number): Response {
  return new Response(JSON.stringify({ error, code }), {
    status,
    headers: { 'Content-Type': 'application/json; charset=UTF-8' },
  })
}

export function startWebServer(app: Hono, port: number): Promise<ServerType> {
  return new Promise((resolve) => {
    const server = serve(
      { fetch: app.fetch, port },
      () => resolve(server)
    )
  })
}

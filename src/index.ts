import { loadConfig } from './config.js'
import { CacheProxy } from './proxy/coordinator.js'
import { createObjectStore } from './storage/index.js'
import { createUpstreamFetcher } from './upstream/client.js'
import { buildApp, startWebServer } from './webServer.js'

async function main() {
  const config = loadConfig()
  console.log(`stashproxy starting (${config.nodeEnv}, storage: ${config.storage.driver})...`)

  // 1. Storage backend
  const store = await createObjectStore(config.storage)
  console.log('✓ Storage ready')

  // 2. Proxy core
  const proxy = new CacheProxy({
    store,
    upstream: createUpstreamFetcher({
      timeoutMs: config.upstream.timeoutMs,
      userAgent: config.upstream.userAgent,
    }),
    ttlDefaultSec: config.cache.ttlDefaultSec,
    ttl404Sec: config.cache.ttl404Sec,
    serveIfPresent: config.cache.serveIfPresent,
    serveOnPersistFailure: config.cache.serveOnPersistFailure,
  })

  // 3. Web server
  const app = buildApp({
    proxy,
    store,
    requestTimeoutMs: config.requestTimeoutMs,
    logRequests: config.logRequests,
  })
  const server = await startWebServer(app, config.port)
  console.log(`✓ Web server listening on :${config.port}`)

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down...`)
    server.close((err) => {
      if (err) {
        console.error('Shutdown error:', err)
        process.exit(1)
      }
      console.log('✓ Server stopped')
      process.exit(0)
    })
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch((err) => {
  console.error('Fatal startup error:', err)
  process.exit(1)
})

import { isFresh, isNegativeFresh, nowIso } from '../lib/cache.js'
import {
  CacheReadError,
  MethodNotAllowedError,
  NegativeCachedError,
  RequestTimeoutError,
  StorageWriteError,
  UpstreamNotFoundError,
  UpstreamStatusError,
  describeError,
} from '../lib/errors.js'
import { SingleFlight } from '../lib/singleFlight.js'
import { deriveKeys } from '../storage/keys.js'
import type { Meta } from '../storage/meta.js'
import type { ObjectStore, StoreCallOptions, StoredObject } from '../storage/types.js'
import { streamOf } from '../storage/types.js'
import type { UpstreamFetcher } from '../upstream/client.js'
import { parseProxyPath, type ProxyTarget } from './path.js'

export type CacheStatus = 'HIT' | 'MISS' | 'REVALIDATED'

/** Result of one single-flight execution, shared by every waiter on the key. */
export type FetchOutcome =
  | { kind: 'serve-cache'; meta: Meta; cacheStatus: Exclude<CacheStatus, 'MISS'> }
  | { kind: 'not-found' }
  | { kind: 'upstream-error'; status: number }
  | {
      kind: 'wrote-body'
      body: Uint8Array
      contentType: string
      etag: string | undefined
      lastModified: string | undefined
    }

export interface ProxyRequest {
  method: string
  path: string
  rawQuery?: string
  /** Caller deadline. Store calls honour it; a shared upstream fetch does not. */
  signal?: AbortSignal
}

export interface CacheProxyOptions {
  store: ObjectStore
  upstream: UpstreamFetcher
  ttlDefaultSec: number
  ttl404Sec: number
  /** Serve any stored object without looking at its freshness. */
  serveIfPresent?: boolean
  /** Serve freshly fetched bytes even when persisting them failed. */
  serveOnPersistFailure?: boolean
  /** Epoch milliseconds. */
  clock?: () => number
}

const READ_METHODS = new Set(['GET', 'HEAD'])
const DEFAULT_CONTENT_TYPE = 'application/octet-stream'

export class CacheProxy {
  private readonly store: ObjectStore
  private readonly upstream: UpstreamFetcher
  private readonly ttlDefaultSec: number
  private readonly ttl404Sec: number
  private readonly serveIfPresent: boolean
  private readonly serveOnPersistFailure: boolean
  private readonly clock: () => number
  private readonly flights = new SingleFlight<FetchOutcome>()

  constructor(options: CacheProxyOptions) {
    this.store = options.store
    this.upstream = options.upstream
    this.ttlDefaultSec = options.ttlDefaultSec
    this.ttl404Sec = options.ttl404Sec
    this.serveIfPresent = options.serveIfPresent ?? false
    this.serveOnPersistFailure = options.serveOnPersistFailure ?? false
    this.clock = options.clock ?? Date.now
  }

  /**
   * Serves `/<domain>/<route>` from the store or the origin.
   * Error outcomes are thrown as AppErrors for the HTTP layer to render.
   */
  async handle(req: ProxyRequest): Promise<Response> {
    if (!READ_METHODS.has(req.method)) throw new MethodNotAllowedError(req.method)

    const target = parseProxyPath(req.path, req.rawQuery)
    const { objectKey, metaKey } = deriveKeys(target.domain, target.route)
    const call: StoreCallOptions = { signal: req.signal }

    if (this.serveIfPresent && await this.objectExists(objectKey, call)) {
      const cached = await this.serveFromStore(objectKey, null, 'HIT', call)
      if (cached) return cached
    }

    const meta = await this.readMeta(metaKey, call)
    if (meta && isNegativeFresh(meta, this.ttl404Sec, this.clock())) {
      throw new NegativeCachedError()
    }
    if (meta && isFresh(meta, this.ttlDefaultSec, this.clock()) && await this.objectExists(objectKey, call)) {
      const cached = await this.serveFromStore(objectKey, meta, 'HIT', call)
      if (cached) return cached
    }

    const { value: outcome } = await withDeadline(
      this.flights.do(objectKey, () => this.fetchAndPersist(target, objectKey, metaKey)),
      req.signal
    )
    return this.respond(outcome, objectKey, call)
  }

  /** Number of keys with an upstream fetch in progress. */
  get inFlight(): number {
    return this.flights.size
  }

  private async fetchAndPersist(target: ProxyTarget, objectKey: string, metaKey: string): Promise<FetchOutcome> {
    // time has passed since the fast path and another holder may have just written
    const meta = await this.readMeta(metaKey)
    if (meta && isNegativeFresh(meta, this.ttl404Sec, this.clock())) {
      return { kind: 'not-found' }
    }
    const hasObject = meta !== null && !meta.isNegative && await this.objectExists(objectKey)
    if (meta && hasObject && isFresh(meta, this.ttlDefaultSec, this.clock())) {
      return { kind: 'serve-cache', meta, cacheStatus: 'HIT' }
    }

    // validators are only worth sending when there is a body to fall back on
    const prior = hasObject ? meta : null
    const res = await this.upstream.fetch(target.url, {
      ifNoneMatch: prior?.etag,
      ifModifiedSince: prior?.lastModified,
    })

    if (res.status === 304 && prior) {
      const refreshed: Meta = { ...prior, cachedAt: nowIso(this.clock()) }
      await this.writeMetaBestEffort(metaKey, refreshed)
      return { kind: 'serve-cache', meta: refreshed, cacheStatus: 'REVALIDATED' }
    }

    if (res.status === 404) {
      await this.writeMetaBestEffort(metaKey, {
        cachedAt: nowIso(this.clock()),
        ttlSeconds: this.ttl404Sec,
        sizeBytes: 0,
        isNegative: true,
      })
      return { kind: 'not-found' }
    }

    if (res.status < 200 || res.status >= 300) {
      return { kind: 'upstream-error', status: res.status }
    }

    const body = res.body ?? new Uint8Array(0)
    const contentType = res.headers.contentType || DEFAULT_CONTENT_TYPE
    try {
      // object first, metadata last: a crash in between leaves no fresh-looking record
      await this.store.put(objectKey, body, contentType)
      await this.store.putMeta(metaKey, {
        etag: res.headers.etag,
        lastModified: res.headers.lastModified,
        cachedAt: nowIso(this.clock()),
        ttlSeconds: this.ttlDefaultSec,
        sizeBytes: body.byteLength,
        isNegative: false,
      })
    } catch (error) {
      if (!this.serveOnPersistFailure) throw new StorageWriteError(objectKey, error)
      console.error(`[proxy] persist failed for ${objectKey}, serving uncached:`, describeError(error))
    }

    return {
      kind: 'wrote-body',
      body,
      contentType,
      etag: res.headers.etag,
      lastModified: res.headers.lastModified,
    }
  }

  private async respond(outcome: FetchOutcome, objectKey: string, call: StoreCallOptions): Promise<Response> {
    switch (outcome.kind) {
      case 'serve-cache': {
        const cached = await this.serveFromStore(objectKey, outcome.meta, outcome.cacheStatus, call)
        if (!cached) throw new CacheReadError(objectKey)
        return cached
      }
      case 'not-found':
        throw new UpstreamNotFoundError()
      case 'upstream-error':
        throw new UpstreamStatusError(outcome.status)
      case 'wrote-body': {
        const headers = new Headers({
          'Content-Type': outcome.contentType,
          'Content-Length': String(outcome.body.byteLength),
          'X-Cache-Status': 'MISS',
        })
        if (outcome.etag) headers.set('ETag', outcome.etag)
        if (outcome.lastModified) headers.set('Last-Modified', outcome.lastModified)
        return new Response(streamOf(outcome.body), { status: 200, headers })
      }
    }
  }

  /** Streams a stored object, or returns null when it cannot be read. */
  private async serveFromStore(
    objectKey: string,
    meta: Meta | null,
    cacheStatus: CacheStatus,
    call: StoreCallOptions
  ): Promise<Response | null> {
    let stored: StoredObject | null
    try {
      stored = await this.store.get(objectKey, call)
    } catch (error) {
      console.warn(`[proxy] object read failed for ${objectKey}:`, describeError(error))
      return null
    }
    if (!stored) return null

    const headers = new Headers({
      'Content-Type': stored.headers.contentType || DEFAULT_CONTENT_TYPE,
      'Content-Length': String(stored.size),
      'X-Cache-Status': cacheStatus,
    })
    const etag = meta?.etag || stored.headers.etag
    const lastModified = meta?.lastModified || stored.headers.lastModified
    if (etag) headers.set('ETag', etag)
    if (lastModified) headers.set('Last-Modified', lastModified)
    return new Response(stored.body, { status: 200, headers })
  }

  private async readMeta(metaKey: string, call?: StoreCallOptions): Promise<Meta | null> {
    try {
      return await this.store.getMeta(metaKey, call)
    } catch (error) {
      console.warn(`[proxy] metadata read failed for ${metaKey}:`, describeError(error))
      return null
    }
  }

  private async objectExists(objectKey: string, call?: StoreCallOptions): Promise<boolean> {
    try {
      return await this.store.exists(objectKey, call)
    } catch (error) {
      console.warn(`[proxy] existence check failed for ${objectKey}:`, describeError(error))
      return false
    }
  }

  private async writeMetaBestEffort(metaKey: string, meta: Meta): Promise<void> {
    try {
      await this.store.putMeta(metaKey, meta)
    } catch (error) {
      console.warn(`[proxy] metadata write failed for ${metaKey}:`, describeError(error))
    }
  }
}

/**
 * Resolves with `promise` unless `signal` aborts first. The underlying work
 * keeps running; only this caller stops waiting for it.
 */
function withDeadline<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new RequestTimeoutError())
    if (signal.aborted) {
      onAbort()
    } else {
      signal.addEventListener('abort', onAbort, { once: true })
    }
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      }
    )
  })
}

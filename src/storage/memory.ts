import { createHash } from 'node:crypto'
import { StorageError } from '../lib/errors.js'
import type { Meta } from './meta.js'
import { streamOf, type ObjectHeaders, type ObjectStore, type StoreCallOptions, type StoredObject } from './types.js'

interface MemoryObject {
  data: Uint8Array
  headers: ObjectHeaders
}

/** In-process store for tests and local runs. Nothing survives a restart. */
export class MemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, MemoryObject>()
  private readonly metas = new Map<string, Meta>()

  async exists(key: string, options?: StoreCallOptions): Promise<boolean> {
    checkSignal('exists', key, options)
    return this.objects.has(key)
  }

  async get(key: string, options?: StoreCallOptions): Promise<StoredObject | null> {
    checkSignal('get', key, options)
    const obj = this.objects.get(key)
    if (!obj) return null
    return { body: streamOf(obj.data), size: obj.data.byteLength, headers: { ...obj.headers } }
  }

  async put(key: string, data: Uint8Array, contentType: string, options?: StoreCallOptions): Promise<void> {
    checkSignal('put', key, options)
    this.objects.set(key, {
      data: data.slice(),
      headers: {
        contentType,
        etag: `"${createHash('md5').update(data).digest('hex')}"`,
        lastModified: new Date().toUTCString(),
      },
    })
  }

  async getMeta(key: string, options?: StoreCallOptions): Promise<Meta | null> {
    checkSignal('getMeta', key, options)
    const meta = this.metas.get(key)
    return meta ? { ...meta } : null
  }

  async putMeta(key: string, meta: Meta, options?: StoreCallOptions): Promise<void> {
    checkSignal('putMeta', key, options)
    this.metas.set(key, { ...meta })
  }

  async ping(options?: StoreCallOptions): Promise<void> {
    checkSignal('ping', '(bucket)', options)
  }

  /** Number of stored objects and metadata records, for diagnostics. */
  get size(): { objects: number; metas: number } {
    return { objects: this.objects.size, metas: this.metas.size }
  }
}

function checkSignal(operation: string, key: string, options?: StoreCallOptions): void {
  if (options?.signal?.aborted) {
    throw new StorageError(operation, key, options.signal.reason)
  }
}

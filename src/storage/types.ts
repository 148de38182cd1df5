import type { Meta } from './meta.js'

export interface StoreCallOptions {
  /** Aborts the backend call when the caller's deadline expires. */
  signal?: AbortSignal
}

export interface ObjectHeaders {
  contentType?: string
  etag?: string
  lastModified?: string
}

export interface StoredObject {
  body: ReadableStream<Uint8Array>
  size: number
  headers: ObjectHeaders
}

/**
 * Object bytes plus a small JSON metadata sidecar. "Not found" is reported as
 * `false`/`null`; every other failure rejects with a StorageError.
 */
export interface ObjectStore {
  exists(key: string, options?: StoreCallOptions): Promise<boolean>
  get(key: string, options?: StoreCallOptions): Promise<StoredObject | null>
  put(key: string, data: Uint8Array, contentType: string, options?: StoreCallOptions): Promise<void>
  getMeta(key: string, options?: StoreCallOptions): Promise<Meta | null>
  putMeta(key: string, meta: Meta, options?: StoreCallOptions): Promise<void>
  ping(options?: StoreCallOptions): Promise<void>
}

export function streamOf(data: Uint8Array): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(data)
      controller.close()
    },
  })
}

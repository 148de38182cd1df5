import { constants, promises as fs } from 'node:fs'
import path from 'node:path'
import { randomUUID } from 'node:crypto'
import { StorageError } from '../lib/errors.js'
import { decodeMeta, encodeMeta, type Meta } from './meta.js'
import { streamOf, type ObjectHeaders, type ObjectStore, type StoreCallOptions, type StoredObject } from './types.js'

interface AttributesFile {
  contentType: string
  etag: string
  storedAt: string
}

export interface FileObjectStoreOptions {
  rootDir?: string
}

/**
 * Local-disk store. Keys are flattened into single file names so routes can
 * never escape the root or collide as file and directory.
 */
export class FileObjectStore implements ObjectStore {
  private readonly rootDir: string

  constructor(options: FileObjectStoreOptions = {}) {
    this.rootDir = path.resolve(options.rootDir ?? '.cache')
  }

  async exists(key: string, options?: StoreCallOptions): Promise<boolean> {
    checkSignal('exists', key, options)
    try {
      const stat = await fs.stat(this.blobPath(key))
      return stat.isFile()
    } catch (error) {
      if (isNotFound(error)) return false
      throw new StorageError('exists', key, error)
    }
  }

  async get(key: string, options?: StoreCallOptions): Promise<StoredObject | null> {
    try {
      const [data, attrsRaw, stat] = await Promise.all([
        fs.readFile(this.blobPath(key), { signal: options?.signal }),
        fs.readFile(this.attrsPath(key), { encoding: 'utf8', signal: options?.signal }),
        fs.stat(this.blobPath(key)),
      ])
      const attrs = parseAttributes(attrsRaw)
      const headers: ObjectHeaders = {
        contentType: attrs?.contentType,
        etag: attrs?.etag,
        lastModified: stat.mtime.toUTCString(),
      }
      return { body: streamOf(data), size: data.byteLength, headers }
    } catch (error) {
      if (isNotFound(error)) return null
      throw new StorageError('get', key, error)
    }
  }

  async put(key: string, data: Uint8Array, contentType: string, options?: StoreCallOptions): Promise<void> {
    const attrs: AttributesFile = {
      contentType,
      etag: `"${randomUUID()}"`,
      storedAt: new Date().toISOString(),
    }
    try {
      await this.writeAtomic(this.blobPath(key), data, options)
      await this.writeAtomic(this.attrsPath(key), JSON.stringify(attrs, null, 2), options)
    } catch (error) {
      throw new StorageError('put', key, error)
    }
  }

  async getMeta(key: string, options?: StoreCallOptions): Promise<Meta | null> {
    try {
      const raw = await fs.readFile(this.metaPath(key), { encoding: 'utf8', signal: options?.signal })
      return decodeMeta(raw)
    } catch (error) {
      if (isNotFound(error)) return null
      throw new StorageError('getMeta', key, error)
    }
  }

  async putMeta(key: string, meta: Meta, options?: StoreCallOptions): Promise<void> {
    try {
      await this.writeAtomic(this.metaPath(key), encodeMeta(meta), options)
    } catch (error) {
      throw new StorageError('putMeta', key, error)
    }
  }

  async ping(options?: StoreCallOptions): Promise<void> {
    checkSignal('ping', this.rootDir, options)
    try {
      await fs.mkdir(this.rootDir, { recursive: true })
      await fs.access(this.rootDir, constants.W_OK)
    } catch (error) {
      throw new StorageError('ping', this.rootDir, error)
    }
  }

  private async writeAtomic(target: string, data: Uint8Array | string, options?: StoreCallOptions): Promise<void> {
    await fs.mkdir(path.dirname(target), { recursive: true })
    const tmp = `${target}.${randomUUID()}.tmp`
    await fs.writeFile(tmp, data, { signal: options?.signal })
    await fs.rename(tmp, target)
  }

  private blobPath(key: string): string {
    return path.join(this.rootDir, 'blobs', encodeKey(key))
  }

  private attrsPath(key: string): string {
    return path.join(this.rootDir, 'attrs', `${encodeKey(key)}.json`)
  }

  private metaPath(key: string): string {
    return path.join(this.rootDir, 'meta', encodeKey(key))
  }
}

// "." and ".." survive encodeURIComponent, so they get explicit escapes
function encodeKey(key: string): string {
  return encodeURIComponent(key).replace(/\./g, '%2E')
}

function parseAttributes(raw: string): AttributesFile | null {
  try {
    const value: unknown = JSON.parse(raw)
    if (
      typeof value === 'object' && value !== null &&
      'contentType' in value && typeof value.contentType === 'string' &&
      'etag' in value && typeof value.etag === 'string' &&
      'storedAt' in value && typeof value.storedAt === 'string'
    ) {
      return { contentType: value.contentType, etag: value.etag, storedAt: value.storedAt }
    }
    return null
  } catch {
    return null
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function checkSignal(operation: string, key: string, options?: StoreCallOptions): void {
  if (options?.signal?.aborted) {
    throw new StorageError(operation, key, options.signal.reason)
  }
}

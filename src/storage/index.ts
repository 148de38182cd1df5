import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  HeadBucketCommand,
  CreateBucketCommand,
  NoSuchBucket,
  NoSuchKey,
  NotFound,
  S3ServiceException,
} from '@aws-sdk/client-s3'
import type { Config } from '../config.js'
import { StorageError } from '../lib/errors.js'
import { FileObjectStore } from './fs.js'
import { MemoryObjectStore } from './memory.js'
import { decodeMeta, encodeMeta, type Meta } from './meta.js'
import type { ObjectStore, StoreCallOptions, StoredObject } from './types.js'

export interface S3ObjectStoreOptions {
  endpoint?: string | undefined
  region: string
  bucket: string
  accessKeyId: string
  secretAccessKey: string
  forcePathStyle: boolean
}

/** S3-compatible backend (MinIO, R2, AWS). One bucket holds objects and metadata. */
export class S3ObjectStore implements ObjectStore {
  private readonly s3: S3Client
  private readonly bucket: string

  constructor(options: S3ObjectStoreOptions) {
    this.bucket = options.bucket
    this.s3 = new S3Client({
      endpoint: options.endpoint,
      region: options.region,
      credentials: {
        accessKeyId: options.accessKeyId,
        secretAccessKey: options.secretAccessKey,
      },
      forcePathStyle: options.forcePathStyle,
    })
  }

  async exists(key: string, options?: StoreCallOptions): Promise<boolean> {
    try {
      await this.s3.send(new HeadObjectCommand({
        Bucket: this.bucket,
        Key: key,
      }), { abortSignal: options?.signal })
      return true
    } catch (error) {
      if (isNotFound(error)) return false
      throw new StorageError('exists', key, error)
    }
  }

  async get(key: string, options?: StoreCallOptions): Promise<StoredObject | null> {
    try {
      const response = await this.s3.send(new GetObjectCommand({
        Bucket: this.bucket,
        Key: key,
      }), { abortSignal: options?.signal })
      if (!response.Body) return null
      return {
        body: response.Body.transformToWebStream(),
        size: response.ContentLength ?? 0,
        headers: {
          contentType: response.ContentType,
          etag: response.ETag,
          lastModified: response.LastModified?.toUTCString(),
        },
      }
    } catch (error) {
      if (isNotFound(error)) return null
      throw new StorageError('get', key, error)
    }
  }

  async put(key: string, data: Uint8Array, contentType: string, options?: StoreCallOptions): Promise<void> {
    try {
      await this.s3.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: data,
        ContentType: contentType,
        ContentLength: data.byteLength,
      }), { abortSignal: options?.signal })
    } catch (error) {
      throw new StorageError('put', key, error)
    }
  }

  async getMeta(key: string, options?: StoreCallOptions): Promise<Meta | null> {
    try {
      const response = await this.s3.send(new GetObjectCommand({
        Bucket: this.bucket,
        Key: key,
      }), { abortSignal: options?.signal })
      if (!response.Body) return null
      return decodeMeta(await response.Body.transformToString('utf-8'))
    } catch (error) {
      if (isNotFound(error)) return null
      throw new StorageError('getMeta', key, error)
    }
  }

  async putMeta(key: string, meta: Meta, options?: StoreCallOptions): Promise<void> {
    try {
      await this.s3.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: encodeMeta(meta),
        ContentType: 'application/json',
      }), { abortSignal: options?.signal })
    } catch (error) {
      throw new StorageError('putMeta', key, error)
    }
  }

  async ping(options?: StoreCallOptions): Promise<void> {
    try {
      await this.s3.send(new HeadBucketCommand({ Bucket: this.bucket }), { abortSignal: options?.signal })
    } catch (error) {
      throw new StorageError('ping', this.bucket, error)
    }
  }

  /** Creates the bucket when it does not exist yet. */
  async ensureBucket(): Promise<void> {
    try {
      await this.s3.send(new HeadBucketCommand({ Bucket: this.bucket }))
      return
    } catch (error) {
      if (!isNotFound(error)) throw new StorageError('headBucket', this.bucket, error)
    }
    try {
      await this.s3.send(new CreateBucketCommand({ Bucket: this.bucket }))
      console.log(`✓ Created bucket ${this.bucket}`)
    } catch (error) {
      throw new StorageError('createBucket', this.bucket, error)
    }
  }
}

function isNotFound(error: unknown): boolean {
  if (error instanceof NoSuchKey || error instanceof NotFound || error instanceof NoSuchBucket) return true
  return error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404
}

export async function createObjectStore(storage: Config['storage']): Promise<ObjectStore> {
  switch (storage.driver) {
    case 'memory':
      return new MemoryObjectStore()
    case 'fs':
      return new FileObjectStore({ rootDir: storage.fsRoot })
    case 's3': {
      const { endpoint, accessKeyId, secretAccessKey } = storage
      if (!endpoint || !accessKeyId || !secretAccessKey) {
        throw new Error('s3 storage config incomplete (endpoint/access key/secret key)')
      }
      const store = new S3ObjectStore({
        endpoint,
        region: storage.region,
        bucket: storage.bucket,
        accessKeyId,
        secretAccessKey,
        forcePathStyle: storage.forcePathStyle,
      })
      await store.ensureBucket()
      return store
    }
  }
}

export { FileObjectStore } from './fs.js'
export { MemoryObjectStore } from './memory.js'
export type { ObjectStore, StoredObject, StoreCallOptions, ObjectHeaders } from './types.js'

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly status: number = 400
  ) {
    super(message)
    this.name = 'AppError'
  }
}

export class InvalidPathError extends AppError {
  constructor() {
    super('INVALID_PATH', 'path must be /<domain>/<route>', 400)
  }
}

export class MethodNotAllowedError extends AppError {
  constructor(method: string) {
    super('METHOD_NOT_ALLOWED', `method ${method} not allowed`, 405)
  }
}

export class NegativeCachedError extends AppError {
  constructor() {
    super('NEGATIVE_CACHED', 'upstream negative-cached 404', 404)
  }
}

export class UpstreamNotFoundError extends AppError {
  constructor() {
    super('UPSTREAM_NOT_FOUND', 'upstream 404', 404)
  }
}

/** Forwards the upstream status when it is an HTTP error code, otherwise 502. */
export class UpstreamStatusError extends AppError {
  constructor(public readonly upstreamStatus: number) {
    const status = upstreamStatus >= 400 && upstreamStatus <= 599 ? upstreamStatus : 502
    super('UPSTREAM_ERROR', `upstream responded ${upstreamStatus}`, status)
  }
}

export class UpstreamTransportError extends AppError {
  constructor(cause: unknown) {
    super('UPSTREAM_UNREACHABLE', `upstream error: ${describeError(cause)}`, 502)
    this.cause = cause
  }
}

export class RequestTimeoutError extends AppError {
  constructor() {
    super('REQUEST_TIMEOUT', 'request deadline exceeded', 504)
  }
}

export class CacheReadError extends AppError {
  constructor(key: string) {
    super('CACHE_READ_FAILED', `cache read failed for ${key}`, 500)
  }
}

export class StorageWriteError extends AppError {
  constructor(key: string, cause: unknown) {
    super('STORAGE_WRITE_FAILED', `failed to persist ${key}: ${describeError(cause)}`, 500)
    this.cause = cause
  }
}

/** Raised by object store backends for anything other than "not found". */
export class StorageError extends AppError {
  constructor(operation: string, key: string, cause: unknown) {
    super('STORAGE_ERROR', `storage ${operation} failed for ${key}: ${describeError(cause)}`, 500)
    this.cause = cause
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

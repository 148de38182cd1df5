import { UpstreamTransportError } from '../lib/errors.js'

export interface ConditionalHeaders {
  ifNoneMatch?: string | undefined
  ifModifiedSince?: string | undefined
}

export interface UpstreamHeaders {
  contentType?: string | undefined
  etag?: string | undefined
  lastModified?: string | undefined
}

export interface UpstreamResponse {
  status: number
  headers: UpstreamHeaders
  /** Full body for 2xx responses, null otherwise. */
  body: Uint8Array | null
}

export interface UpstreamFetcher {
  fetch(url: string, conditional?: ConditionalHeaders): Promise<UpstreamResponse>
}

export interface UpstreamFetcherOptions {
  /** Upper bound for one upstream exchange, body included. */
  timeoutMs: number
  userAgent?: string
}

/**
 * Conditional GETs against the origin over Node's pooled fetch. Redirects
 * are returned as-is, never followed.
 */
export function createUpstreamFetcher(options: UpstreamFetcherOptions): UpstreamFetcher {
  const { timeoutMs, userAgent } = options

  return {
    async fetch(url: string, conditional: ConditionalHeaders = {}): Promise<UpstreamResponse> {
      const headers: Record<string, string> = {}
      if (userAgent) headers['User-Agent'] = userAgent
      if (conditional.ifNoneMatch) headers['If-None-Match'] = conditional.ifNoneMatch
      if (conditional.ifModifiedSince) headers['If-Modified-Since'] = conditional.ifModifiedSince

      try {
        const response = await fetch(url, {
          method: 'GET',
          headers,
          redirect: 'manual',
          signal: AbortSignal.timeout(timeoutMs),
        })

        const result: UpstreamResponse = {
          status: response.status,
          headers: {
            contentType: response.headers.get('content-type') ?? undefined,
            etag: response.headers.get('etag') ?? undefined,
            lastModified: response.headers.get('last-modified') ?? undefined,
          },
          body: null,
        }

        if (response.status >= 200 && response.status < 300) {
          result.body = new Uint8Array(await response.arrayBuffer())
        } else {
          await response.body?.cancel()
        }
        return result
      } catch (error) {
        throw new UpstreamTransportError(error)
      }
    },
  }
}

import { afterEach, describe, it, mock } from 'node:test'
import * as assert from 'node:assert'
import { createUpstreamFetcher } from '../src/upstream/client.js'
import { UpstreamTransportError } from '../src/lib/errors.js'

interface SeenRequest {
  url: string
  init: RequestInit | undefined
}

function mockFetch(respond: () => Response): SeenRequest[] {
  const seen: SeenRequest[] = []
  mock.method(globalThis, 'fetch', async (input: string | URL | Request, init?: RequestInit) => {
    seen.push({ url: input.toString(), init })
    return respond()
  })
  return seen
}

describe('createUpstreamFetcher', () => {
  afterEach(() => {
    mock.restoreAll()
  })

  it('should return the body and validators of a 2xx response', async () => {
    const seen = mockFetch(() => new Response('hello', {
      status: 200,
      headers: { 'Content-Type': 'text/plain', ETag: '"x1"', 'Last-Modified': 'Wed, 01 Jan 2025 00:00:00 GMT' },
    }))
    const upstream = createUpstreamFetcher({ timeoutMs: 1_000, userAgent: 'stashproxy-test' })

    const res = await upstream.fetch('https://example.com/a.txt')

    assert.strictEqual(res.status, 200)
    assert.deepStrictEqual(res.headers, {
      contentType: 'text/plain',
      etag: '"x1"',
      lastModified: 'Wed, 01 Jan 2025 00:00:00 GMT',
    })
    assert.strictEqual(new TextDecoder().decode(res.body ?? new Uint8Array(0)), 'hello')
    assert.strictEqual(seen.length, 1)
    assert.strictEqual(seen[0]?.url, 'https://example.com/a.txt')
    assert.strictEqual(seen[0]?.init?.redirect, 'manual')
    assert.strictEqual(new Headers(seen[0]?.init?.headers).get('user-agent'), 'stashproxy-test')
    assert.strictEqual(new Headers(seen[0]?.init?.headers).has('if-none-match'), false)
  })

  it('should send conditional headers when validators are given', async () => {
    const seen = mockFetch(() => new Response(null, { status: 304 }))
    const upstream = createUpstreamFetcher({ timeoutMs: 1_000 })

    const res = await upstream.fetch('https://example.com/a.txt', {
      ifNoneMatch: '"x1"',
      ifModifiedSince: 'Wed, 01 Jan 2025 00:00:00 GMT',
    })

    assert.strictEqual(res.status, 304)
    assert.strictEqual(res.body, null)
    const headers = new Headers(seen[0]?.init?.headers)
    assert.strictEqual(headers.get('if-none-match'), '"x1"')
    assert.strictEqual(headers.get('if-modified-since'), 'Wed, 01 Jan 2025 00:00:00 GMT')
  })

  it('should drop the body of non-2xx responses', async () => {
    mockFetch(() => new Response('gone fishing', { status: 503 }))
    const upstream = createUpstreamFetcher({ timeoutMs: 1_000 })

    const res = await upstream.fetch('https://example.com/a.txt')
    assert.strictEqual(res.status, 503)
    assert.strictEqual(res.body, null)
  })

  it('should give up on an origin that outlives the timeout', async () => {
    mock.method(globalThis, 'fetch', (_input: string | URL | Request, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal
        if (!signal) {
          reject(new Error('fetch called without a signal'))
          return
        }
        signal.addEventListener('abort', () => reject(signal.reason), { once: true })
      })
    )
    const upstream = createUpstreamFetcher({ timeoutMs: 50 })
    // timeout signals do not hold the event loop open on their own
    const keepAlive = setTimeout(() => {}, 5_000)

    try {
      await assert.rejects(upstream.fetch('https://example.com/slow'), (err) => {
        assert.ok(err instanceof UpstreamTransportError)
        assert.strictEqual(err.status, 502)
        assert.strictEqual(err.message, 'upstream error: The operation was aborted due to timeout')
        return true
      })
    } finally {
      clearTimeout(keepAlive)
    }
  })

  it('should wrap network failures as transport errors', async () => {
    mock.method(globalThis, 'fetch', async () => {
      throw new TypeError('fetch failed')
    })
    const upstream = createUpstreamFetcher({ timeoutMs: 1_000 })

    await assert.rejects(upstream.fetch('https://example.com/a.txt'), (err) => {
      assert.ok(err instanceof UpstreamTransportError)
      assert.strictEqual(err.status, 502)
      assert.strictEqual(err.message, 'upstream error: fetch failed')
      return true
    })
  })
})

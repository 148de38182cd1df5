import { describe, it } from 'node:test'
import * as assert from 'node:assert'
import { MemoryObjectStore } from '../src/storage/memory.js'
import { StorageError } from '../src/lib/errors.js'

const encode = (text: string) => new TextEncoder().encode(text)

describe('MemoryObjectStore', () => {
  it('should report missing objects and metadata as absent', async () => {
    const store = new MemoryObjectStore()
    assert.strictEqual(await store.exists('objects/example.com/a'), false)
    assert.strictEqual(await store.get('objects/example.com/a'), null)
    assert.strictEqual(await store.getMeta('meta/example.com/a.json'), null)
  })

  it('should store bytes with content type and an MD5 ETag', async () => {
    const store = new MemoryObjectStore()
    await store.put('objects/example.com/a', encode('hello'), 'text/plain')

    assert.strictEqual(await store.exists('objects/example.com/a'), true)
    const obj = await store.get('objects/example.com/a')
    assert.ok(obj)
    assert.strictEqual(obj.size, 5)
    assert.strictEqual(obj.headers.contentType, 'text/plain')
    assert.strictEqual(obj.headers.etag, '"5d41402abc4b2a76b9719d911017c592"')
    assert.strictEqual(await new Response(obj.body).text(), 'hello')
  })

  it('should overwrite metadata and hand out copies', async () => {
    const store = new MemoryObjectStore()
    await store.putMeta('meta/example.com/a.json', { etag: '"x1"', isNegative: false })
    await store.putMeta('meta/example.com/a.json', { cachedAt: '2026-01-01T00:00:00.000Z', isNegative: true })

    const meta = await store.getMeta('meta/example.com/a.json')
    assert.deepStrictEqual(meta, { cachedAt: '2026-01-01T00:00:00.000Z', isNegative: true })
    assert.ok(meta)
    meta.isNegative = false
    assert.strictEqual((await store.getMeta('meta/example.com/a.json'))?.isNegative, true)
    assert.deepStrictEqual(store.size, { objects: 0, metas: 1 })
  })

  it('should fail calls whose signal has already aborted', async () => {
    const store = new MemoryObjectStore()
    const controller = new AbortController()
    controller.abort()
    await assert.rejects(store.exists('objects/example.com/a', { signal: controller.signal }), StorageError)
  })
})

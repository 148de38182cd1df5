import { describe, it } from 'node:test'
import * as assert from 'node:assert'
import { decodeMeta, encodeMeta } from '../src/storage/meta.js'

describe('metadata codec', () => {
  it('should write snake_case keys and leave out empty values', () => {
    const raw = encodeMeta({
      etag: '"x1"',
      lastModified: '',
      cachedAt: '2026-01-01T00:00:00.000Z',
      ttlSeconds: 3600,
      sizeBytes: 0,
      isNegative: false,
    })
    assert.strictEqual(raw, '{"etag":"\\"x1\\"","cached_at":"2026-01-01T00:00:00.000Z","ttl_sec":3600}')
  })

  it('should mark negative entries with neg', () => {
    const raw = encodeMeta({ cachedAt: '2026-01-01T00:00:00.000Z', ttlSeconds: 60, sizeBytes: 0, isNegative: true })
    assert.strictEqual(raw, '{"cached_at":"2026-01-01T00:00:00.000Z","ttl_sec":60,"neg":true}')
  })

  it('should read records with nanosecond timestamps', () => {
    const raw = JSON.stringify({
      etag: 'W/"abc"',
      last_modified: 'Wed, 01 Jan 2025 00:00:00 GMT',
      cached_at: '2026-01-01T00:00:00.123456789Z',
      ttl_sec: 120,
      size: 42,
    })
    assert.deepStrictEqual(decodeMeta(raw), {
      etag: 'W/"abc"',
      lastModified: 'Wed, 01 Jan 2025 00:00:00 GMT',
      cachedAt: '2026-01-01T00:00:00.123456789Z',
      ttlSeconds: 120,
      sizeBytes: 42,
      isNegative: false,
    })
  })

  it('should read a negative record', () => {
    assert.deepStrictEqual(decodeMeta('{"cached_at":"2026-01-01T00:00:00Z","ttl_sec":60,"neg":true}'), {
      cachedAt: '2026-01-01T00:00:00Z',
      ttlSeconds: 60,
      isNegative: true,
    })
  })

  it('should treat malformed records as absent', () => {
    assert.strictEqual(decodeMeta('not json'), null)
    assert.strictEqual(decodeMeta('"just a string"'), null)
    assert.strictEqual(decodeMeta('{"ttl_sec":"60"}'), null)
    assert.strictEqual(decodeMeta('{"neg":"yes"}'), null)
  })
})

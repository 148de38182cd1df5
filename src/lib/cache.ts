import type { Meta } from '../storage/meta.js'

// RFC 3339 date-time, any number of fractional digits
const RFC3339 = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i

export function nowIso(now: number = Date.now()): string {
  return new Date(now).toISOString()
}

export function effectiveTtl(meta: Meta, defaultTtlSec: number): number {
  return meta.ttlSeconds !== undefined && meta.ttlSeconds > 0 ? meta.ttlSeconds : defaultTtlSec
}

function cachedAtMs(meta: Meta): number | null {
  if (!meta.cachedAt || !RFC3339.test(meta.cachedAt)) return null
  const ms = Date.parse(meta.cachedAt)
  return Number.isNaN(ms) ? null : ms
}

function withinTtl(meta: Meta, ttlSec: number, now: number): boolean {
  const cachedAt = cachedAtMs(meta)
  if (cachedAt === null) return false
  return now - cachedAt < ttlSec * 1000
}

/**
 * A positive entry is fresh while its age is below the effective TTL.
 * Records without a parseable `cachedAt` are never fresh.
 */
export function isFresh(meta: Meta, defaultTtlSec: number, now: number = Date.now()): boolean {
  if (meta.isNegative) return false
  return withinTtl(meta, effectiveTtl(meta, defaultTtlSec), now)
}

export function isNegativeFresh(meta: Meta, ttl404Sec: number, now: number = Date.now()): boolean {
  if (!meta.isNegative) return false
  return withinTtl(meta, effectiveTtl(meta, ttl404Sec), now)
}

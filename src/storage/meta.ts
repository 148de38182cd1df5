import { z } from 'zod'

export interface Meta {
  etag?: string | undefined
  lastModified?: string | undefined
  /** RFC 3339 UTC timestamp of the last fetch or revalidation. */
  cachedAt?: string | undefined
  /** Zero or absent means the caller's default TTL. */
  ttlSeconds?: number | undefined
  sizeBytes?: number | undefined
  isNegative: boolean
}

// Stored layout: snake_case keys, empty and zero values left out
const storedMetaSchema = z.object({
  etag: z.string().optional(),
  last_modified: z.string().optional(),
  cached_at: z.string().optional(),
  ttl_sec: z.number().int().optional(),
  size: z.number().int().optional(),
  neg: z.boolean().optional(),
})

type StoredMeta = z.infer<typeof storedMetaSchema>

/** Decodes a stored metadata record. Anything unreadable counts as absent. */
export function decodeMeta(raw: string): Meta | null {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    return null
  }
  const parsed = storedMetaSchema.safeParse(json)
  if (!parsed.success) return null

  const stored = parsed.data
  const meta: Meta = { isNegative: stored.neg ?? false }
  if (stored.etag !== undefined) meta.etag = stored.etag
  if (stored.last_modified !== undefined) meta.lastModified = stored.last_modified
  if (stored.cached_at !== undefined) meta.cachedAt = stored.cached_at
  if (stored.ttl_sec !== undefined) meta.ttlSeconds = stored.ttl_sec
  if (stored.size !== undefined) meta.sizeBytes = stored.size
  return meta
}

export function encodeMeta(meta: Meta): string {
  const stored: StoredMeta = {}
  if (meta.etag) stored.etag = meta.etag
  if (meta.lastModified) stored.last_modified = meta.lastModified
  if (meta.cachedAt) stored.cached_at = meta.cachedAt
  if (meta.ttlSeconds) stored.ttl_sec = meta.ttlSeconds
  if (meta.sizeBytes) stored.size = meta.sizeBytes
  if (meta.isNegative) stored.neg = true
  return JSON.stringify(stored)
}

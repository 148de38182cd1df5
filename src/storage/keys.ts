export interface CacheKeys {
  objectKey: string
  metaKey: string
}

function trimLeadingSlashes(route: string): string {
  return route.replace(/^\/+/, '')
}

export function objectKey(domain: string, route: string): string {
  return `objects/${domain}/${trimLeadingSlashes(route)}`
}

export function metaKey(domain: string, route: string): string {
  return `meta/${domain}/${trimLeadingSlashes(route)}.json`
}

/**
 * Storage keys for a proxied resource. The domain is used exactly as parsed
 * from the request path and the route verbatim apart from leading slashes.
 */
export function deriveKeys(domain: string, route: string): CacheKeys {
  return {
    objectKey: objectKey(domain, route),
    metaKey: metaKey(domain, route),
  }
}

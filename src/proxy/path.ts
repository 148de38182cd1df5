import { InvalidPathError } from '../lib/errors.js'

export interface ProxyTarget {
  domain: string
  route: string
  url: string
}

/**
 * Splits `/<domain>/<route>` on the first slash after the leading one and
 * builds `https://<domain>/<route>[?query]`. Nothing is escaped or
 * validated beyond slash trimming; a bad domain fails at fetch time.
 */
export function parseProxyPath(path: string, rawQuery = ''): ProxyTarget {
  const p = path.startsWith('/') ? path.slice(1) : path
  const i = p.indexOf('/')
  if (i <= 0) throw new InvalidPathError()

  const domain = p.slice(0, i)
  const route = p.slice(i + 1)

  let url = `https://${domain.replace(/\/+$/, '')}/${route.replace(/^\/+/, '')}`
  if (rawQuery) url += `?${rawQuery}`

  return { domain, route, url }
}

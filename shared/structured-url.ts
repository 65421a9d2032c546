import type { MatchType, QueryParam, RequestDescriptor, RequestSnapshot, StructuredUrl } from './types.js'

export interface ParseUrlOptions {
  /** Match type given to every parsed query parameter */
  matchType?: MatchType
  required?: boolean
}

const DEFAULT_PORTS: Record<string, number> = { http: 80, https: 443 }

export function emptyStructuredUrl(): StructuredUrl {
  return { scheme: 'https', host: '', path: '', queryParams: [] }
}

/**
 * Split a URL into its matchable parts. Query parameters keep their raw
 * (still percent-encoded) text so that serializing gives back the same URL.
 * Unparseable input yields an empty structure.
 */
export function fromUrl(url: string, options: ParseUrlOptions = {}): StructuredUrl {
  const matchType = options.matchType ?? 'WILDCARD'
  const required = options.required ?? false

  if (!URL.canParse(url)) {
    return emptyStructuredUrl()
  }
  const parsed = new URL(url)

  const queryParams: QueryParam[] = []
  const rawQuery = parsed.search.startsWith('?') ? parsed.search.slice(1) : parsed.search
  if (rawQuery) {
    for (const part of rawQuery.split('&')) {
      if (!part) continue
      const eq = part.indexOf('=')
      const key = eq === -1 ? part : part.slice(0, eq)
      const value = eq === -1 ? '' : part.slice(eq + 1)
      queryParams.push({ key, value, required, matchType })
    }
  }

  return {
    scheme: parsed.protocol.replace(/:$/, ''),
    host: parsed.hostname,
    port: parsed.port ? parseInt(parsed.port, 10) : undefined,
    path: parsed.pathname,
    queryParams
  }
}

export function toFullUrl(url: StructuredUrl): string {
  const showPort = url.port !== undefined && url.port !== DEFAULT_PORTS[url.scheme]
  const portStr = showPort ? `:${url.port}` : ''
  const queryStr = url.queryParams.length > 0
    ? '?' + url.queryParams.map(param => `${param.key}=${param.value}`).join('&')
    : ''
  return `${url.scheme}://${url.host}${portStr}${url.path}${queryStr}`
}

/**
 * Decoded query parameters of a URL; the first occurrence of a key wins.
 */
export function queryParamsOf(url: string): Record<string, string> {
  // Null prototype so keys like __proto__ and toString are plain entries
  const result: Record<string, string> = Object.create(null)
  const queryIndex = url.indexOf('?')
  const search = URL.canParse(url)
    ? new URL(url).searchParams
    : new URLSearchParams(queryIndex === -1 ? '' : url.slice(queryIndex + 1))
  for (const [key, value] of search) {
    if (!(key in result)) {
      result[key] = value
    }
  }
  return result
}

export function stripQuery(path: string): string {
  const queryIndex = path.indexOf('?')
  return queryIndex === -1 ? path : path.substring(0, queryIndex)
}

/**
 * Matchable view of a captured request: host without port, path without query.
 */
export function describeRequest(request: RequestSnapshot): RequestDescriptor {
  if (URL.canParse(request.url)) {
    const parsed = new URL(request.url)
    return {
      method: request.method,
      host: parsed.hostname,
      path: parsed.pathname,
      query: queryParamsOf(request.url)
    }
  }
  return {
    method: request.method,
    host: request.host.replace(/:\d+$/, ''),
    path: stripQuery(request.path) || '/',
    query: queryParamsOf(request.path)
  }
}

import http from 'http'
import type { HeaderMap, ModifiedResponse, ResponseSnapshot } from './types.js'
import { setHeader } from './headers.js'

export function isUnmodified(modified: ModifiedResponse | null | undefined): boolean {
  if (!modified) return true
  return modified.statusCode == null
    && modified.reason == null
    && modified.headers == null
    && modified.body == null
}

function mergeHeaderMaps(base: Readonly<HeaderMap>, overrides: Readonly<HeaderMap>): HeaderMap {
  let result: HeaderMap = { ...base }
  for (const [name, value] of Object.entries(overrides)) {
    result = setHeader(result, name, value)
  }
  return result
}

/**
 * Merge overrides onto a captured response. Fields left null keep the original;
 * headers are overridden one name at a time.
 */
export function applyModifications(
  original: ResponseSnapshot,
  modified: ModifiedResponse | null | undefined
): ResponseSnapshot {
  if (!modified || isUnmodified(modified)) {
    return original
  }

  const statusCode = modified.statusCode ?? original.statusCode
  const statusChanged = statusCode !== original.statusCode
  const reason = modified.reason
    ?? (statusChanged ? http.STATUS_CODES[statusCode] ?? '' : original.reason)

  return Object.freeze({
    statusCode,
    reason,
    headers: Object.freeze(modified.headers ? mergeHeaderMaps(original.headers, modified.headers) : { ...original.headers }),
    body: modified.body ?? original.body
  })
}

/**
 * Build a response when there is no original to merge onto (e.g. a mock
 * answered before the request reached the network).
 */
export function synthesizeResponse(modified: ModifiedResponse): ResponseSnapshot {
  const statusCode = modified.statusCode ?? 200
  return Object.freeze({
    statusCode,
    reason: modified.reason ?? http.STATUS_CODES[statusCode] ?? '',
    headers: Object.freeze({ ...(modified.headers ?? {}) }),
    body: modified.body ?? ''
  })
}

/**
 * Layer `override` on top of `base`. Used when an operator edits a response a
 * mock rule already rewrote.
 */
export function combineModifications(
  base: ModifiedResponse | null,
  override: ModifiedResponse | null
): ModifiedResponse | null {
  if (isUnmodified(base)) return isUnmodified(override) ? null : override
  if (!base || !override || isUnmodified(override)) return base

  let headers: HeaderMap | null = null
  if (base.headers || override.headers) {
    headers = mergeHeaderMaps(base.headers ?? {}, override.headers ?? {})
  }

  return {
    statusCode: override.statusCode ?? base.statusCode ?? null,
    reason: override.reason ?? base.reason ?? null,
    headers,
    body: override.body ?? base.body ?? null
  }
}

import type { HeaderMap } from './types.js'

type RawHeaders = Record<string, string | string[] | number | undefined>

/**
 * Case-insensitive header lookup
 */
export function getHeader(headers: Readonly<HeaderMap>, name: string): string | undefined {
  const needle = name.toLowerCase()
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === needle) {
      return value
    }
  }
  return undefined
}

/**
 * Returns a copy with `name` set, replacing any existing header of the same name
 * regardless of case.
 */
export function setHeader(headers: Readonly<HeaderMap>, name: string, value: string): HeaderMap {
  const result = omitHeaders(headers, [name])
  result[name] = value
  return result
}

export function omitHeaders(headers: Readonly<HeaderMap>, names: string[]): HeaderMap {
  const drop = new Set(names.map(name => name.toLowerCase()))
  const result: HeaderMap = {}
  for (const [key, value] of Object.entries(headers)) {
    if (!drop.has(key.toLowerCase())) {
      result[key] = value
    }
  }
  return result
}

/**
 * Flatten Node-style headers (arrays, numbers, undefined) into a plain string map
 */
export function normalizeHeaders(headers: RawHeaders): HeaderMap {
  const result: HeaderMap = {}
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue
    result[key] = Array.isArray(value) ? value.join(', ') : String(value)
  }
  return result
}

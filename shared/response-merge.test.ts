import { describe, it, expect } from 'vitest'
import { applyModifications, combineModifications, isUnmodified, synthesizeResponse } from './response-merge.js'
import type { ResponseSnapshot } from './types.js'

const original: ResponseSnapshot = {
  statusCode: 200,
  reason: 'OK',
  headers: { 'content-type': 'application/json', 'x-trace': 'abc' },
  body: '{"user":"x"}'
}

describe('response merging', () => {
  it('treats null and all-null overrides as unmodified', () => {
    expect(isUnmodified(null)).toBe(true)
    expect(isUnmodified({ statusCode: null, headers: null, body: null })).toBe(true)
    expect(isUnmodified({ body: '' })).toBe(false)
  })

  it('returns the original when nothing is overridden', () => {
    expect(applyModifications(original, null)).toBe(original)
    expect(applyModifications(original, { statusCode: null })).toBe(original)
  })

  it('overrides status and body and keeps the original headers', () => {
    const merged = applyModifications(original, { statusCode: 404, headers: null, body: '{"error":"x"}' })

    expect(merged).toEqual({
      statusCode: 404,
      reason: 'Not Found',
      headers: { 'content-type': 'application/json', 'x-trace': 'abc' },
      body: '{"error":"x"}'
    })
  })

  it('keeps the original reason when the status is unchanged', () => {
    expect(applyModifications(original, { body: 'changed' }).reason).toBe('OK')
  })

  it('uses an explicit reason', () => {
    expect(applyModifications(original, { statusCode: 500, reason: 'Broken' }).reason).toBe('Broken')
  })

  it('replaces headers one name at a time, ignoring case', () => {
    const merged = applyModifications(original, { headers: { 'Content-Type': 'text/plain', 'x-new': '1' } })

    expect(merged.headers).toEqual({ 'x-trace': 'abc', 'Content-Type': 'text/plain', 'x-new': '1' })
    expect(merged.body).toBe(original.body)
  })

  it('freezes the merged response', () => {
    expect(Object.isFrozen(applyModifications(original, { statusCode: 201 }))).toBe(true)
  })

  it('synthesizes a response from overrides alone', () => {
    expect(synthesizeResponse({ statusCode: 201 })).toEqual({ statusCode: 201, reason: 'Created', headers: {}, body: '' })
    expect(synthesizeResponse({ body: 'hi' })).toEqual({ statusCode: 200, reason: 'OK', headers: {}, body: 'hi' })
  })

  describe('combineModifications', () => {
    const base = { statusCode: 200, headers: { a: '1' }, body: 'mock' }

    it('layers the override on top of the base', () => {
      expect(combineModifications(base, { statusCode: null, headers: { b: '2' }, body: 'edited' })).toEqual({
        statusCode: 200,
        reason: null,
        headers: { a: '1', b: '2' },
        body: 'edited'
      })
    })

    it('keeps the base when the override is empty', () => {
      expect(combineModifications(base, null)).toBe(base)
      expect(combineModifications(base, { body: null })).toBe(base)
    })

    it('returns the override when there is no base', () => {
      const override = { statusCode: 404 }
      expect(combineModifications(null, override)).toBe(override)
      expect(combineModifications(null, {})).toBeNull()
    })
  })
})

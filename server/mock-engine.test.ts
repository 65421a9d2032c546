import { describe, it, expect, vi } from 'vitest'
import type { MockRule, MockRuleMatch, QueryParam, RequestDescriptor } from '../shared/types.js'
import { queryParamsOf } from '../shared/structured-url.js'
import { evaluateRule, findMatchingRule, findMockMatch, synthesizeDecision } from './mock-engine.js'
import { exactParam, silentLogger } from './test-utils/index.js'

let nextSequence = 1

function rule(id: string, match: Partial<MockRuleMatch> = {}, extra: Partial<MockRule> = {}): MockRule {
  return {
    id,
    name: `rule ${id}`,
    enabled: true,
    sequence: nextSequence++,
    createdAt: '2024-01-01T00:00:00.000Z',
    match: { method: 'GET', host: 'api.example.test', path: '/items', queryParams: [], ...match },
    response: { statusCode: 200, headers: { 'content-type': 'application/json' }, body: `{"rule":"${id}"}` },
    ...extra
  }
}

function request(query: Record<string, string> = {}, overrides: Partial<RequestDescriptor> = {}): RequestDescriptor {
  return { method: 'GET', host: 'api.example.test', path: '/items', query, ...overrides }
}

function param(key: string, value: string, matchType: QueryParam['matchType'], required = true): QueryParam {
  return { key, value, required, matchType }
}

describe('mock engine', () => {
  describe('evaluateRule', () => {
    it('matches method, host and path', () => {
      expect(evaluateRule(rule('a'), request())).toEqual({ matched: true, specificity: 0 })
      expect(evaluateRule(rule('a'), request({}, { method: 'get' })).matched).toBe(true)
      expect(evaluateRule(rule('a'), request({}, { method: 'POST' })).matched).toBe(false)
      expect(evaluateRule(rule('a'), request({}, { host: 'other.example.test' })).matched).toBe(false)
      expect(evaluateRule(rule('a'), request({}, { path: '/items/1' })).matched).toBe(false)
    })

    it('requires exact values for required parameters', () => {
      const limited = rule('a', { queryParams: [exactParam('limit', '10')] })

      expect(evaluateRule(limited, request({ limit: '10' }))).toEqual({ matched: true, specificity: 1 })
      expect(evaluateRule(limited, request({ limit: '20' })).matched).toBe(false)
      expect(evaluateRule(limited, request()).matched).toBe(false)
    })

    it('ignores extra request parameters', () => {
      const limited = rule('a', { queryParams: [exactParam('limit', '10')] })

      expect(evaluateRule(limited, request({ limit: '10', offset: '5' }))).toEqual({ matched: true, specificity: 1 })
    })

    it('matches parameters named like object properties', () => {
      const odd = rule('a', { queryParams: [exactParam('__proto__', 'x'), exactParam('toString', 'y')] })

      expect(evaluateRule(odd, request(queryParamsOf('/items?__proto__=x&toString=y')))).toEqual({ matched: true, specificity: 2 })
      expect(evaluateRule(odd, request(queryParamsOf('/items?toString=y'))).matched).toBe(false)
    })

    it('ignores optional parameters', () => {
      const optional = rule('a', { queryParams: [param('limit', '10', 'EXACT', false)] })

      expect(evaluateRule(optional, request({ limit: '99' }))).toEqual({ matched: true, specificity: 0 })
    })

    it('accepts any value for a wildcard parameter that is present', () => {
      const wildcard = rule('a', { queryParams: [param('token', '', 'WILDCARD')] })

      expect(evaluateRule(wildcard, request({ token: 'anything' })).matched).toBe(true)
      expect(evaluateRule(wildcard, request({ token: '' })).matched).toBe(true)
      expect(evaluateRule(wildcard, request()).matched).toBe(false)
    })

    it('anchors regex parameters to the whole value', () => {
      const numeric = rule('a', { queryParams: [param('page', '\\d+', 'REGEX')] })

      expect(evaluateRule(numeric, request({ page: '12' })).matched).toBe(true)
      expect(evaluateRule(numeric, request({ page: '12a' })).matched).toBe(false)
      expect(evaluateRule(rule('b', { queryParams: [param('v', 'a|b', 'REGEX')] }), request({ v: 'ab' })).matched).toBe(false)
    })

    it('never matches a disabled rule', () => {
      expect(evaluateRule(rule('a', {}, { enabled: false }), request()).matched).toBe(false)
    })
  })

  describe('findMatchingRule', () => {
    it('prefers the rule with more required parameters', () => {
      const broad = rule('broad')
      const narrow = rule('narrow', { queryParams: [exactParam('limit', '10')] })

      expect(findMatchingRule([broad, narrow], request({ limit: '10' }))?.id).toBe('narrow')
      expect(findMatchingRule([broad, narrow], request({ limit: '20' }))?.id).toBe('broad')
    })

    it('breaks ties by creation order', () => {
      const older = rule('older')
      const newer = rule('newer')

      expect(findMatchingRule([newer, older], request())?.id).toBe('older')
    })

    it('returns null without a match', () => {
      expect(findMatchingRule([rule('a', { path: '/other' })], request())).toBeNull()
      expect(findMatchingRule([], request())).toBeNull()
    })

    it('skips a rule with an invalid pattern', () => {
      const logger = silentLogger()
      const warn = vi.spyOn(logger, 'warn')
      const broken = rule('broken', { queryParams: [param('q', '(', 'REGEX')] })
      const fallback = rule('fallback')

      expect(findMatchingRule([broken, fallback], request({ q: 'x' }), logger)?.id).toBe('fallback')
      expect(warn).toHaveBeenCalledTimes(1)
    })
  })

  it('synthesizes a decision with defaults', () => {
    const bare = rule('bare', {}, { response: { statusCode: null, headers: null, body: null } })

    expect(synthesizeDecision(bare)).toEqual({ ruleId: 'bare', ruleName: 'rule bare', statusCode: 200, headers: {}, body: '' })
  })

  it('finds the decision of the matching rule', () => {
    const limited = rule('a', { queryParams: [exactParam('limit', '10')] })

    expect(findMockMatch([limited], request({ limit: '10' }))).toEqual({
      ruleId: 'a',
      ruleName: 'rule a',
      statusCode: 200,
      headers: { 'content-type': 'application/json' },
      body: '{"rule":"a"}'
    })
    expect(findMockMatch([limited], request({ limit: '20' }))).toBeNull()
  })
})

import type { MockDecision, MockRule, QueryParam, RequestDescriptor } from '../shared/types.js'
import { toErrorMessage } from '../shared/errors.js'
import type { Logger } from '../shared/logger.js'

export interface RuleEvaluation {
  matched: boolean
  /** Number of required query parameters the request satisfied */
  specificity: number
}

const NO_MATCH: RuleEvaluation = { matched: false, specificity: 0 }

function matchesParam(param: QueryParam, query: Record<string, string>): boolean {
  if (!Object.prototype.hasOwnProperty.call(query, param.key)) {
    return false
  }
  const actual = query[param.key]
  switch (param.matchType) {
    case 'EXACT':
      return actual === param.value
    case 'WILDCARD':
      return true
    case 'REGEX':
      // Throws on an invalid pattern; the caller skips the rule
      return new RegExp(`^(?:${param.value})$`).test(actual)
  }
}

/**
 * Check one rule against a request. Only required query parameters constrain
 * the match; extra request parameters are ignored.
 */
export function evaluateRule(rule: MockRule, request: RequestDescriptor): RuleEvaluation {
  if (!rule.enabled) return NO_MATCH
  if (rule.match.method.toUpperCase() !== request.method.toUpperCase()) return NO_MATCH
  if (rule.match.host !== request.host) return NO_MATCH
  if (rule.match.path !== request.path) return NO_MATCH

  let specificity = 0
  for (const param of rule.match.queryParams) {
    if (!param.required) continue
    if (!matchesParam(param, request.query)) return NO_MATCH
    specificity++
  }
  return { matched: true, specificity }
}

/**
 * Pick the most specific matching rule. Ties go to the rule created first.
 */
export function findMatchingRule(
  rules: readonly MockRule[],
  request: RequestDescriptor,
  logger?: Logger
): MockRule | null {
  let best: MockRule | null = null
  let bestSpecificity = -1

  for (const rule of rules) {
    let evaluation: RuleEvaluation
    try {
      evaluation = evaluateRule(rule, request)
    } catch (err) {
      logger?.warn(`Skipping rule "${rule.name}" (${rule.id}): ${toErrorMessage(err)}`)
      continue
    }
    if (!evaluation.matched) continue

    const better = evaluation.specificity > bestSpecificity
      || (evaluation.specificity === bestSpecificity && best !== null && rule.sequence < best.sequence)
    if (better) {
      best = rule
      bestSpecificity = evaluation.specificity
    }
  }

  return best
}

export function synthesizeDecision(rule: MockRule): MockDecision {
  return {
    ruleId: rule.id,
    ruleName: rule.name,
    statusCode: rule.response.statusCode ?? 200,
    headers: { ...(rule.response.headers ?? {}) },
    body: rule.response.body ?? ''
  }
}

export function findMockMatch(
  rules: readonly MockRule[],
  request: RequestDescriptor,
  logger?: Logger
): MockDecision | null {
  const rule = findMatchingRule(rules, request, logger)
  if (!rule) {
    logger?.debug(`No mock rule for ${request.method} ${request.host}${request.path}`)
    return null
  }
  logger?.debug(`Mock rule "${rule.name}" matched ${request.method} ${request.host}${request.path}`)
  return synthesizeDecision(rule)
}

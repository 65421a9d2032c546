import fs from 'fs/promises'
import type { HeaderMap, MatchType, MockRule, MockRuleMatch, MockRuleResponse, QueryParam } from '../shared/types.js'
import { MalformedPayloadError, UnknownRuleError, toErrorMessage } from '../shared/errors.js'
import { fromUrl, type ParseUrlOptions } from '../shared/structured-url.js'
import { generateId, isRecord } from '../shared/utils.js'
import type { Logger } from '../shared/logger.js'

export interface MockRuleInput {
  name: string
  enabled?: boolean
  match: MockRuleMatch
  response: MockRuleResponse
}

export type RulesListener = (rules: readonly MockRule[]) => void

export interface MockRuleStoreOptions {
  logger: Logger
  /** When set, every mutation is written back to this JSON file */
  file?: string
}

const MATCH_TYPES: readonly MatchType[] = ['EXACT', 'WILDCARD', 'REGEX']

// ============ Validation ============

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || !value.trim()) {
    throw new MalformedPayloadError(`Invalid field "${field}": expected non-empty string`)
  }
  return value.trim()
}

function normalizeQueryParam(value: unknown, index: number): QueryParam {
  if (!isRecord(value)) {
    throw new MalformedPayloadError(`Invalid field "match.queryParams[${index}]": expected object`)
  }
  const matchType = value.matchType === undefined
    ? 'EXACT'
    : MATCH_TYPES.find(candidate => candidate === value.matchType)
  if (!matchType) {
    throw new MalformedPayloadError(
      `Invalid field "match.queryParams[${index}].matchType": expected one of ${MATCH_TYPES.join(', ')}`
    )
  }
  return {
    key: requireString(value.key, `match.queryParams[${index}].key`),
    value: value.value === undefined || value.value === null ? '' : String(value.value),
    required: value.required === true,
    matchType
  }
}

function normalizeHeaderMap(value: unknown, field: string): HeaderMap | null {
  if (value === undefined || value === null) return null
  if (!isRecord(value)) {
    throw new MalformedPayloadError(`Invalid field "${field}": expected object`)
  }
  const headers: HeaderMap = {}
  for (const [name, headerValue] of Object.entries(value)) {
    headers[name] = String(headerValue)
  }
  return headers
}

function normalizeResponse(value: unknown): MockRuleResponse {
  if (value === undefined || value === null) {
    return { statusCode: null, headers: null, body: null }
  }
  if (!isRecord(value)) {
    throw new MalformedPayloadError('Invalid field "response": expected object')
  }

  let statusCode: number | null = null
  if (value.statusCode !== undefined && value.statusCode !== null) {
    const parsed = Number(value.statusCode)
    if (!Number.isInteger(parsed) || parsed < 100 || parsed > 999) {
      throw new MalformedPayloadError('Invalid field "response.statusCode": expected HTTP status code')
    }
    statusCode = parsed
  }

  let body: string | null = null
  if (value.body !== undefined && value.body !== null) {
    body = typeof value.body === 'string' ? value.body : JSON.stringify(value.body)
  }

  return { statusCode, headers: normalizeHeaderMap(value.headers, 'response.headers'), body }
}

/**
 * Validate a rule payload from the API or a rules file.
 */
export function parseRuleInput(body: unknown): MockRuleInput {
  if (!isRecord(body)) {
    throw new MalformedPayloadError('Invalid rule: expected object')
  }
  if (!isRecord(body.match)) {
    throw new MalformedPayloadError('Invalid field "match": expected object')
  }
  const match = body.match
  const params: unknown = match.queryParams ?? []
  if (!Array.isArray(params)) {
    throw new MalformedPayloadError('Invalid field "match.queryParams": expected array')
  }
  const path = match.path === undefined || match.path === '' ? '/' : requireString(match.path, 'match.path')

  return {
    name: requireString(body.name, 'name'),
    enabled: body.enabled !== false,
    match: {
      method: requireString(match.method, 'match.method').toUpperCase(),
      host: requireString(match.host, 'match.host'),
      path,
      queryParams: params.map(normalizeQueryParam)
    },
    response: normalizeResponse(body.response)
  }
}

function decodeQueryText(text: string): string {
  return new URLSearchParams(`v=${text}`).get('v') ?? text
}

function freezeRule(rule: MockRule): MockRule {
  return Object.freeze({
    ...rule,
    match: Object.freeze({ ...rule.match, queryParams: rule.match.queryParams.map(param => Object.freeze({ ...param })) }),
    response: Object.freeze({ ...rule.response })
  })
}

// ============ Store ============

/**
 * Mock rules held as a frozen array that is swapped on every mutation, so a
 * matcher holding a snapshot never sees a half-applied change.
 */
export class MockRuleStore {
  private rules: readonly MockRule[] = Object.freeze([])
  private nextSequence = 1
  private readonly listeners = new Set<RulesListener>()
  private readonly logger: Logger
  private readonly file?: string
  private pendingSave: Promise<void> = Promise.resolve()

  constructor(options: MockRuleStoreOptions) {
    this.logger = options.logger
    this.file = options.file
  }

  snapshot(): readonly MockRule[] {
    return this.rules
  }

  get(ruleId: string): MockRule | undefined {
    return this.rules.find(rule => rule.id === ruleId)
  }

  create(input: MockRuleInput): MockRule {
    const rule = freezeRule({
      id: generateId(),
      name: input.name,
      enabled: input.enabled ?? true,
      sequence: this.nextSequence++,
      createdAt: new Date().toISOString(),
      match: { ...input.match, method: input.match.method.toUpperCase() },
      response: input.response
    })
    this.replace([...this.rules, rule])
    this.logger.info(`Created mock rule "${rule.name}" for ${rule.match.method} ${rule.match.host}${rule.match.path}`)
    return rule
  }

  /**
   * Build a rule whose match criteria comes from a captured URL.
   */
  createFromUrl(
    name: string,
    method: string,
    url: string,
    response: MockRuleResponse,
    options: ParseUrlOptions = {}
  ): MockRule {
    const structured = fromUrl(url, options)
    if (!structured.host) {
      throw new MalformedPayloadError(`Cannot build a rule from URL: ${url}`)
    }
    return this.create({
      name,
      match: {
        method,
        host: structured.host,
        path: structured.path || '/',
        queryParams: structured.queryParams.map(param => ({
          ...param,
          key: decodeQueryText(param.key),
          value: decodeQueryText(param.value)
        }))
      },
      response
    })
  }

  update(ruleId: string, input: MockRuleInput): MockRule {
    const existing = this.require(ruleId)
    const updated = freezeRule({
      ...existing,
      name: input.name,
      enabled: input.enabled ?? existing.enabled,
      match: { ...input.match, method: input.match.method.toUpperCase() },
      response: input.response
    })
    this.replace(this.rules.map(rule => rule.id === ruleId ? updated : rule))
    return updated
  }

  setEnabled(ruleId: string, enabled: boolean): MockRule {
    const existing = this.require(ruleId)
    const updated = freezeRule({ ...existing, enabled })
    this.replace(this.rules.map(rule => rule.id === ruleId ? updated : rule))
    return updated
  }

  remove(ruleId: string): MockRule {
    const existing = this.require(ruleId)
    this.replace(this.rules.filter(rule => rule.id !== ruleId))
    this.logger.info(`Deleted mock rule "${existing.name}"`)
    return existing
  }

  onChange(listener: RulesListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Replace the rule set with the contents of a `{ "rules": [...] }` file. A
   * missing file leaves the store empty; unreadable entries are skipped.
   */
  async load(file = this.file): Promise<number> {
    if (!file) return 0

    let text: string
    try {
      text = await fs.readFile(file, 'utf-8')
    } catch (err) {
      if (isMissingFile(err)) {
        this.logger.info(`No rules file at ${file}`)
        return 0
      }
      throw err
    }

    const payload: unknown = JSON.parse(text)
    const entries: unknown = isRecord(payload) ? payload.rules : payload
    if (!Array.isArray(entries)) {
      throw new MalformedPayloadError(`Rules file ${file} has no "rules" array`)
    }

    const parsed: Array<{ input: MockRuleInput; stored: Record<string, unknown>; order: number }> = []
    for (const [index, entry] of entries.entries()) {
      try {
        const stored: Record<string, unknown> = isRecord(entry) ? entry : {}
        const order = typeof stored.sequence === 'number' ? stored.sequence : Number.POSITIVE_INFINITY
        parsed.push({ input: parseRuleInput(entry), stored, order })
      } catch (err) {
        this.logger.warn(`Skipping rule #${index} in ${file}: ${toErrorMessage(err)}`)
      }
    }
    // Creation order comes from the stored sequence; entries without one follow in file order
    parsed.sort((a, b) => a.order === b.order ? 0 : a.order < b.order ? -1 : 1)

    const loaded: MockRule[] = []
    let sequence = 0
    for (const { input, stored } of parsed) {
      sequence = typeof stored.sequence === 'number' && stored.sequence > sequence ? stored.sequence : sequence + 1
      loaded.push(freezeRule({
        id: typeof stored.id === 'string' && stored.id ? stored.id : generateId(),
        name: input.name,
        enabled: input.enabled ?? true,
        sequence,
        createdAt: typeof stored.createdAt === 'string' ? stored.createdAt : new Date().toISOString(),
        match: input.match,
        response: input.response
      }))
    }

    this.nextSequence = sequence + 1
    this.rules = Object.freeze(loaded)
    this.notify()
    this.logger.info(`Loaded ${loaded.length} mock rule(s) from ${file}`)
    return loaded.length
  }

  async save(file = this.file): Promise<void> {
    if (!file) return
    const payload = JSON.stringify({ rules: this.rules }, null, 2)
    await fs.writeFile(file, payload, 'utf-8')
  }

  /** Resolves once every queued auto-save has been written */
  flush(): Promise<void> {
    return this.pendingSave
  }

  private require(ruleId: string): MockRule {
    const rule = this.get(ruleId)
    if (!rule) {
      throw new UnknownRuleError(ruleId)
    }
    return rule
  }

  private replace(rules: MockRule[]): void {
    this.rules = Object.freeze(rules)
    this.notify()
    if (this.file) {
      const file = this.file
      this.pendingSave = this.pendingSave
        .then(() => this.save(file))
        .catch((err: unknown) => {
          this.logger.error(`Failed to save rules to ${file}: ${toErrorMessage(err)}`)
        })
    }
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.rules)
      } catch (err) {
        this.logger.warn(`Rules listener failed: ${toErrorMessage(err)}`)
      }
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === 'ENOENT'
}

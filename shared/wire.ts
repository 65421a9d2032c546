/**
 * JSON shapes exchanged between agents and the inspector, and the conversions
 * to and from the in-memory model. Field names are snake_case on the wire;
 * timestamps and durations are float seconds.
 */

import type {
  CoordinatorStatus,
  DecisionReason,
  FlowSubmission,
  HeaderMap,
  InterceptMode,
  MockDecision,
  ModifiedResponse,
  RequestDescriptor,
  RequestSnapshot,
  ResponseDecision,
  ResponseSnapshot
} from './types.js'
import { INTERCEPT_MODES } from './types.js'
import { MalformedPayloadError } from './errors.js'
import { isRecord } from './utils.js'

export interface WireRequest {
  method: string
  url: string
  host: string
  path: string
  headers: HeaderMap
  content: string
}

export interface WireResponse {
  status_code: number
  reason: string
  headers: HeaderMap
  content: string
}

export interface WireFlowSubmission {
  flow_id: string
  paused: boolean
  request: WireRequest
  response: WireResponse | null
  timestamp: number
  duration: number
  mock_applied: boolean
  mock_rule_name: string | null
  mock_rule_id: string | null
  transport?: string
}

export interface WireModifiedResponse {
  status_code: number | null
  headers: HeaderMap | null
  content: string | null
  reason?: string | null
}

export interface WireResumeCommand {
  flow_id: string
  modified_response: WireModifiedResponse | null
}

export interface WireMockDecision {
  rule_name: string
  rule_id: string
  status_code: number
  headers: HeaderMap
  content: string
}

export interface WireStatus {
  status: 'running' | 'stopped'
  mode: InterceptMode
  intercepted_count: number
  intercepted_flows: string[]
}

export type WireSubmitReply =
  | {
      status: 'decided'
      flow_id: string
      reason: DecisionReason
      modified_response: WireModifiedResponse | null
      mock_rule_id: string | null
      mock_rule_name: string | null
    }
  | { status: 'pending'; flow_id: string }

const DECISION_REASONS: readonly DecisionReason[] = ['passthrough', 'mock', 'resumed', 'cancelled', 'timeout']

export const MOCK_QUERY_PREFIX = 'query_'

const HEADER_NAME = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/
const HEADER_VALUE_FORBIDDEN = /[\r\n\0]/

// ============ Field readers ============

function fail(path: string, expected: string): never {
  throw new MalformedPayloadError(`Invalid field "${path}": expected ${expected}`)
}

function readRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) fail(path, 'object')
  return value
}

function readString(obj: Record<string, unknown>, key: string, path: string): string {
  const value = obj[key]
  if (typeof value !== 'string') fail(`${path}${key}`, 'string')
  return value
}

function readOptionalString(obj: Record<string, unknown>, key: string, path: string): string | null {
  const value = obj[key]
  if (value === undefined || value === null) return null
  if (typeof value !== 'string') fail(`${path}${key}`, 'string or null')
  return value
}

function readNumber(obj: Record<string, unknown>, key: string, path: string): number {
  const value = obj[key]
  if (typeof value !== 'number' || !Number.isFinite(value)) fail(`${path}${key}`, 'number')
  return value
}

function readOptionalNumber(obj: Record<string, unknown>, key: string, path: string): number | null {
  const value = obj[key]
  if (value === undefined || value === null) return null
  if (typeof value !== 'number' || !Number.isFinite(value)) fail(`${path}${key}`, 'number or null')
  return value
}

function readStatusCode(obj: Record<string, unknown>, key: string, path: string): number | null {
  const value = readOptionalNumber(obj, key, path)
  if (value !== null && (!Number.isInteger(value) || value < 100 || value > 999)) {
    fail(`${path}${key}`, 'HTTP status code')
  }
  return value
}

function readBoolean(obj: Record<string, unknown>, key: string, path: string, fallback: boolean): boolean {
  const value = obj[key]
  if (value === undefined || value === null) return fallback
  if (typeof value !== 'boolean') fail(`${path}${key}`, 'boolean')
  return value
}

function readHeaderMap(value: unknown, path: string): HeaderMap {
  const obj = readRecord(value, path)
  const headers: HeaderMap = {}
  for (const [name, headerValue] of Object.entries(obj)) {
    if (!HEADER_NAME.test(name)) fail(`${path}.${name}`, 'valid header name')
    let text: string
    if (typeof headerValue === 'string') {
      text = headerValue
    } else if (typeof headerValue === 'number' || typeof headerValue === 'boolean') {
      text = String(headerValue)
    } else {
      fail(`${path}.${name}`, 'string')
    }
    if (HEADER_VALUE_FORBIDDEN.test(text)) fail(`${path}.${name}`, 'header value without line breaks')
    headers[name] = text
  }
  return headers
}

// ============ Snapshots ============

export function toWireRequest(request: RequestSnapshot): WireRequest {
  return {
    method: request.method,
    url: request.url,
    host: request.host,
    path: request.path,
    headers: { ...request.headers },
    content: request.body
  }
}

export function toWireResponse(response: ResponseSnapshot): WireResponse {
  return {
    status_code: response.statusCode,
    reason: response.reason,
    headers: { ...response.headers },
    content: response.body
  }
}

function parseRequest(value: unknown): RequestSnapshot {
  const obj = readRecord(value, 'request')
  return Object.freeze({
    method: readString(obj, 'method', 'request.'),
    url: readString(obj, 'url', 'request.'),
    host: readString(obj, 'host', 'request.'),
    path: readString(obj, 'path', 'request.'),
    headers: Object.freeze(obj.headers === undefined ? {} : readHeaderMap(obj.headers, 'request.headers')),
    body: readOptionalString(obj, 'content', 'request.') ?? ''
  })
}

function parseResponse(value: unknown): ResponseSnapshot {
  const obj = readRecord(value, 'response')
  const statusCode = readStatusCode(obj, 'status_code', 'response.')
  if (statusCode === null) fail('response.status_code', 'HTTP status code')
  return Object.freeze({
    statusCode,
    reason: readOptionalString(obj, 'reason', 'response.') ?? '',
    headers: Object.freeze(obj.headers === undefined ? {} : readHeaderMap(obj.headers, 'response.headers')),
    body: readOptionalString(obj, 'content', 'response.') ?? ''
  })
}

// ============ Flow submission ============

export function toWireSubmission(submission: FlowSubmission): WireFlowSubmission {
  const wire: WireFlowSubmission = {
    flow_id: submission.sourceFlowId ?? '',
    paused: submission.paused ?? false,
    request: toWireRequest(submission.request),
    response: submission.response ? toWireResponse(submission.response) : null,
    timestamp: submission.timestamp / 1000,
    duration: submission.duration / 1000,
    mock_applied: submission.mockApplied,
    mock_rule_name: submission.mockRuleName,
    mock_rule_id: submission.mockRuleId
  }
  if (submission.transport) {
    wire.transport = submission.transport
  }
  return wire
}

export function parseFlowSubmission(body: unknown): FlowSubmission {
  const obj = readRecord(body, 'submission')
  const flowId = readOptionalString(obj, 'flow_id', '')
  const timestamp = readOptionalNumber(obj, 'timestamp', '')
  const duration = readOptionalNumber(obj, 'duration', '')
  const transport = readOptionalString(obj, 'transport', '')

  return {
    sourceFlowId: flowId || undefined,
    transport: transport || undefined,
    paused: readBoolean(obj, 'paused', '', false),
    request: parseRequest(obj.request),
    response: obj.response === undefined || obj.response === null ? null : parseResponse(obj.response),
    timestamp: timestamp === null ? Date.now() : Math.round(timestamp * 1000),
    duration: duration === null ? 0 : Math.max(0, Math.round(duration * 1000)),
    mockApplied: readBoolean(obj, 'mock_applied', '', false),
    mockRuleName: readOptionalString(obj, 'mock_rule_name', ''),
    mockRuleId: readOptionalString(obj, 'mock_rule_id', '')
  }
}

// ============ Resume ============

export function toWireModified(modified: ModifiedResponse | null): WireModifiedResponse | null {
  if (!modified) return null
  const wire: WireModifiedResponse = {
    status_code: modified.statusCode ?? null,
    headers: modified.headers ? { ...modified.headers } : null,
    content: modified.body ?? null
  }
  if (modified.reason != null) {
    wire.reason = modified.reason
  }
  return wire
}

export function parseModifiedResponse(value: unknown): ModifiedResponse | null {
  if (value === undefined || value === null) return null
  const obj = readRecord(value, 'modified_response')
  return {
    statusCode: readStatusCode(obj, 'status_code', 'modified_response.'),
    reason: readOptionalString(obj, 'reason', 'modified_response.'),
    headers: obj.headers === undefined || obj.headers === null
      ? null
      : readHeaderMap(obj.headers, 'modified_response.headers'),
    body: readOptionalString(obj, 'content', 'modified_response.')
  }
}

export function toWireResume(flowId: string, modified: ModifiedResponse | null): WireResumeCommand {
  return { flow_id: flowId, modified_response: toWireModified(modified) }
}

export function parseResumeCommand(body: unknown): { flowId: string; modified: ModifiedResponse | null } {
  const obj = readRecord(body, 'resume')
  const flowId = readString(obj, 'flow_id', '')
  if (!flowId) fail('flow_id', 'non-empty string')
  return { flowId, modified: parseModifiedResponse(obj.modified_response) }
}

// ============ Submit reply ============

export function toSubmitReply(decision: ResponseDecision): WireSubmitReply {
  return {
    status: 'decided',
    flow_id: decision.flowId,
    reason: decision.reason,
    modified_response: toWireModified(decision.modified),
    mock_rule_id: decision.mockRule?.id ?? null,
    mock_rule_name: decision.mockRule?.name ?? null
  }
}

export function parseSubmitReply(body: unknown): WireSubmitReply {
  const obj = readRecord(body, 'reply')
  const status = readString(obj, 'status', '')
  const flowId = readString(obj, 'flow_id', '')
  if (status === 'pending') {
    return { status: 'pending', flow_id: flowId }
  }
  if (status !== 'decided') fail('status', '"decided" or "pending"')

  const reasonValue = readOptionalString(obj, 'reason', '') ?? 'passthrough'
  const reason = DECISION_REASONS.find(candidate => candidate === reasonValue)
  if (!reason) fail('reason', 'decision reason')

  const modified = parseModifiedResponse(obj.modified_response)
  return {
    status: 'decided',
    flow_id: flowId,
    reason,
    modified_response: toWireModified(modified),
    mock_rule_id: readOptionalString(obj, 'mock_rule_id', ''),
    mock_rule_name: readOptionalString(obj, 'mock_rule_name', '')
  }
}

export function decisionFromReply(reply: Extract<WireSubmitReply, { status: 'decided' }>): ResponseDecision {
  const decision: ResponseDecision = {
    flowId: reply.flow_id,
    reason: reply.reason,
    modified: parseModifiedResponse(reply.modified_response)
  }
  if (reply.mock_rule_id) {
    decision.mockRule = { id: reply.mock_rule_id, name: reply.mock_rule_name ?? '' }
  }
  return decision
}

// ============ Mock query ============

export function toMockQuery(descriptor: RequestDescriptor): Record<string, string> {
  const params: Record<string, string> = {
    method: descriptor.method,
    host: descriptor.host,
    path: descriptor.path
  }
  for (const [key, value] of Object.entries(descriptor.query)) {
    params[`${MOCK_QUERY_PREFIX}${key}`] = value
  }
  return params
}

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (Array.isArray(value)) {
    const first: unknown = value[0]
    return typeof first === 'string' ? first : undefined
  }
  return undefined
}

export function parseMockQuery(params: Record<string, unknown>): RequestDescriptor {
  const method = firstString(params.method) ?? ''
  const host = firstString(params.host) ?? ''
  if (!method || !host) {
    throw new MalformedPayloadError('Missing method or host parameter')
  }

  const query: Record<string, string> = Object.create(null)
  for (const [key, value] of Object.entries(params)) {
    if (!key.startsWith(MOCK_QUERY_PREFIX)) continue
    const text = firstString(value)
    if (text !== undefined) {
      query[key.slice(MOCK_QUERY_PREFIX.length)] = text
    }
  }

  return { method, host, path: firstString(params.path) || '/', query }
}

export function toWireMockDecision(decision: MockDecision): WireMockDecision {
  return {
    rule_name: decision.ruleName,
    rule_id: decision.ruleId,
    status_code: decision.statusCode,
    headers: { ...decision.headers },
    content: decision.body
  }
}

/**
 * An empty object means "no matching rule".
 */
export function parseMockDecision(body: unknown): MockDecision | null {
  const obj = readRecord(body, 'mock decision')
  if (Object.keys(obj).length === 0) return null
  const statusCode = readStatusCode(obj, 'status_code', '')
  return {
    ruleId: readString(obj, 'rule_id', ''),
    ruleName: readOptionalString(obj, 'rule_name', '') ?? '',
    statusCode: statusCode ?? 200,
    headers: obj.headers === undefined || obj.headers === null ? {} : readHeaderMap(obj.headers, 'headers'),
    body: readOptionalString(obj, 'content', '') ?? ''
  }
}

// ============ Status ============

export function toWireStatus(status: CoordinatorStatus): WireStatus {
  return {
    status: status.running ? 'running' : 'stopped',
    mode: status.mode,
    intercepted_count: status.interceptedCount,
    intercepted_flows: [...status.interceptedFlows]
  }
}

export function parseInterceptMode(value: unknown): InterceptMode {
  const mode = INTERCEPT_MODES.find(candidate => candidate === value)
  if (!mode) {
    throw new MalformedPayloadError(`Invalid mode: expected one of ${INTERCEPT_MODES.join(', ')}`)
  }
  return mode
}

import { Logger } from '../../shared/logger.js'
import type { FlowSubmission, MockRuleMatch, QueryParam, RequestSnapshot, ResponseSnapshot } from '../../shared/types.js'
import type { InspectorConfig } from '../config.js'
import type { MockRuleInput } from '../rule-store.js'

export function silentLogger(context = 'test'): Logger {
  return new Logger(context, { level: 'silent' })
}

export function makeRequest(overrides: Partial<RequestSnapshot> = {}): RequestSnapshot {
  return {
    method: 'GET',
    url: 'https://api.example.test/items?limit=10',
    host: 'api.example.test',
    path: '/items?limit=10',
    headers: { accept: 'application/json' },
    body: '',
    ...overrides
  }
}

export function makeResponse(overrides: Partial<ResponseSnapshot> = {}): ResponseSnapshot {
  return {
    statusCode: 200,
    reason: 'OK',
    headers: { 'content-type': 'application/json', 'x-trace': 'abc' },
    body: '{"items":[]}',
    ...overrides
  }
}

export function makeSubmission(overrides: Partial<FlowSubmission> = {}): FlowSubmission {
  return {
    sourceFlowId: 'agent-flow-1',
    transport: 'test',
    request: makeRequest(),
    response: makeResponse(),
    timestamp: 1_700_000_000_000,
    duration: 25,
    mockApplied: false,
    mockRuleName: null,
    mockRuleId: null,
    ...overrides
  }
}

export function exactParam(key: string, value: string): QueryParam {
  return { key, value, required: true, matchType: 'EXACT' }
}

export function ruleInput(name: string, match: Partial<MockRuleMatch> = {}, body = `{"rule":"${name}"}`): MockRuleInput {
  return {
    name,
    match: {
      method: 'GET',
      host: 'api.example.test',
      path: '/items',
      queryParams: [],
      ...match
    },
    response: { statusCode: 200, headers: { 'content-type': 'application/json' }, body }
  }
}

export function inspectorConfig(overrides: Partial<InspectorConfig> = {}): InspectorConfig {
  return {
    port: 0,
    host: '127.0.0.1',
    mode: 'recording',
    holdTimeoutMs: 0,
    maxFlows: 100,
    logging: { level: 'silent', colorize: false },
    ...overrides
  }
}

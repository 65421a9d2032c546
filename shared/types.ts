export type HeaderMap = Record<string, string>

export interface RequestSnapshot {
  readonly method: string
  readonly url: string
  readonly host: string
  /** Path as captured, including the query string */
  readonly path: string
  readonly headers: Readonly<HeaderMap>
  readonly body: string
}

export interface ResponseSnapshot {
  readonly statusCode: number
  readonly reason: string
  readonly headers: Readonly<HeaderMap>
  readonly body: string
}

/**
 * Overrides applied on resume. A null or missing field keeps the original value.
 */
export interface ModifiedResponse {
  statusCode?: number | null
  reason?: string | null
  headers?: HeaderMap | null
  body?: string | null
}

export type FlowState = 'pending' | 'paused' | 'resumed' | 'completed'

export type InterceptMode = 'recording' | 'debug' | 'mock' | 'mock_debug'

export const INTERCEPT_MODES: readonly InterceptMode[] = ['recording', 'debug', 'mock', 'mock_debug']

export interface MockRuleRef {
  id: string
  name: string
}

export interface Flow {
  readonly id: string
  /** Id assigned by the agent that captured the transaction */
  readonly sourceFlowId?: string
  readonly transport?: string
  readonly request: RequestSnapshot
  readonly response?: ResponseSnapshot
  /** Capture time, epoch milliseconds */
  readonly timestamp: number
  /** Milliseconds */
  readonly duration: number
  readonly state: FlowState
  readonly mockRule?: MockRuleRef
  /** What was delivered back to the transport; null means unmodified */
  readonly resolution?: ModifiedResponse | null
  readonly modified: boolean
}

export type MatchType = 'EXACT' | 'WILDCARD' | 'REGEX'

export interface QueryParam {
  key: string
  value: string
  required: boolean
  matchType: MatchType
}

export interface StructuredUrl {
  scheme: string
  host: string
  port?: number
  path: string
  queryParams: QueryParam[]
}

export interface MockRuleMatch {
  method: string
  host: string
  path: string
  queryParams: QueryParam[]
}

export interface MockRuleResponse {
  statusCode?: number | null
  headers?: HeaderMap | null
  body?: string | null
}

export interface MockRule {
  readonly id: string
  readonly name: string
  readonly enabled: boolean
  /** Creation order, used to break specificity ties */
  readonly sequence: number
  readonly createdAt: string
  readonly match: Readonly<MockRuleMatch>
  readonly response: Readonly<MockRuleResponse>
}

/**
 * What the mock engine needs to know about a request
 */
export interface RequestDescriptor {
  method: string
  host: string
  /** Path without the query string */
  path: string
  query: Record<string, string>
}

export interface MockDecision {
  ruleId: string
  ruleName: string
  statusCode: number
  headers: HeaderMap
  body: string
}

/**
 * A captured transaction handed to the coordinator by a transport adapter
 */
export interface FlowSubmission {
  sourceFlowId?: string
  transport?: string
  paused?: boolean
  request: RequestSnapshot
  response: ResponseSnapshot | null
  /** Epoch milliseconds */
  timestamp: number
  /** Milliseconds */
  duration: number
  mockApplied: boolean
  mockRuleName: string | null
  mockRuleId: string | null
}

export type DecisionReason = 'passthrough' | 'mock' | 'resumed' | 'cancelled' | 'timeout'

export interface ResponseDecision {
  flowId: string
  /** null means deliver the original response untouched */
  modified: ModifiedResponse | null
  reason: DecisionReason
  mockRule?: MockRuleRef
}

export interface CoordinatorStatus {
  running: boolean
  mode: InterceptMode
  interceptedCount: number
  interceptedFlows: string[]
}

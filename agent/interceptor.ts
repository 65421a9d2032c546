import type { ControlChannel } from '../shared/control-channel.js'
import { toErrorMessage } from '../shared/errors.js'
import { omitHeaders } from '../shared/headers.js'
import type { Logger } from '../shared/logger.js'
import { applyModifications, isUnmodified, synthesizeResponse } from '../shared/response-merge.js'
import { describeRequest } from '../shared/structured-url.js'
import type { FlowSubmission, HeaderMap, MockDecision, RequestSnapshot, ResponseSnapshot } from '../shared/types.js'
import { generateId } from '../shared/utils.js'
import { awaitDecision } from './decision.js'

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>

export interface InterceptedFetchOptions {
  logger: Logger
  /** When false, calls go straight to `baseFetch` */
  enabled?: boolean
  /** Label recorded on every flow */
  transport?: string
  /** Answer from a matching mock rule without contacting the upstream */
  queryMockFirst?: boolean
  baseFetch?: FetchLike
  /** Skip interception while this resolves false */
  isReachable?: () => Promise<boolean>
}

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304])

// The body handed back is already decoded, so these no longer describe it
const STALE_HEADERS = ['content-encoding', 'content-length', 'transfer-encoding']

function headersToMap(headers: Headers): HeaderMap {
  const map: HeaderMap = {}
  headers.forEach((value, key) => {
    map[key] = value
  })
  return map
}

async function snapshotRequest(request: Request): Promise<RequestSnapshot> {
  const url = new URL(request.url)
  const body = request.body ? await request.clone().text() : ''
  return Object.freeze({
    method: request.method,
    url: request.url,
    host: url.host,
    path: url.pathname + url.search,
    headers: Object.freeze(headersToMap(request.headers)),
    body
  })
}

function toFetchResponse(snapshot: ResponseSnapshot, rawBody?: Uint8Array): Response {
  const nullBody = NULL_BODY_STATUSES.has(snapshot.statusCode)
  const body = nullBody ? null : rawBody ?? snapshot.body
  return new Response(body, {
    status: snapshot.statusCode,
    statusText: snapshot.reason,
    headers: omitHeaders(snapshot.headers, STALE_HEADERS)
  })
}

function isDeliverableStatus(status: number): boolean {
  return status >= 200 && status <= 599
}

function mockSnapshot(mock: MockDecision): ResponseSnapshot {
  return synthesizeResponse({ statusCode: mock.statusCode, headers: mock.headers, body: mock.body })
}

/**
 * Wrap a fetch function so that every call is reported to the inspector, and
 * the response it hands back is the one the inspector decided on. When the
 * inspector cannot be reached the original response is returned.
 */
export function createInterceptedFetch(channel: ControlChannel, options: InterceptedFetchOptions): FetchLike {
  const { logger, isReachable } = options
  const enabled = options.enabled ?? true
  const transport = options.transport ?? 'interceptor'
  const baseFetch: FetchLike = options.baseFetch ?? fetch

  async function queryMock(request: RequestSnapshot): Promise<MockDecision | null> {
    try {
      return await channel.queryMock(describeRequest(request))
    } catch (err) {
      logger.warn(`Mock lookup failed for ${request.url}: ${toErrorMessage(err)}`)
      return null
    }
  }

  async function deliver(
    submission: FlowSubmission,
    original: ResponseSnapshot,
    rawBody?: Uint8Array
  ): Promise<Response> {
    const decision = await awaitDecision(channel, submission, logger)
    if (!decision || isUnmodified(decision.modified)) {
      return toFetchResponse(original, rawBody)
    }

    // Without a body override the captured bytes go out as they arrived
    const keptBody = decision.modified?.body == null ? rawBody : undefined
    let merged = applyModifications(original, decision.modified)
    if (!isDeliverableStatus(merged.statusCode)) {
      logger.warn(`Ignoring status ${merged.statusCode} for ${submission.request.url}`)
      merged = { ...merged, statusCode: original.statusCode, reason: original.reason }
    }
    try {
      return toFetchResponse(merged, keptBody)
    } catch (err) {
      logger.warn(`Discarding edit for ${submission.request.url}: ${toErrorMessage(err)}`)
      return toFetchResponse(original, rawBody)
    }
  }

  return async (input, init) => {
    if (!enabled) {
      return baseFetch(input, init)
    }
    if (isReachable && !(await isReachable())) {
      return baseFetch(input, init)
    }

    const request = new Request(input, init)
    const snapshot = await snapshotRequest(request)
    const started = Date.now()
    const base = {
      sourceFlowId: generateId(),
      transport,
      request: snapshot,
      timestamp: started
    }

    if (options.queryMockFirst) {
      const mock = await queryMock(snapshot)
      if (mock) {
        logger.info(`Answering ${snapshot.method} ${snapshot.url} from mock "${mock.ruleName}"`)
        const mocked = mockSnapshot(mock)
        return deliver({
          ...base,
          response: mocked,
          duration: Date.now() - started,
          mockApplied: true,
          mockRuleName: mock.ruleName,
          mockRuleId: mock.ruleId
        }, mocked)
      }
    }

    const upstream = await baseFetch(request)
    const rawBody = new Uint8Array(await upstream.arrayBuffer())
    const original: ResponseSnapshot = Object.freeze({
      statusCode: upstream.status,
      reason: upstream.statusText,
      headers: Object.freeze(omitHeaders(headersToMap(upstream.headers), STALE_HEADERS)),
      body: Buffer.from(rawBody).toString('utf-8')
    })

    return deliver({
      ...base,
      response: original,
      duration: Date.now() - started,
      mockApplied: false,
      mockRuleName: null,
      mockRuleId: null
    }, original, rawBody)
  }
}

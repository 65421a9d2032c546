import { setTimeout as sleep } from 'timers/promises'
import type { ControlChannel, ResumeAck, SubmitOutcome } from '../shared/control-channel.js'
import {
  AlreadyResumedError,
  InvalidStateError,
  MalformedPayloadError,
  UnknownFlowError,
  toErrorMessage
} from '../shared/errors.js'
import type { Logger } from '../shared/logger.js'
import type { FlowSubmission, MockDecision, ModifiedResponse, RequestDescriptor, ResponseDecision } from '../shared/types.js'
import { isRecord } from '../shared/utils.js'
import {
  decisionFromReply,
  parseMockDecision,
  parseSubmitReply,
  toMockQuery,
  toWireResume,
  toWireSubmission
} from '../shared/wire.js'

export interface HttpControlChannelOptions {
  /** Inspector base URL, e.g. http://127.0.0.1:8765 */
  baseUrl: string
  logger: Logger
  /** Timeout for ordinary control calls; decision polls wait indefinitely */
  timeoutMs?: number
  pingTimeoutMs?: number
  /** How long a ping result is reused */
  pingCacheMs?: number
  /** Consecutive ping failures after which the inspector is considered gone */
  maxPingFailures?: number
  fetch?: typeof fetch
}

const JSON_HEADERS = { 'content-type': 'application/json' }
const POLL_RETRY_DELAY_MS = 250

/**
 * Control channel spoken by agents running outside the inspector process.
 */
export class HttpControlChannel implements ControlChannel {
  private readonly baseUrl: string
  private readonly logger: Logger
  private readonly timeoutMs: number
  private readonly pingTimeoutMs: number
  private readonly pingCacheMs: number
  private readonly maxPingFailures: number
  private readonly fetchImpl: typeof fetch

  private lastPingAt = 0
  private lastPingResult = false
  private pingFailures = 0

  constructor(options: HttpControlChannelOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.logger = options.logger
    this.timeoutMs = options.timeoutMs ?? 2000
    this.pingTimeoutMs = options.pingTimeoutMs ?? 500
    this.pingCacheMs = options.pingCacheMs ?? 5000
    this.maxPingFailures = options.maxPingFailures ?? 3
    this.fetchImpl = options.fetch ?? fetch
  }

  async submit(submission: FlowSubmission): Promise<SubmitOutcome> {
    const res = await this.call('/intercept', {
      method: 'POST',
      headers: JSON_HEADERS,
      body: JSON.stringify(toWireSubmission(submission))
    })
    if (!res.ok) {
      throw await errorFromResponse(res)
    }

    const reply = parseSubmitReply(await res.json())
    if (reply.status === 'decided') {
      return { kind: 'decided', flowId: reply.flow_id, decision: decisionFromReply(reply) }
    }
    this.logger.debug(`Flow ${reply.flow_id} is held by the inspector`)
    return { kind: 'pending', flowId: reply.flow_id, decision: this.pollDecision(reply.flow_id) }
  }

  async resume(flowId: string, modified: ModifiedResponse | null): Promise<ResumeAck> {
    const res = await this.call('/resume', {
      method: 'POST',
      headers: JSON_HEADERS,
      body: JSON.stringify(toWireResume(flowId, modified))
    })
    if (!res.ok) {
      throw await errorFromResponse(res, flowId)
    }
    return { flowId, status: 'resumed' }
  }

  async queryMock(descriptor: RequestDescriptor): Promise<MockDecision | null> {
    const query = new URLSearchParams(toMockQuery(descriptor))
    const res = await this.call(`/mock-match?${query.toString()}`, { method: 'GET' })
    if (res.status === 404) {
      return null
    }
    if (!res.ok) {
      throw await errorFromResponse(res)
    }
    return parseMockDecision(await res.json())
  }

  /**
   * Whether the inspector answers pings. Results are cached, and after
   * `maxPingFailures` consecutive failures the channel stops probing until
   * `resetLiveness()`.
   */
  async isReachable(): Promise<boolean> {
    if (this.pingFailures >= this.maxPingFailures) {
      return false
    }
    if (Date.now() - this.lastPingAt < this.pingCacheMs) {
      return this.lastPingResult
    }

    const alive = await this.ping()
    this.lastPingAt = Date.now()
    this.lastPingResult = alive
    if (alive) {
      this.pingFailures = 0
    } else {
      this.pingFailures++
      if (this.pingFailures >= this.maxPingFailures) {
        this.logger.warn(`Inspector at ${this.baseUrl} unreachable after ${this.pingFailures} attempts, interception disabled`)
      }
    }
    return alive
  }

  resetLiveness(): void {
    this.lastPingAt = 0
    this.lastPingResult = false
    this.pingFailures = 0
  }

  async ping(): Promise<boolean> {
    try {
      const res = await this.fetchImpl(`${this.baseUrl}/ping`, {
        signal: AbortSignal.timeout(this.pingTimeoutMs)
      })
      if (!res.ok) return false
      return (await res.text()).trim() === 'PONG'
    } catch (err) {
      this.logger.debug(`Ping failed: ${toErrorMessage(err)}`)
      return false
    }
  }

  /**
   * Wait for the inspector to resolve a held flow. Dropped polls are retried
   * for as long as the inspector still answers pings.
   */
  private async pollDecision(flowId: string): Promise<ResponseDecision> {
    for (;;) {
      let res: Response
      try {
        res = await this.fetchImpl(`${this.baseUrl}/flows/${encodeURIComponent(flowId)}/decision`)
      } catch (err) {
        if (await this.ping()) {
          this.logger.debug(`Decision poll for ${flowId} dropped, retrying: ${toErrorMessage(err)}`)
          await sleep(POLL_RETRY_DELAY_MS)
          continue
        }
        throw err
      }

      if (!res.ok) {
        throw await errorFromResponse(res, flowId)
      }
      const reply = parseSubmitReply(await res.json())
      if (reply.status !== 'decided') {
        throw new MalformedPayloadError(`Expected a decision for flow ${flowId}`)
      }
      return decisionFromReply(reply)
    }
  }

  private call(path: string, init: RequestInit): Promise<Response> {
    return this.fetchImpl(`${this.baseUrl}${path}`, {
      ...init,
      signal: AbortSignal.timeout(this.timeoutMs)
    })
  }
}

async function errorFromResponse(res: Response, flowId = ''): Promise<Error> {
  let code = ''
  let message = `Inspector answered ${res.status}`
  const text = await res.text()
  if (text) {
    const body: unknown = safeJson(text)
    if (isRecord(body)) {
      if (typeof body.error === 'string') code = body.error
      if (typeof body.message === 'string') message = body.message
    }
  }

  switch (code) {
    case 'UNKNOWN_FLOW':
      return new UnknownFlowError(flowId)
    case 'ALREADY_RESUMED':
      return new AlreadyResumedError(flowId)
    case 'INVALID_STATE':
      return new InvalidStateError(flowId, 'unknown', 'resume')
    case 'MALFORMED_PAYLOAD':
      return new MalformedPayloadError(message)
    default:
      return new InspectorResponseError(res.status, message)
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

/**
 * Any other non-success answer from the inspector
 */
export class InspectorResponseError extends Error {
  constructor(readonly status: number, message: string) {
    super(message)
    this.name = 'InspectorResponseError'
  }
}

import type {
  CoordinatorStatus,
  DecisionReason,
  FlowSubmission,
  InterceptMode,
  MockDecision,
  MockRuleRef,
  ModifiedResponse,
  RequestDescriptor,
  ResponseDecision,
  ResponseSnapshot
} from '../shared/types.js'
import type { SubmitOutcome } from '../shared/control-channel.js'
import { AlreadyResumedError, UnknownFlowError, toErrorMessage } from '../shared/errors.js'
import { applyModifications, combineModifications, synthesizeResponse } from '../shared/response-merge.js'
import { describeRequest } from '../shared/structured-url.js'
import type { Logger } from '../shared/logger.js'
import { DEFAULT_MAX_FLOWS, type FlowResolution, type FlowStore } from './flow-store.js'
import { findMockMatch } from './mock-engine.js'
import type { MockRuleStore } from './rule-store.js'

export interface FlowCoordinatorOptions {
  flows: FlowStore
  rules: MockRuleStore
  logger: Logger
  mode?: InterceptMode
  /** Resume a held flow unmodified after this many ms; 0 waits indefinitely */
  holdTimeoutMs?: number
  /** How many finished decisions stay available to late pollers */
  decisionHistory?: number
}

export type ModeListener = (mode: InterceptMode) => void

const PAUSING_MODES: ReadonlySet<InterceptMode> = new Set(['debug', 'mock_debug'])

export function isPausingMode(mode: InterceptMode): boolean {
  return PAUSING_MODES.has(mode)
}

export function mockToModified(decision: MockDecision): ModifiedResponse {
  return {
    statusCode: decision.statusCode,
    headers: { ...decision.headers },
    body: decision.body
  }
}

/**
 * What the transport ends up delivering, for display in the flow list.
 */
function deliveredResponse(
  original: ResponseSnapshot | null,
  modified: ModifiedResponse | null
): ResponseSnapshot | undefined {
  if (original) return applyModifications(original, modified)
  return modified ? synthesizeResponse(modified) : undefined
}

/**
 * Decides what happens to every submitted flow according to the current mode:
 * record it, answer it from a mock rule, or hold it until an operator resumes it.
 */
export class FlowCoordinator {
  private mode: InterceptMode
  private running = true
  private readonly flows: FlowStore
  private readonly rules: MockRuleStore
  private readonly logger: Logger
  private readonly holdTimeoutMs: number
  private readonly decisionHistory: number
  private readonly pending = new Map<string, Promise<ResponseDecision>>()
  private readonly settled = new Map<string, ResponseDecision>()
  private readonly modeListeners = new Set<ModeListener>()

  constructor(options: FlowCoordinatorOptions) {
    this.flows = options.flows
    this.rules = options.rules
    this.logger = options.logger
    this.mode = options.mode ?? 'recording'
    this.holdTimeoutMs = Math.max(0, options.holdTimeoutMs ?? 0)
    this.decisionHistory = options.decisionHistory ?? DEFAULT_MAX_FLOWS
  }

  get currentMode(): InterceptMode {
    return this.mode
  }

  get isRunning(): boolean {
    return this.running
  }

  async submit(submission: FlowSubmission): Promise<SubmitOutcome> {
    const { request } = submission
    const mode = this.mode

    if (!this.running) {
      return this.decide(submission, null, 'passthrough')
    }

    const appliedRule: MockRuleRef | undefined = submission.mockApplied
      ? { id: submission.mockRuleId ?? '', name: submission.mockRuleName ?? '' }
      : undefined

    if (appliedRule) {
      this.logger.debug(`Agent answered ${request.method} ${request.url} from mock "${appliedRule.name}"`)
      if (isPausingMode(mode)) {
        return this.hold(submission, null, appliedRule)
      }
      return this.decide(submission, null, 'passthrough', appliedRule)
    }

    switch (mode) {
      case 'recording':
        return this.decide(submission, null, 'passthrough')

      case 'debug':
        return this.hold(submission, null)

      case 'mock': {
        const match = this.queryMock(describeRequest(request))
        if (!match) {
          return this.decide(submission, null, 'passthrough')
        }
        return this.decide(submission, mockToModified(match), 'mock', { id: match.ruleId, name: match.ruleName })
      }

      case 'mock_debug': {
        const match = this.queryMock(describeRequest(request))
        if (!match) {
          return this.hold(submission, null)
        }
        return this.hold(submission, mockToModified(match), { id: match.ruleId, name: match.ruleName })
      }
    }
  }

  /**
   * Deliver an operator's decision for a held flow. Throws UnknownFlowError,
   * AlreadyResumedError or InvalidStateError.
   */
  resume(flowId: string, modified: ModifiedResponse | null): void {
    this.flows.resume(flowId, modified)
    this.logger.info(`Resumed flow ${flowId}${modified ? ' with modifications' : ''}`)
  }

  queryMock(descriptor: RequestDescriptor): MockDecision | null {
    return findMockMatch(this.rules.snapshot(), descriptor, this.logger)
  }

  /**
   * The decision for a flow, waiting for it if the flow is still held.
   */
  awaitDecision(flowId: string): Promise<ResponseDecision> {
    const waiting = this.pending.get(flowId)
    if (waiting) return waiting

    const decision = this.settled.get(flowId)
    if (decision) return Promise.resolve(decision)

    return Promise.reject(new UnknownFlowError(flowId))
  }

  switchMode(mode: InterceptMode): void {
    if (mode === this.mode) return
    const previous = this.mode
    this.mode = mode
    this.logger.info(`Mode changed: ${previous} -> ${mode}`)

    if (!isPausingMode(mode)) {
      this.flows.cancelAll(`mode switched to ${mode}`)
    }

    for (const listener of this.modeListeners) {
      try {
        listener(mode)
      } catch (err) {
        this.logger.warn(`Mode listener failed: ${toErrorMessage(err)}`)
      }
    }
  }

  onModeChange(listener: ModeListener): () => void {
    this.modeListeners.add(listener)
    return () => {
      this.modeListeners.delete(listener)
    }
  }

  /**
   * Release every held flow and stop holding new ones. Returns how many flows
   * were released.
   */
  stop(): number {
    if (!this.running) return 0
    const released = this.flows.cancelAll('session stopped')
    this.running = false
    this.logger.info('Coordinator stopped')
    return released
  }

  status(): CoordinatorStatus {
    const interceptedFlows = this.flows.pausedIds()
    return {
      running: this.running,
      mode: this.mode,
      interceptedCount: interceptedFlows.length,
      interceptedFlows
    }
  }

  private decide(
    submission: FlowSubmission,
    modified: ModifiedResponse | null,
    reason: DecisionReason,
    mockRule?: MockRuleRef
  ): SubmitOutcome {
    const flowId = this.flows.create(submission.request, {
      sourceFlowId: submission.sourceFlowId,
      transport: submission.transport,
      timestamp: submission.timestamp,
      duration: submission.duration,
      mockRule
    })
    this.flows.complete(flowId, {
      response: deliveredResponse(submission.response, modified),
      resolution: modified
    })

    const decision: ResponseDecision = { flowId, modified, reason }
    if (mockRule) decision.mockRule = mockRule
    this.remember(decision)

    if (reason === 'mock') {
      this.logger.info(`Mocked ${submission.request.method} ${submission.request.url} with "${mockRule?.name ?? ''}"`)
    }
    return { kind: 'decided', flowId, decision }
  }

  private hold(
    submission: FlowSubmission,
    base: ModifiedResponse | null,
    mockRule?: MockRuleRef
  ): SubmitOutcome {
    const flowId = this.flows.create(submission.request, {
      sourceFlowId: submission.sourceFlowId,
      transport: submission.transport,
      timestamp: submission.timestamp,
      duration: submission.duration,
      response: deliveredResponse(submission.response, base),
      mockRule
    })
    const waiting = this.flows.pause(flowId)
    this.logger.info(`Holding ${submission.request.method} ${submission.request.url} (${flowId})`)

    let timer: NodeJS.Timeout | undefined
    if (this.holdTimeoutMs > 0) {
      timer = setTimeout(() => this.expire(flowId), this.holdTimeoutMs)
    }

    const decision = waiting.then((resolution) => {
      if (timer) clearTimeout(timer)
      return this.finish(flowId, submission, base, resolution, mockRule)
    })
    this.pending.set(flowId, decision)
    return { kind: 'pending', flowId, decision }
  }

  private finish(
    flowId: string,
    submission: FlowSubmission,
    base: ModifiedResponse | null,
    resolution: FlowResolution,
    mockRule?: MockRuleRef
  ): ResponseDecision {
    // A cancelled flow goes out exactly as captured, even when a mock was staged
    const modified = resolution.reason === 'cancelled'
      ? null
      : combineModifications(base, resolution.modified)

    try {
      this.flows.complete(flowId, {
        response: deliveredResponse(submission.response, modified),
        resolution: modified
      })
    } catch (err) {
      this.logger.warn(`Could not record completion of flow ${flowId}: ${toErrorMessage(err)}`)
    }

    const decision: ResponseDecision = { flowId, modified, reason: resolution.reason }
    if (mockRule) decision.mockRule = mockRule
    this.pending.delete(flowId)
    this.remember(decision)
    return decision
  }

  private expire(flowId: string): void {
    try {
      this.flows.resume(flowId, null, 'timeout')
      this.logger.warn(`Flow ${flowId} held for ${this.holdTimeoutMs}ms, releasing unmodified`)
    } catch (err) {
      if (err instanceof AlreadyResumedError) return
      this.logger.warn(`Hold timeout for flow ${flowId} failed: ${toErrorMessage(err)}`)
    }
  }

  private remember(decision: ResponseDecision): void {
    this.settled.set(decision.flowId, decision)
    if (this.settled.size > this.decisionHistory) {
      const oldest = this.settled.keys().next()
      if (!oldest.done) {
        this.settled.delete(oldest.value)
      }
    }
  }
}

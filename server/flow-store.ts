import type { Flow, FlowState, ModifiedResponse, MockRuleRef, RequestSnapshot, ResponseSnapshot } from '../shared/types.js'
import { AlreadyResumedError, InvalidStateError, UnknownFlowError, toErrorMessage } from '../shared/errors.js'
import { isUnmodified } from '../shared/response-merge.js'
import { generateId } from '../shared/utils.js'
import type { Logger } from '../shared/logger.js'

export type ResolutionReason = 'resumed' | 'cancelled' | 'timeout'

export interface FlowResolution {
  modified: ModifiedResponse | null
  reason: ResolutionReason
}

export interface FlowInit {
  sourceFlowId?: string
  transport?: string
  response?: ResponseSnapshot
  timestamp?: number
  duration?: number
  mockRule?: MockRuleRef
}

export interface CompletePatch {
  response?: ResponseSnapshot
  duration?: number
  /** The modification finally delivered to the transport */
  resolution?: ModifiedResponse | null
}

export type FlowStoreEvent =
  | { type: 'flow'; flow: Flow }
  | { type: 'cleared' }

export type FlowStoreListener = (event: FlowStoreEvent) => void

export interface FlowStoreOptions {
  /** Completed flows beyond this count are evicted oldest first */
  maxFlows?: number
  logger: Logger
}

export const DEFAULT_MAX_FLOWS = 1000

/**
 * Owns every flow and its pause waiter. All transitions are synchronous, so a
 * flow is resolved at most once no matter how calls interleave.
 */
export class FlowStore {
  private readonly flows = new Map<string, Flow>()
  private readonly waiters = new Map<string, (resolution: FlowResolution) => void>()
  private readonly listeners = new Set<FlowStoreListener>()
  private readonly maxFlows: number
  private readonly logger: Logger

  constructor(options: FlowStoreOptions) {
    this.maxFlows = Math.max(1, options.maxFlows ?? DEFAULT_MAX_FLOWS)
    this.logger = options.logger
  }

  create(request: RequestSnapshot, init: FlowInit = {}): string {
    let id = generateId()
    while (this.flows.has(id)) {
      id = generateId()
    }

    const flow: Flow = {
      id,
      sourceFlowId: init.sourceFlowId,
      transport: init.transport,
      request,
      response: init.response,
      timestamp: init.timestamp ?? Date.now(),
      duration: init.duration ?? 0,
      state: 'pending',
      mockRule: init.mockRule,
      modified: false
    }
    this.save(flow)
    this.evict()
    return id
  }

  get(flowId: string): Flow | undefined {
    return this.flows.get(flowId)
  }

  /** Flows in capture order */
  list(): Flow[] {
    return Array.from(this.flows.values())
  }

  pausedIds(): string[] {
    return this.list().filter(flow => flow.state === 'paused').map(flow => flow.id)
  }

  /**
   * Hold a pending flow. The promise settles when the flow is resumed or the
   * store cancels it; it never rejects.
   */
  pause(flowId: string): Promise<FlowResolution> {
    const flow = this.require(flowId)
    if (flow.state !== 'pending') {
      throw new InvalidStateError(flowId, flow.state, 'pause')
    }

    const resolution = new Promise<FlowResolution>((resolve) => {
      this.waiters.set(flowId, resolve)
    })
    this.save({ ...flow, state: 'paused' })
    return resolution
  }

  resume(flowId: string, modified: ModifiedResponse | null, reason: ResolutionReason = 'resumed'): Flow {
    const flow = this.require(flowId)
    if (flow.state === 'resumed' || flow.state === 'completed') {
      throw new AlreadyResumedError(flowId)
    }
    if (flow.state !== 'paused') {
      throw new InvalidStateError(flowId, flow.state, 'resume')
    }
    return this.release(flow, modified, reason)
  }

  /**
   * Mark a flow finished. Completing twice is a no-op; a paused flow has to be
   * resumed first.
   */
  complete(flowId: string, patch: CompletePatch = {}): Flow {
    const flow = this.require(flowId)
    if (flow.state === 'completed') {
      return flow
    }
    if (flow.state === 'paused') {
      throw new InvalidStateError(flowId, flow.state, 'complete')
    }

    const completed: Flow = {
      ...flow,
      state: 'completed',
      response: patch.response ?? flow.response,
      duration: patch.duration ?? flow.duration,
      resolution: patch.resolution !== undefined ? patch.resolution : flow.resolution
    }
    this.save(completed)
    this.evict()
    return this.require(flowId)
  }

  /**
   * Release every paused flow unmodified. Returns how many were released.
   */
  cancelAll(why: string): number {
    let released = 0
    for (const flowId of this.pausedIds()) {
      const flow = this.flows.get(flowId)
      if (!flow || flow.state !== 'paused') continue
      try {
        this.release(flow, null, 'cancelled')
        released++
      } catch (err) {
        this.logger.error(`Failed to release flow ${flowId}: ${toErrorMessage(err)}`)
      }
    }
    if (released > 0) {
      this.logger.info(`Released ${released} paused flow(s): ${why}`)
    }
    return released
  }

  /**
   * Drop completed flows. Anything still in flight is kept.
   */
  clear(): number {
    let removed = 0
    for (const flow of this.list()) {
      if (flow.state === 'completed') {
        this.flows.delete(flow.id)
        removed++
      }
    }
    this.emit({ type: 'cleared' })
    return removed
  }

  onChange(listener: FlowStoreListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private release(flow: Flow, modified: ModifiedResponse | null, reason: ResolutionReason): Flow {
    const waiter = this.waiters.get(flow.id)
    this.waiters.delete(flow.id)

    const resumed: Flow = {
      ...flow,
      state: 'resumed',
      resolution: modified,
      modified: !isUnmodified(modified)
    }
    this.save(resumed)
    waiter?.({ modified, reason })
    return this.require(flow.id)
  }

  private require(flowId: string): Flow {
    const flow = this.flows.get(flowId)
    if (!flow) {
      throw new UnknownFlowError(flowId)
    }
    return flow
  }

  private save(flow: Flow): void {
    const frozen = Object.freeze(flow)
    this.flows.set(frozen.id, frozen)
    this.emit({ type: 'flow', flow: frozen })
  }

  private evict(): void {
    if (this.flows.size <= this.maxFlows) return
    for (const flow of this.flows.values()) {
      if (this.flows.size <= this.maxFlows) break
      if (isEvictable(flow.state)) {
        this.flows.delete(flow.id)
      }
    }
  }

  private emit(event: FlowStoreEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event)
      } catch (err) {
        this.logger.warn(`Flow listener failed: ${toErrorMessage(err)}`)
      }
    }
  }
}

function isEvictable(state: FlowState): boolean {
  return state === 'completed'
}

import { describe, it, expect, vi } from 'vitest'
import type { SubmitOutcome } from '../shared/control-channel.js'
import type { InterceptMode, ResponseDecision } from '../shared/types.js'
import { INTERCEPT_MODES } from '../shared/types.js'
import { AlreadyResumedError, UnknownFlowError } from '../shared/errors.js'
import { FlowCoordinator, isPausingMode, mockToModified } from './coordinator.js'
import { FlowStore } from './flow-store.js'
import { LocalControlChannel } from './local-channel.js'
import { MockRuleStore } from './rule-store.js'
import { exactParam, makeRequest, makeResponse, makeSubmission, ruleInput, silentLogger } from './test-utils/index.js'

function setup(mode: InterceptMode, holdTimeoutMs = 0) {
  const logger = silentLogger()
  const flows = new FlowStore({ logger })
  const rules = new MockRuleStore({ logger })
  const coordinator = new FlowCoordinator({ flows, rules, logger, mode, holdTimeoutMs })
  return { flows, rules, coordinator }
}

function pendingDecision(outcome: SubmitOutcome): Promise<ResponseDecision> {
  if (outcome.kind !== 'pending') {
    throw new Error(`Expected a held flow, got ${outcome.decision.reason}`)
  }
  return outcome.decision
}

function decided(outcome: SubmitOutcome): ResponseDecision {
  if (outcome.kind !== 'decided') {
    throw new Error('Expected an immediate decision')
  }
  return outcome.decision
}

const limitedRequest = (limit: string) => makeRequest({
  url: `https://api.example.test/items?limit=${limit}`,
  path: `/items?limit=${limit}`
})

describe('FlowCoordinator', () => {
  it('knows which modes pause', () => {
    expect(INTERCEPT_MODES.filter(isPausingMode)).toEqual([
      'debug',
      'mock_debug'
    ])
  })

  it('turns a mock decision into a modification', () => {
    expect(mockToModified({ ruleId: 'r', ruleName: 'n', statusCode: 201, headers: { a: '1' }, body: 'b' })).toEqual({
      statusCode: 201,
      headers: { a: '1' },
      body: 'b'
    })
  })

  describe('recording mode', () => {
    it('records the flow and passes it through', async () => {
      const { flows, coordinator } = setup('recording')
      const decision = decided(await coordinator.submit(makeSubmission()))

      expect(decision).toEqual({ flowId: decision.flowId, modified: null, reason: 'passthrough' })
      const flow = flows.get(decision.flowId)
      expect(flow?.state).toBe('completed')
      expect(flow?.sourceFlowId).toBe('agent-flow-1')
      expect(flow?.response).toEqual(makeResponse())
      expect(flow?.modified).toBe(false)
    })
  })

  describe('mock mode', () => {
    it('answers from the matching rule', async () => {
      const { flows, rules, coordinator } = setup('mock')
      const rule = rules.create(ruleInput('items', { queryParams: [exactParam('limit', '10')] }))

      const decision = decided(await coordinator.submit(makeSubmission({ request: limitedRequest('10') })))

      expect(decision).toEqual({
        flowId: decision.flowId,
        reason: 'mock',
        modified: { statusCode: 200, headers: { 'content-type': 'application/json' }, body: '{"rule":"items"}' },
        mockRule: { id: rule.id, name: 'items' }
      })
      const flow = flows.get(decision.flowId)
      expect(flow?.mockRule).toEqual({ id: rule.id, name: 'items' })
      expect(flow?.response?.body).toBe('{"rule":"items"}')
      expect(flow?.response?.headers).toEqual({ 'x-trace': 'abc', 'content-type': 'application/json' })
    })

    it('passes through when no rule matches', async () => {
      const { rules, coordinator } = setup('mock')
      rules.create(ruleInput('items', { queryParams: [exactParam('limit', '10')] }))

      const decision = decided(await coordinator.submit(makeSubmission({ request: limitedRequest('20') })))

      expect(decision.reason).toBe('passthrough')
      expect(decision.modified).toBeNull()
    })

    it('matches regardless of extra query parameters', async () => {
      const { rules, coordinator } = setup('mock')
      rules.create(ruleInput('items', { queryParams: [exactParam('limit', '10')] }))
      const request = makeRequest({
        url: 'https://api.example.test/items?limit=10&offset=5',
        path: '/items?limit=10&offset=5'
      })

      expect(decided(await coordinator.submit(makeSubmission({ request }))).reason).toBe('mock')
    })
  })

  describe('debug mode', () => {
    it('holds a flow until it is resumed with an edited response', async () => {
      const { flows, coordinator } = setup('debug')
      const submission = makeSubmission({
        request: makeRequest({
          method: 'POST',
          url: 'https://api.example.test/login',
          path: '/login',
          body: '{"user":"test-user","password":"test-password"}'
        }),
        response: makeResponse({ body: '{"token":"test-token"}' })
      })

      const outcome = await coordinator.submit(submission)
      const waiting = pendingDecision(outcome)
      expect(flows.get(outcome.flowId)?.state).toBe('paused')
      expect(coordinator.status()).toEqual({
        running: true,
        mode: 'debug',
        interceptedCount: 1,
        interceptedFlows: [outcome.flowId]
      })

      coordinator.resume(outcome.flowId, { statusCode: 404, body: '{"error":"Invalid credentials"}' })
      const decision = await waiting

      expect(decision).toEqual({
        flowId: outcome.flowId,
        modified: { statusCode: 404, body: '{"error":"Invalid credentials"}' },
        reason: 'resumed'
      })
      const flow = flows.get(outcome.flowId)
      expect(flow?.state).toBe('completed')
      expect(flow?.modified).toBe(true)
      expect(flow?.response).toEqual({
        statusCode: 404,
        reason: 'Not Found',
        headers: { 'content-type': 'application/json', 'x-trace': 'abc' },
        body: '{"error":"Invalid credentials"}'
      })
      expect(coordinator.status().interceptedCount).toBe(0)
      await expect(coordinator.awaitDecision(outcome.flowId)).resolves.toEqual(decision)
    })

    it('hands out the pending decision to late pollers', async () => {
      const { coordinator } = setup('debug')
      const outcome = await coordinator.submit(makeSubmission())
      const polled = coordinator.awaitDecision(outcome.flowId)

      coordinator.resume(outcome.flowId, null)

      await expect(polled).resolves.toEqual({ flowId: outcome.flowId, modified: null, reason: 'resumed' })
    })

    it('resumes a flow only once', async () => {
      const { coordinator } = setup('debug')
      const outcome = await coordinator.submit(makeSubmission())

      coordinator.resume(outcome.flowId, { body: 'first' })
      expect(() => coordinator.resume(outcome.flowId, { body: 'second' })).toThrow(AlreadyResumedError)
      await expect(pendingDecision(outcome)).resolves.toMatchObject({ modified: { body: 'first' } })
    })

    it('rejects unknown flows', async () => {
      const { coordinator } = setup('debug')

      expect(() => coordinator.resume('missing', null)).toThrow(UnknownFlowError)
      await expect(coordinator.awaitDecision('missing')).rejects.toThrow(UnknownFlowError)
    })

    it('releases a held flow unmodified after the hold timeout', async () => {
      const { flows, coordinator } = setup('debug', 20)
      const outcome = await coordinator.submit(makeSubmission())

      const decision = await pendingDecision(outcome)

      expect(decision).toEqual({ flowId: outcome.flowId, modified: null, reason: 'timeout' })
      expect(flows.get(outcome.flowId)?.state).toBe('completed')
    })
  })

  describe('mock_debug mode', () => {
    it('holds the mocked response for review', async () => {
      const { flows, rules, coordinator } = setup('mock_debug')
      const rule = rules.create(ruleInput('items', { queryParams: [exactParam('limit', '10')] }))

      const outcome = await coordinator.submit(makeSubmission({ request: limitedRequest('10') }))
      const waiting = pendingDecision(outcome)
      expect(flows.get(outcome.flowId)?.response?.body).toBe('{"rule":"items"}')

      coordinator.resume(outcome.flowId, null)

      await expect(waiting).resolves.toEqual({
        flowId: outcome.flowId,
        modified: { statusCode: 200, headers: { 'content-type': 'application/json' }, body: '{"rule":"items"}' },
        reason: 'resumed',
        mockRule: { id: rule.id, name: 'items' }
      })
    })

    it('layers operator edits over the mock', async () => {
      const { rules, coordinator } = setup('mock_debug')
      rules.create(ruleInput('items', { queryParams: [exactParam('limit', '10')] }))

      const outcome = await coordinator.submit(makeSubmission({ request: limitedRequest('10') }))
      coordinator.resume(outcome.flowId, { statusCode: 500 })

      const decision = await pendingDecision(outcome)
      expect(decision.modified).toEqual({
        statusCode: 500,
        reason: null,
        headers: { 'content-type': 'application/json' },
        body: '{"rule":"items"}'
      })
    })

    it('holds the real response when no rule matches', async () => {
      const { flows, coordinator } = setup('mock_debug')

      const outcome = await coordinator.submit(makeSubmission())

      expect(outcome.kind).toBe('pending')
      expect(flows.get(outcome.flowId)?.response).toEqual(makeResponse())
    })

    it('delivers the original when the hold is cancelled', async () => {
      const { rules, coordinator } = setup('mock_debug')
      rules.create(ruleInput('items', { queryParams: [exactParam('limit', '10')] }))
      const outcome = await coordinator.submit(makeSubmission({ request: limitedRequest('10') }))

      coordinator.stop()

      await expect(pendingDecision(outcome)).resolves.toMatchObject({ modified: null, reason: 'cancelled' })
    })
  })

  describe('mocks applied by the agent', () => {
    const applied = makeSubmission({ mockApplied: true, mockRuleId: 'r-1', mockRuleName: 'agent rule' })

    it('records them when not pausing', async () => {
      const { flows, coordinator } = setup('mock')
      const decision = decided(await coordinator.submit(applied))

      expect(decision).toEqual({
        flowId: decision.flowId,
        modified: null,
        reason: 'passthrough',
        mockRule: { id: 'r-1', name: 'agent rule' }
      })
      expect(flows.get(decision.flowId)?.mockRule).toEqual({ id: 'r-1', name: 'agent rule' })
    })

    it('still holds them in debug mode', async () => {
      const { coordinator } = setup('debug')

      expect((await coordinator.submit(applied)).kind).toBe('pending')
    })
  })

  describe('lifecycle', () => {
    it('releases every held flow on stop and passes later flows through', async () => {
      const { coordinator } = setup('debug')
      const first = await coordinator.submit(makeSubmission())
      const second = await coordinator.submit(makeSubmission())

      expect(coordinator.stop()).toBe(2)

      const decisions = await Promise.all([pendingDecision(first), pendingDecision(second)])
      expect(decisions.map(decision => [decision.modified, decision.reason])).toEqual([
        [null, 'cancelled'],
        [null, 'cancelled']
      ])
      expect(coordinator.isRunning).toBe(false)
      expect(coordinator.status().running).toBe(false)
      expect((await coordinator.submit(makeSubmission())).kind).toBe('decided')
      expect(coordinator.stop()).toBe(0)
    })

    it('releases held flows when switching to a mode that does not pause', async () => {
      const { coordinator } = setup('debug')
      const listener = vi.fn()
      coordinator.onModeChange(listener)
      const outcome = await coordinator.submit(makeSubmission())

      coordinator.switchMode('recording')

      await expect(pendingDecision(outcome)).resolves.toMatchObject({ reason: 'cancelled' })
      expect(coordinator.currentMode).toBe('recording')
      expect(listener).toHaveBeenCalledWith('recording')
    })

    it('keeps held flows when switching between pausing modes', async () => {
      const { coordinator } = setup('debug')
      const outcome = await coordinator.submit(makeSubmission())

      coordinator.switchMode('mock_debug')

      expect(coordinator.status().interceptedFlows).toEqual([outcome.flowId])
      coordinator.resume(outcome.flowId, null)
      await pendingDecision(outcome)
    })

    it('ignores a switch to the current mode', () => {
      const { coordinator } = setup('mock')
      const listener = vi.fn()
      coordinator.onModeChange(listener)

      coordinator.switchMode('mock')

      expect(listener).not.toHaveBeenCalled()
    })
  })
})

describe('LocalControlChannel', () => {
  it('submits, resumes and queries through the coordinator', async () => {
    const { rules, coordinator } = setup('debug')
    const rule = rules.create(ruleInput('items'))
    const channel = new LocalControlChannel(coordinator)

    const outcome = await channel.submit(makeSubmission())
    await expect(channel.resume(outcome.flowId, null)).resolves.toEqual({ flowId: outcome.flowId, status: 'resumed' })
    await expect(channel.resume(outcome.flowId, null)).rejects.toThrow(AlreadyResumedError)
    await expect(channel.queryMock({ method: 'GET', host: 'api.example.test', path: '/items', query: {} })).resolves.toMatchObject({
      ruleId: rule.id,
      statusCode: 200
    })
  })
})

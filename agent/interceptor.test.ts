import { describe, it, expect, vi } from 'vitest'
import type { ControlChannel } from '../shared/control-channel.js'
import type { InterceptMode } from '../shared/types.js'
import { FlowCoordinator } from '../server/coordinator.js'
import { FlowStore } from '../server/flow-store.js'
import { LocalControlChannel } from '../server/local-channel.js'
import { MockRuleStore } from '../server/rule-store.js'
import { ruleInput, silentLogger } from '../server/test-utils/index.js'
import { createInterceptedFetch, type InterceptedFetchOptions } from './interceptor.js'

function upstreamResponse(): Response {
  return new Response('{"items":[]}', {
    status: 200,
    headers: { 'content-type': 'application/json', 'x-trace': 'abc' }
  })
}

function setup(mode: InterceptMode, options: Partial<InterceptedFetchOptions> = {}) {
  const logger = silentLogger()
  const flows = new FlowStore({ logger })
  const rules = new MockRuleStore({ logger })
  const coordinator = new FlowCoordinator({ flows, rules, logger, mode })
  const baseFetch = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => upstreamResponse())
  const intercepted = createInterceptedFetch(new LocalControlChannel(coordinator), { logger, baseFetch, ...options })
  return { flows, rules, coordinator, baseFetch, intercepted }
}

const ITEMS_URL = 'https://api.example.test/items?limit=10'

describe('createInterceptedFetch', () => {
  it('records the exchange and returns the upstream response', async () => {
    const { flows, baseFetch, intercepted } = setup('recording')

    const res = await intercepted(ITEMS_URL, { headers: { accept: 'application/json' } })

    expect(res.status).toBe(200)
    expect(res.headers.get('x-trace')).toBe('abc')
    expect(await res.text()).toBe('{"items":[]}')
    expect(baseFetch).toHaveBeenCalledTimes(1)

    const [flow] = flows.list()
    expect(flow).toMatchObject({
      transport: 'interceptor',
      state: 'completed',
      request: {
        method: 'GET',
        url: ITEMS_URL,
        host: 'api.example.test',
        path: '/items?limit=10',
        headers: { accept: 'application/json' },
        body: ''
      },
      response: { statusCode: 200, body: '{"items":[]}' }
    })
  })

  it('waits for an operator edit in debug mode', async () => {
    const { flows, coordinator, intercepted } = setup('debug')

    const pending = intercepted('https://api.example.test/login', {
      method: 'POST',
      body: '{"user":"test-user","password":"test-password"}'
    })
    await vi.waitFor(() => expect(coordinator.status().interceptedCount).toBe(1))
    const [flowId] = coordinator.status().interceptedFlows
    expect(flows.get(flowId)?.request.body).toBe('{"user":"test-user","password":"test-password"}')

    coordinator.resume(flowId, { statusCode: 404, body: '{"error":"Invalid credentials"}' })
    const res = await pending

    expect(res.status).toBe(404)
    expect(res.statusText).toBe('Not Found')
    expect(res.headers.get('content-type')).toBe('application/json')
    expect(res.headers.get('x-trace')).toBe('abc')
    expect(await res.text()).toBe('{"error":"Invalid credentials"}')
  })

  it('keeps binary bytes when only the status is edited', async () => {
    const bytes = [0x89, 0x50, 0x4e, 0x47, 0xff, 0xfe, 0x00, 0x80]
    const baseFetch = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(new Uint8Array(bytes), { status: 200, headers: { 'content-type': 'image/png' } }))
    const { coordinator, intercepted } = setup('debug', { baseFetch })

    const pending = intercepted('https://api.example.test/logo.png')
    await vi.waitFor(() => expect(coordinator.status().interceptedCount).toBe(1))
    coordinator.resume(coordinator.status().interceptedFlows[0], { statusCode: 201 })
    const res = await pending

    expect(res.status).toBe(201)
    expect(res.headers.get('content-type')).toBe('image/png')
    expect(Array.from(new Uint8Array(await res.arrayBuffer()))).toEqual(bytes)
  })

  it('returns the original response when the edit has an invalid header name', async () => {
    const { coordinator, intercepted } = setup('debug')

    const pending = intercepted(ITEMS_URL)
    await vi.waitFor(() => expect(coordinator.status().interceptedCount).toBe(1))
    coordinator.resume(coordinator.status().interceptedFlows[0], { statusCode: 201, headers: { 'bad header': 'x' } })
    const res = await pending

    expect(res.status).toBe(200)
    expect(res.headers.get('x-trace')).toBe('abc')
    expect(await res.text()).toBe('{"items":[]}')
  })

  it('keeps the original status when the edit is not deliverable', async () => {
    const { coordinator, intercepted } = setup('debug')

    const pending = intercepted(ITEMS_URL)
    await vi.waitFor(() => expect(coordinator.status().interceptedCount).toBe(1))
    coordinator.resume(coordinator.status().interceptedFlows[0], { statusCode: 600, body: 'edited' })
    const res = await pending

    expect(res.status).toBe(200)
    expect(await res.text()).toBe('edited')
  })

  it('applies a matching mock rule', async () => {
    const { rules, intercepted } = setup('mock')
    rules.create(ruleInput('items', { queryParams: [{ key: 'limit', value: '10', required: true, matchType: 'EXACT' }] }))

    const res = await intercepted(ITEMS_URL)

    expect(res.status).toBe(200)
    expect(await res.text()).toBe('{"rule":"items"}')
  })

  it('drops the body for statuses that cannot carry one', async () => {
    const { rules, intercepted } = setup('mock')
    rules.create({
      name: 'gone',
      match: { method: 'GET', host: 'api.example.test', path: '/items', queryParams: [] },
      response: { statusCode: 204, headers: null, body: 'ignored' }
    })

    const res = await intercepted(ITEMS_URL)

    expect(res.status).toBe(204)
    expect(res.body).toBeNull()
  })

  it('answers from a mock without calling the upstream when asked to', async () => {
    const { flows, rules, baseFetch, intercepted } = setup('recording', { queryMockFirst: true })
    const rule = rules.create(ruleInput('items'))

    const res = await intercepted(ITEMS_URL)

    expect(baseFetch).not.toHaveBeenCalled()
    expect(res.headers.get('content-type')).toBe('application/json')
    expect(await res.text()).toBe('{"rule":"items"}')
    expect(flows.list()[0]?.mockRule).toEqual({ id: rule.id, name: 'items' })
  })

  it('goes straight to the upstream when disabled or unreachable', async () => {
    const disabled = setup('debug', { enabled: false })
    expect(await (await disabled.intercepted(ITEMS_URL)).text()).toBe('{"items":[]}')
    expect(disabled.flows.list()).toEqual([])

    const unreachable = setup('debug', { isReachable: async () => false })
    expect(await (await unreachable.intercepted(ITEMS_URL)).text()).toBe('{"items":[]}')
    expect(unreachable.flows.list()).toEqual([])
  })

  it('returns the original response when the inspector fails', async () => {
    const failing: ControlChannel = {
      submit: async () => {
        throw new Error('inspector down')
      },
      resume: async () => {
        throw new Error('inspector down')
      },
      queryMock: async () => {
        throw new Error('inspector down')
      }
    }
    const intercepted = createInterceptedFetch(failing, {
      logger: silentLogger(),
      queryMockFirst: true,
      baseFetch: async () => upstreamResponse()
    })

    const res = await intercepted(ITEMS_URL)

    expect(res.status).toBe(200)
    expect(await res.text()).toBe('{"items":[]}')
  })
})

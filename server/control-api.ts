import express, { type ErrorRequestHandler, type Request, type RequestHandler, type Response } from 'express'
import { FlowError, MalformedPayloadError, toErrorMessage, type FlowErrorCode } from '../shared/errors.js'
import type { Logger } from '../shared/logger.js'
import type { MockRuleResponse } from '../shared/types.js'
import { isRecord } from '../shared/utils.js'
import {
  parseFlowSubmission,
  parseInterceptMode,
  parseMockQuery,
  parseResumeCommand,
  toSubmitReply,
  toWireMockDecision,
  toWireStatus
} from '../shared/wire.js'
import type { FlowCoordinator } from './coordinator.js'
import type { FlowStore } from './flow-store.js'
import { parseRuleInput, type MockRuleStore } from './rule-store.js'

export interface ControlApiDeps {
  coordinator: FlowCoordinator
  flows: FlowStore
  rules: MockRuleStore
  logger: Logger
}

const STATUS_BY_CODE: Record<FlowErrorCode, number> = {
  UNKNOWN_FLOW: 404,
  UNKNOWN_RULE: 404,
  INVALID_STATE: 409,
  ALREADY_RESUMED: 409,
  MALFORMED_PAYLOAD: 400
}

const BODY_LIMIT = '50mb'

function sendError(res: Response, err: unknown, logger: Logger): void {
  if (res.headersSent) {
    logger.error(`Error after response was sent: ${toErrorMessage(err)}`)
    return
  }
  if (err instanceof FlowError) {
    logger.warn(err.message)
    res.status(STATUS_BY_CODE[err.code]).json({ error: err.code, message: err.message })
    return
  }
  logger.error('Request failed', err)
  res.status(500).json({ error: 'INTERNAL', message: toErrorMessage(err) })
}

type Handler = (req: Request, res: Response) => Promise<void> | void

function readBoolean(body: unknown, field: string): boolean {
  if (!isRecord(body) || typeof body[field] !== 'boolean') {
    throw new MalformedPayloadError(`Invalid field "${field}": expected boolean`)
  }
  return body[field] === true
}

/**
 * Control endpoints used by agents (/intercept, /resume, /mock-match, ...) and
 * the inspection API under /api.
 */
export function createControlRouter(deps: ControlApiDeps): express.Router {
  const { coordinator, flows, rules, logger } = deps
  const router = express.Router()

  const route = (handler: Handler): RequestHandler => (req, res) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch((err: unknown) => sendError(res, err, logger))
  }

  router.use(express.json({ limit: BODY_LIMIT }))

  // ============ Agent endpoints ============

  router.get('/ping', (_req, res) => {
    res.type('text/plain').send('PONG')
  })

  router.get('/status', (_req, res) => {
    res.json(toWireStatus(coordinator.status()))
  })

  router.post('/intercept', route(async (req, res) => {
    const submission = parseFlowSubmission(req.body)
    const outcome = await coordinator.submit(submission)
    if (outcome.kind === 'pending') {
      res.status(202).json({ status: 'pending', flow_id: outcome.flowId })
      return
    }
    res.json(toSubmitReply(outcome.decision))
  }))

  // Long-poll: answers once the held flow has been resolved
  router.get('/flows/:id/decision', route(async (req, res) => {
    const decision = await coordinator.awaitDecision(req.params.id)
    if (res.writableEnded || req.socket.destroyed) {
      logger.debug(`Poller for flow ${decision.flowId} went away`)
      return
    }
    if (!coordinator.isRunning) {
      res.set('Connection', 'close')
    }
    res.json(toSubmitReply(decision))
  }))

  router.post('/resume', route((req, res) => {
    const { flowId, modified } = parseResumeCommand(req.body)
    coordinator.resume(flowId, modified)
    res.json({ status: 'resumed', flow_id: flowId })
  }))

  router.get('/mock-match', route((req, res) => {
    const decision = coordinator.queryMock(parseMockQuery(req.query))
    if (!decision) {
      res.status(404).json({})
      return
    }
    res.json(toWireMockDecision(decision))
  }))

  // ============ Flows ============

  router.get('/api/flows', (_req, res) => {
    res.json({ flows: flows.list() })
  })

  router.get('/api/flows/:id', (req, res) => {
    const flow = flows.get(req.params.id)
    if (!flow) {
      res.status(404).json({ error: 'UNKNOWN_FLOW', message: `Unknown flow: ${req.params.id}` })
      return
    }
    res.json(flow)
  })

  router.delete('/api/flows', (_req, res) => {
    res.json({ removed: flows.clear() })
  })

  // Turn a captured flow into a mock rule answering with its response
  router.post('/api/flows/:id/rule', route((req, res) => {
    const flow = flows.get(req.params.id)
    if (!flow) {
      res.status(404).json({ error: 'UNKNOWN_FLOW', message: `Unknown flow: ${req.params.id}` })
      return
    }
    const body: Record<string, unknown> = isRecord(req.body) ? req.body : {}
    const name = typeof body.name === 'string' && body.name.trim()
      ? body.name.trim()
      : `${flow.request.method} ${flow.request.path}`
    const response: MockRuleResponse = flow.response
      ? { statusCode: flow.response.statusCode, headers: { ...flow.response.headers }, body: flow.response.body }
      : { statusCode: 200, headers: null, body: '' }

    const rule = rules.createFromUrl(name, flow.request.method, flow.request.url, response)
    res.status(201).json(rule)
  }))

  // ============ Mode ============

  router.get('/api/mode', (_req, res) => {
    res.json({ mode: coordinator.currentMode })
  })

  router.put('/api/mode', route((req, res) => {
    const mode = parseInterceptMode(isRecord(req.body) ? req.body.mode : undefined)
    coordinator.switchMode(mode)
    res.json({ mode })
  }))

  // ============ Rules ============

  router.get('/api/rules', (_req, res) => {
    res.json({ rules: rules.snapshot() })
  })

  router.post('/api/rules', route((req, res) => {
    const rule = rules.create(parseRuleInput(req.body))
    res.status(201).json(rule)
  }))

  router.put('/api/rules/:id', route((req, res) => {
    res.json(rules.update(req.params.id, parseRuleInput(req.body)))
  }))

  router.post('/api/rules/:id/enabled', route((req, res) => {
    res.json(rules.setEnabled(req.params.id, readBoolean(req.body, 'enabled')))
  }))

  router.delete('/api/rules/:id', route((req, res) => {
    res.json(rules.remove(req.params.id))
  }))

  // ============ Logs ============

  router.get('/api/logs', (_req, res) => {
    res.json({ entries: logger.entries() })
  })

  const handleBodyError: ErrorRequestHandler = (err, _req, res, next) => {
    if (isRecord(err) && err.type === 'entity.parse.failed') {
      sendError(res, new MalformedPayloadError('Request body is not valid JSON'), logger)
      return
    }
    next(err)
  }
  router.use(handleBodyError)

  return router
}

import http from 'http'
import { WebSocketServer, WebSocket } from 'ws'
import type { Flow, InterceptMode, MockRule } from '../shared/types.js'
import type { Logger } from '../shared/logger.js'
import type { FlowCoordinator } from './coordinator.js'
import type { FlowStore } from './flow-store.js'
import type { MockRuleStore } from './rule-store.js'

export type LiveMessage =
  | { type: 'init'; flows: Flow[]; mode: InterceptMode; rules: readonly MockRule[] }
  | { type: 'flow'; flow: Flow }
  | { type: 'mode'; mode: InterceptMode }
  | { type: 'rules'; rules: readonly MockRule[] }
  | { type: 'cleared' }

export interface LiveFeedDeps {
  coordinator: FlowCoordinator
  flows: FlowStore
  rules: MockRuleStore
  logger: Logger
}

/** How many recent flows a new inspector receives on connect */
const INIT_FLOW_COUNT = 100

/**
 * Pushes flow, mode and rule changes to connected inspectors over WebSocket.
 */
export class LiveFeed {
  private readonly clients = new Set<WebSocket>()
  private readonly unsubscribe: Array<() => void> = []
  private wss: WebSocketServer | null = null

  constructor(private readonly deps: LiveFeedDeps) {}

  /**
   * Attach to an HTTP server and start relaying changes
   */
  attach(server: http.Server): void {
    const { coordinator, flows, rules, logger } = this.deps
    this.wss = new WebSocketServer({ server })

    this.wss.on('connection', (ws) => {
      this.clients.add(ws)
      logger.debug(`Inspector connected (${this.clients.size} total)`)

      const init: LiveMessage = {
        type: 'init',
        flows: flows.list().slice(-INIT_FLOW_COUNT),
        mode: coordinator.currentMode,
        rules: rules.snapshot()
      }
      ws.send(JSON.stringify(init))

      ws.on('close', () => this.clients.delete(ws))
      ws.on('error', (err) => {
        logger.warn(`Inspector socket error: ${err.message}`)
      })
    })

    this.unsubscribe.push(
      flows.onChange((event) => {
        this.broadcast(event.type === 'flow' ? { type: 'flow', flow: event.flow } : { type: 'cleared' })
      }),
      coordinator.onModeChange((mode) => this.broadcast({ type: 'mode', mode })),
      rules.onChange((snapshot) => this.broadcast({ type: 'rules', rules: snapshot }))
    )
  }

  broadcast(message: LiveMessage): void {
    const payload = JSON.stringify(message)
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload)
      }
    })
  }

  close(): Promise<void> {
    this.unsubscribe.splice(0).forEach(stop => stop())
    for (const client of this.clients) {
      client.terminate()
    }
    this.clients.clear()

    const wss = this.wss
    this.wss = null
    if (!wss) return Promise.resolve()
    return new Promise((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()))
    })
  }
}

import express from 'express'
import http from 'http'
import type { AddressInfo } from 'net'
import { createLogger, type Logger } from '../shared/logger.js'
import type { InspectorConfig } from './config.js'
import { createControlRouter } from './control-api.js'
import { FlowCoordinator } from './coordinator.js'
import { FlowStore } from './flow-store.js'
import { LiveFeed } from './live-feed.js'
import { LocalControlChannel } from './local-channel.js'
import { MockRuleStore } from './rule-store.js'

const CLOSE_GRACE_MS = 1000

/**
 * One inspector run: owns the stores, the coordinator and the HTTP/WebSocket
 * servers, and tears them down in order.
 */
export class InspectorSession {
  readonly logger: Logger
  readonly flows: FlowStore
  readonly rules: MockRuleStore
  readonly coordinator: FlowCoordinator
  /** For transport adapters embedded in this process */
  readonly channel: LocalControlChannel
  readonly app: express.Express
  readonly server: http.Server
  private readonly liveFeed: LiveFeed
  private started = false

  constructor(private readonly config: InspectorConfig, logger?: Logger) {
    this.logger = logger ?? createLogger('inspector', config.logging)
    this.flows = new FlowStore({ maxFlows: config.maxFlows, logger: this.logger.child('flows') })
    this.rules = new MockRuleStore({ file: config.rulesFile, logger: this.logger.child('rules') })
    this.coordinator = new FlowCoordinator({
      flows: this.flows,
      rules: this.rules,
      logger: this.logger.child('coordinator'),
      mode: config.mode,
      holdTimeoutMs: config.holdTimeoutMs,
      decisionHistory: config.maxFlows
    })
    this.channel = new LocalControlChannel(this.coordinator)

    this.app = express()
    this.app.use(createControlRouter({
      coordinator: this.coordinator,
      flows: this.flows,
      rules: this.rules,
      logger: this.logger.child('api')
    }))
    this.server = http.createServer(this.app)
    this.liveFeed = new LiveFeed({
      coordinator: this.coordinator,
      flows: this.flows,
      rules: this.rules,
      logger: this.logger.child('live')
    })
  }

  /**
   * Load rules and start listening. Resolves with the bound port.
   */
  async start(port = this.config.port): Promise<number> {
    if (this.started) {
      throw new Error('Session already started')
    }
    await this.rules.load()
    this.liveFeed.attach(this.server)

    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject)
      this.server.listen(port, this.config.host, () => {
        this.server.off('error', reject)
        resolve()
      })
    })
    this.started = true

    const address = this.server.address()
    const boundPort = isAddressInfo(address) ? address.port : port
    this.logger.info(`Inspector listening on http://${this.config.host}:${boundPort} (mode: ${this.coordinator.currentMode})`)
    return boundPort
  }

  /**
   * Release every held flow, then close the servers.
   */
  async stop(): Promise<void> {
    const released = this.coordinator.stop()
    if (released > 0) {
      // Let pending long-polls write their answers before sockets close
      await new Promise(resolve => setImmediate(resolve))
    }

    await this.liveFeed.close()
    await this.rules.flush()

    if (this.started) {
      await new Promise<void>((resolve, reject) => {
        this.server.close((err) => (err ? reject(err) : resolve()))
        this.server.closeIdleConnections()
        setTimeout(() => this.server.closeAllConnections(), CLOSE_GRACE_MS).unref()
      })
      this.started = false
    }
    this.logger.info('Inspector stopped')
  }
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null
}
